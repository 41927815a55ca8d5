/**
 * DNSSEC-validating resolution of `_for-sale.<domain>` TXT records.
 *
 * The default resolver talks DNS-over-HTTPS (JSON API) to a validating
 * recursive resolver. The upstream walks the chain of trust from the root
 * trust anchor; the HTTPS channel authenticates the upstream itself. Only
 * answers carrying the AD bit are accepted; unsigned zones fail exactly like
 * bogus ones.
 */

import axios from 'axios';
import { z } from 'zod';
import type { RawAnswer, TxtString } from '../types.js';
import { DEFAULT_DOH_URL } from '../config.js';
import { logger } from '../utils/logger.js';
import {
  DnssecValidationError,
  NxDomainError,
  ResolutionError,
  TimeoutError,
} from '../utils/errors.js';
import { createDeadline, type StageDeadline } from '../utils/timeout.js';

export const FOR_SALE_LABEL = '_for-sale';

export interface ResolveOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Resolves the for-sale TXT RRset and reports its validation status.
 *
 * Rejects with TimeoutError, NxDomainError, ResolutionError or
 * DnssecValidationError.
 */
export interface DnssecResolver {
  resolve(domain: string, options: ResolveOptions): Promise<RawAnswer>;
}

// ═══════════════════════════════════════════════════════════════════════════
// DoH JSON response (RFC 8484 JSON flavour used by Cloudflare and Google)
// ═══════════════════════════════════════════════════════════════════════════

const DohRecordSchema = z.object({
  name: z.string(),
  type: z.number().int(),
  TTL: z.number().int().nonnegative(),
  data: z.string(),
}).passthrough();

const DohResponseSchema = z.object({
  Status: z.number().int(),
  AD: z.boolean().optional(),
  Answer: z.array(DohRecordSchema).optional(),
  Comment: z.union([z.string(), z.array(z.string())]).optional(),
  extended_dns_errors: z
    .array(z.object({ info_code: z.number().int() }).passthrough())
    .optional(),
}).passthrough();

type DohResponse = z.infer<typeof DohResponseSchema>;

const RCODE_NOERROR = 0;
const RCODE_SERVFAIL = 2;
const RCODE_NXDOMAIN = 3;

const RCODE_NAMES: Record<number, string> = {
  0: 'NOERROR',
  1: 'FORMERR',
  2: 'SERVFAIL',
  3: 'NXDOMAIN',
  4: 'NOTIMP',
  5: 'REFUSED',
};

const TYPE_CNAME = 5;
const TYPE_TXT = 16;

/**
 * Extended DNS Error codes (RFC 8914) that report a DNSSEC failure.
 */
const DNSSEC_EDE_CODES = new Set([1, 2, 5, 6, 7, 8, 9, 10, 11, 12]);

const DNSSEC_COMMENT_PATTERN = /dnssec|bogus|rrsig|dnskey|signature/i;

function canonicalName(name: string): string {
  return name.toLowerCase().replace(/\.$/, '');
}

function errorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Decode TXT rdata in presentation format (`"part1" "part2"`, with `\"`,
 * `\\` and `\DDD` escapes) into one string. Unquoted data is taken as-is.
 *
 * @returns the joined string, or null when the data is malformed
 */
export function decodeTxtData(data: string): string | null {
  const input = data.trim();
  if (!input.startsWith('"')) {
    return input;
  }

  const bytes: number[] = [];
  const pushChar = (char: string) => {
    bytes.push(...Buffer.from(char, 'utf8'));
  };

  let i = 0;
  while (i < input.length) {
    const ch = input[i];
    if (ch === ' ' || ch === '\t') {
      i++;
      continue;
    }
    if (ch !== '"') {
      return null;
    }
    i++;

    let closed = false;
    while (i < input.length) {
      const codePoint = input.codePointAt(i);
      if (codePoint === undefined) break;
      const c = String.fromCodePoint(codePoint);

      if (c === '"') {
        closed = true;
        i++;
        break;
      }

      if (c === '\\') {
        const digits = input.slice(i + 1, i + 4);
        if (/^[0-9]{3}$/.test(digits)) {
          const value = parseInt(digits, 10);
          if (value > 255) return null;
          bytes.push(value);
          i += 4;
          continue;
        }
        const escaped = input.codePointAt(i + 1);
        if (escaped === undefined) return null;
        const escapedChar = String.fromCodePoint(escaped);
        pushChar(escapedChar);
        i += 1 + escapedChar.length;
        continue;
      }

      pushChar(c);
      i += c.length;
    }

    if (!closed) {
      return null;
    }
  }

  return Buffer.from(bytes).toString('utf8');
}

/**
 * Collect the TXT records answering `name`, following CNAMEs in the answer.
 */
export function extractTxtRecords(name: string, answers: DohResponse['Answer']): TxtString[] {
  const records: TxtString[] = [];
  if (!answers) return records;

  const aliases = new Map<string, string>();
  for (const answer of answers) {
    if (answer.type === TYPE_CNAME) {
      aliases.set(canonicalName(answer.name), canonicalName(answer.data));
    }
  }

  let owner = canonicalName(name);
  const visited = new Set<string>();
  let target = aliases.get(owner);
  while (target !== undefined && !visited.has(owner)) {
    visited.add(owner);
    owner = target;
    target = aliases.get(owner);
  }

  for (const answer of answers) {
    if (answer.type !== TYPE_TXT || canonicalName(answer.name) !== owner) {
      continue;
    }
    const text = decodeTxtData(answer.data);
    if (text === null) {
      logger.warn('Skipping malformed TXT data', { name, data: answer.data });
      continue;
    }
    records.push({ text, ttl: answer.TTL });
  }

  return records;
}

function describeDnssecFailure(response: DohResponse): string | null {
  const ede = response.extended_dns_errors?.find((e) =>
    DNSSEC_EDE_CODES.has(e.info_code),
  );
  if (ede) {
    return `extended DNS error ${ede.info_code}`;
  }

  const comments = Array.isArray(response.Comment)
    ? response.Comment
    : response.Comment !== undefined
      ? [response.Comment]
      : [];

  for (const comment of comments) {
    const match = /EDE\((\d+)\)/.exec(comment);
    if (match && DNSSEC_EDE_CODES.has(parseInt(match[1], 10))) {
      return comment;
    }
    if (DNSSEC_COMMENT_PATTERN.test(comment)) {
      return comment;
    }
  }

  return null;
}

// ═══════════════════════════════════════════════════════════════════════════
// Resolver
// ═══════════════════════════════════════════════════════════════════════════

export interface DohResolverOptions {
  /** DoH JSON endpoint of a DNSSEC-validating resolver */
  endpoint?: string;
}

export class DohDnssecResolver implements DnssecResolver {
  private readonly endpoint: string;

  constructor(options: DohResolverOptions = {}) {
    this.endpoint = options.endpoint ?? DEFAULT_DOH_URL;
  }

  async resolve(domain: string, options: ResolveOptions): Promise<RawAnswer> {
    const name = `${FOR_SALE_LABEL}.${domain}`;
    const deadline = createDeadline(options.timeoutMs, options.signal);

    try {
      const response = await this.query(name, 'TXT', deadline, options.timeoutMs);

      if (response.Status === RCODE_NOERROR) {
        this.requireAuthenticated(name, response);
        return {
          name,
          records: extractTxtRecords(name, response.Answer),
          dnssecAuthenticated: true,
          rcode: RCODE_NOERROR,
        };
      }

      if (response.Status === RCODE_NXDOMAIN) {
        // Denial of existence must be authenticated too
        this.requireAuthenticated(name, response);
        return await this.resolveMissingRecord(domain, name, deadline, options.timeoutMs);
      }

      throw this.failure(name, response);
    } finally {
      deadline.clear();
    }
  }

  /**
   * `_for-sale.<domain>` does not exist. Distinguish a domain without the
   * record from a domain that does not exist at all.
   */
  private async resolveMissingRecord(
    domain: string,
    name: string,
    deadline: StageDeadline,
    timeoutMs: number,
  ): Promise<RawAnswer> {
    const apex = await this.query(domain, 'SOA', deadline, timeoutMs);

    if (apex.Status === RCODE_NXDOMAIN) {
      this.requireAuthenticated(domain, apex);
      throw new NxDomainError(domain);
    }

    if (apex.Status === RCODE_NOERROR) {
      this.requireAuthenticated(domain, apex);
      logger.debug('No _for-sale record', { domain });
      return {
        name,
        records: [],
        dnssecAuthenticated: true,
        rcode: RCODE_NXDOMAIN,
      };
    }

    throw this.failure(domain, apex);
  }

  private requireAuthenticated(name: string, response: DohResponse): void {
    if (response.AD !== true) {
      throw new DnssecValidationError(
        name,
        'answer is not authenticated (unsigned zone or broken chain of trust)',
      );
    }
  }

  private failure(name: string, response: DohResponse): Error {
    if (response.Status === RCODE_SERVFAIL) {
      const dnssecFailure = describeDnssecFailure(response);
      if (dnssecFailure) {
        return new DnssecValidationError(name, dnssecFailure);
      }
    }

    const rcodeName = RCODE_NAMES[response.Status] ?? `RCODE ${response.Status}`;
    return new ResolutionError(name, rcodeName, response.Status);
  }

  private async query(
    name: string,
    type: 'TXT' | 'SOA',
    deadline: StageDeadline,
    timeoutMs: number,
  ): Promise<DohResponse> {
    logger.debug('DoH query', { name, type, endpoint: this.endpoint });

    let status: number;
    let data: unknown;

    try {
      const response = await axios.get<unknown>(this.endpoint, {
        params: { name, type, do: 1, cd: 0 },
        headers: { Accept: 'application/dns-json' },
        timeout: timeoutMs,
        signal: deadline.signal,
        validateStatus: () => true,
      });
      status = response.status;
      data = response.data;
    } catch (error) {
      const code = errorCode(error);
      if (deadline.timedOut() || code === 'ECONNABORTED' || code === 'ETIMEDOUT') {
        throw new TimeoutError('DNS lookup', timeoutMs);
      }
      throw new ResolutionError(
        name,
        error instanceof Error ? error.message : 'request failed',
        undefined,
        error,
      );
    }

    if (status !== 200) {
      throw new ResolutionError(name, `resolver returned HTTP ${status}`);
    }

    const parsed = DohResponseSchema.safeParse(data);
    if (!parsed.success) {
      logger.debug('DoH response validation failed', {
        errors: parsed.error.errors.slice(0, 3),
      });
      throw new ResolutionError(name, 'malformed resolver response');
    }

    return parsed.data;
  }
}
