/**
 * For-Sale Lookup.
 *
 * Runs the pipeline for one domain: DNSSEC-validated DNS lookup, record
 * selection, payload validation and (optionally) the RDAP cross-check,
 * behind a single-flight TTL cache. Untrusted input never makes a lookup
 * throw; every failure is reported in `SaleResponse.errors`.
 */

import { z } from 'zod';
import type {
  Config,
  LookupPolicy,
  RawAnswer,
  RdapResult,
  SaleErrorKind,
  SaleOptions,
  SalePayload,
  SaleResponse,
  SaleSource,
} from '../types.js';
import { config as defaultConfig } from '../config.js';
import { logger } from '../utils/logger.js';
import { SingleFlightCache, forSaleCacheKey } from '../utils/cache.js';
import { withTimeout } from '../utils/timeout.js';
import { normalizeDomain } from '../utils/validators.js';
import {
  ConfigurationError,
  DnssecValidationError,
  InvalidDomainError,
  InvalidOptionsError,
  LookupCancelledError,
  OfferExpiredError,
  RdapUnreachableError,
  ResolutionError,
  SaleLookupError,
  SchemaError,
  TimeoutError,
  wrapError,
} from '../utils/errors.js';
import { DohDnssecResolver, FOR_SALE_LABEL, type DnssecResolver } from './resolver.js';
import { HttpRdapChecker, type RdapCrossChecker } from './rdap.js';
import { selectRecords } from './selector.js';
import { isOfferExpired, validateCandidate } from './schema.js';

// ═══════════════════════════════════════════════════════════════════════════
// Options
// ═══════════════════════════════════════════════════════════════════════════

export const SaleOptionsSchema = z
  .object({
    enableRdapCheck: z.boolean().default(false),
    cacheTTL: z.number().int().min(0).max(86400).default(300),
    timeout: z.number().positive().max(60).default(5),
  })
  .strict();

export type SaleOptionsInput = z.input<typeof SaleOptionsSchema>;

/**
 * Validate lookup options and fill in defaults.
 *
 * @throws InvalidOptionsError on the wrong shape
 */
export function parseSaleOptions(options: unknown = {}): SaleOptions {
  const result = SaleOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.errors.map((e) => `${e.path.join('.') || 'options'}: ${e.message}`),
    );
  }
  return Object.freeze({ ...result.data });
}

export const DEFAULT_POLICY: Readonly<LookupPolicy> = Object.freeze({
  rdapOnlyConfirms: true,
  failureCacheTtl: 30,
  cacheMaxEntries: 10000,
});

/**
 * Error kinds worth retrying soon. Responses carrying one are cached for
 * at most `failureCacheTtl`.
 */
const TRANSIENT_KINDS: ReadonlySet<SaleErrorKind> = new Set<SaleErrorKind>([
  'Timeout',
  'ResolutionError',
  'DnssecValidationError',
  'RdapUnreachable',
]);

const DNS_FAILURE_KINDS: ReadonlySet<SaleErrorKind> = new Set<SaleErrorKind>([
  'Timeout',
  'NxDomain',
  'ResolutionError',
  'DnssecValidationError',
]);

// ═══════════════════════════════════════════════════════════════════════════
// Lookup
// ═══════════════════════════════════════════════════════════════════════════

export interface ForSaleLookupOptions {
  resolver: DnssecResolver;
  rdapChecker: RdapCrossChecker;
  policy?: Partial<LookupPolicy>;
  /** Clock used for offer expiry and `checkedAt` */
  now?: () => Date;
}

export interface LookupCallOptions {
  /** Abandons this caller's wait */
  signal?: AbortSignal;
}

interface DnsOutcome {
  payload: SalePayload | null;
  expired: boolean;
  errors: SaleLookupError[];
}

interface RdapOutcome extends RdapResult {
  /** Set when the stage ran past its timeout */
  timeout: TimeoutError | null;
}

interface ResponseFields {
  forSale: boolean;
  payload?: SalePayload | null;
  source?: SaleSource[];
  errors: SaleLookupError[];
  checkedAt?: Date;
}

function freezeResponse(domain: string, fields: ResponseFields): SaleResponse {
  return Object.freeze({
    domain,
    forSale: fields.forSale,
    ...(fields.payload ?? {}),
    source: Object.freeze([...(fields.source ?? [])]),
    errors: Object.freeze(fields.errors.map((e) => e.kind)),
    details: Object.freeze(fields.errors.map((e) => Object.freeze(e.toDetail()))),
    ...(fields.checkedAt ? { checkedAt: fields.checkedAt.toISOString() } : {}),
  });
}

export class ForSaleLookup {
  private readonly resolver: DnssecResolver;
  private readonly rdapChecker: RdapCrossChecker;
  private readonly policy: LookupPolicy;
  private readonly now: () => Date;
  private readonly cache: SingleFlightCache<SaleResponse>;

  constructor(options: ForSaleLookupOptions) {
    this.resolver = options.resolver;
    this.rdapChecker = options.rdapChecker;
    this.policy = { ...DEFAULT_POLICY, ...options.policy };
    this.now = options.now ?? (() => new Date());
    this.cache = new SingleFlightCache<SaleResponse>(this.policy.cacheMaxEntries);
  }

  /**
   * Is `domain` advertised for sale?
   *
   * Rejects only with InvalidOptionsError (bad options) or
   * LookupCancelledError (the caller's signal fired).
   */
  async getDomainSaleStatus(
    domain: string,
    options?: SaleOptionsInput,
    call: LookupCallOptions = {},
  ): Promise<SaleResponse> {
    const parsed = parseSaleOptions(options);

    let normalized: string;
    try {
      normalized = normalizeDomain(domain);
    } catch (error) {
      if (error instanceof InvalidDomainError) {
        logger.debug('Rejected domain', { domain, reason: error.message });
        // No clock: the same input always yields the same response
        return freezeResponse(domain, { forSale: false, errors: [error] });
      }
      throw error;
    }

    const key = forSaleCacheKey(normalized, parsed);
    const { value, fromCache } = await this.cache.getOrCompute(
      key,
      (signal) => this.check(normalized, parsed, signal),
      {
        ttlMs: (response) => this.ttlFor(response, parsed),
        signal: call.signal,
        onAbort: () => new LookupCancelledError(normalized),
      },
    );

    if (fromCache) {
      logger.debug('For-sale lookup served from cache', { domain: normalized });
    }
    return value;
  }

  /**
   * Stop the cache and abandon running lookups.
   */
  destroy(): void {
    this.cache.destroy();
  }

  /** Number of lookups currently in flight */
  get pending(): number {
    return this.cache.pending;
  }

  private async check(
    domain: string,
    options: SaleOptions,
    signal: AbortSignal,
  ): Promise<SaleResponse> {
    const startTime = Date.now();
    const timeoutMs = options.timeout * 1000;

    const [dns, rdap] = await Promise.all([
      this.checkDns(domain, timeoutMs, signal),
      options.enableRdapCheck
        ? this.checkRdap(domain, timeoutMs, signal)
        : Promise.resolve(null),
    ]);

    const response = this.merge(domain, dns, rdap);

    logger.info('For-sale lookup complete', {
      domain,
      for_sale: response.forSale,
      source: response.source,
      errors: response.errors,
      duration_ms: Date.now() - startTime,
    });

    return response;
  }

  private async checkDns(
    domain: string,
    timeoutMs: number,
    signal: AbortSignal,
  ): Promise<DnsOutcome> {
    const errors: SaleLookupError[] = [];
    const failed = (): DnsOutcome => ({ payload: null, expired: false, errors });

    let answer: RawAnswer;
    try {
      answer = await withTimeout(
        this.resolver.resolve(domain, { timeoutMs, signal }),
        timeoutMs,
        () => new TimeoutError('DNS lookup', timeoutMs),
      );
    } catch (error) {
      errors.push(this.toDnsFailure(domain, error));
      return failed();
    }

    // Whatever the resolver says, unauthenticated data is never used
    if (!answer.dnssecAuthenticated) {
      errors.push(
        new DnssecValidationError(answer.name, 'answer is not DNSSEC-authenticated'),
      );
      return failed();
    }

    const candidates = selectRecords(answer, (rejection) => {
      logger.debug('Rejected _for-sale record', { domain, reason: rejection.reason });
      errors.push(rejection);
    });

    let payload: SalePayload | null = null;
    for (const candidate of candidates) {
      try {
        payload = validateCandidate(candidate);
        break;
      } catch (error) {
        const rejection =
          error instanceof SchemaError
            ? error
            : new SchemaError('malformed_json', 'record could not be parsed');
        logger.debug('Rejected _for-sale record', {
          domain,
          reason: rejection.reason,
          content: candidate.content,
        });
        errors.push(rejection);
      }
    }

    if (payload?.expires !== undefined && isOfferExpired(payload.expires, this.now())) {
      errors.push(new OfferExpiredError(domain, payload.expires));
      return { payload: null, expired: true, errors };
    }

    return { payload, expired: false, errors };
  }

  private async checkRdap(
    domain: string,
    timeoutMs: number,
    signal: AbortSignal,
  ): Promise<RdapOutcome> {
    try {
      const result = await withTimeout(
        this.rdapChecker.crossCheck(domain, { timeoutMs, signal }),
        timeoutMs,
        () => new TimeoutError('RDAP cross-check', timeoutMs),
      );
      return { ...result, timeout: null };
    } catch (error) {
      if (error instanceof TimeoutError) {
        return { tagPresent: false, reachable: false, timeout: error };
      }
      logger.logError('RDAP cross-check failed unexpectedly', wrapError(error), { domain });
      return { tagPresent: false, reachable: false, timeout: null };
    }
  }

  private toDnsFailure(domain: string, error: unknown): SaleLookupError {
    if (error instanceof SaleLookupError && DNS_FAILURE_KINDS.has(error.kind)) {
      return error;
    }
    logger.logError('Resolver failed unexpectedly', wrapError(error), { domain });
    return new ResolutionError(
      `${FOR_SALE_LABEL}.${domain}`,
      'unexpected resolver failure',
      undefined,
      error,
    );
  }

  /**
   * Combine both channels. DNS is authoritative: RDAP adds evidence and
   * never vetoes; alone it confirms only under `rdapOnlyConfirms`, and
   * never against an expired DNS offer.
   */
  private merge(domain: string, dns: DnsOutcome, rdap: RdapOutcome | null): SaleResponse {
    const errors = [...dns.errors];
    if (rdap?.timeout) {
      errors.push(rdap.timeout);
    } else if (rdap && !rdap.reachable) {
      errors.push(new RdapUnreachableError(domain));
    }

    const dnsConfirmed = dns.payload !== null;
    const rdapTag = rdap?.tagPresent ?? false;
    const forSale =
      dnsConfirmed || (this.policy.rdapOnlyConfirms && rdapTag && !dns.expired);

    const source: SaleSource[] = [];
    if (dnsConfirmed) source.push('dns');
    if (rdapTag && forSale) source.push('rdap');

    return freezeResponse(domain, {
      forSale,
      payload: dns.payload,
      source,
      errors,
      checkedAt: this.now(),
    });
  }

  private ttlFor(response: SaleResponse, options: SaleOptions): number {
    const ttlMs = options.cacheTTL * 1000;
    if (response.errors.some((kind) => TRANSIENT_KINDS.has(kind))) {
      return Math.min(ttlMs, this.policy.failureCacheTtl * 1000);
    }
    return ttlMs;
  }
}

/**
 * Lookup wired to the DoH resolver and the HTTP RDAP checker.
 *
 * @throws ConfigurationError when the resolver endpoint is not https
 */
export function createForSaleLookup(cfg: Config = defaultConfig): ForSaleLookup {
  // The AD bit is only as trustworthy as the channel it arrives on
  if (!cfg.dohUrl.startsWith('https://')) {
    throw new ConfigurationError(
      'FORSALE_DOH_URL must be an https:// URL',
      'Point FORSALE_DOH_URL at the https endpoint of a DNSSEC-validating resolver.',
    );
  }

  return new ForSaleLookup({
    resolver: new DohDnssecResolver({ endpoint: cfg.dohUrl }),
    rdapChecker: new HttpRdapChecker({ bootstrapUrl: cfg.rdapBootstrapUrl }),
    policy: cfg.policy,
  });
}
