/**
 * Payload validation for `_for-sale` records.
 *
 * Closed schema: exactly the keys below, each checked against a fixed
 * pattern or scheme whitelist. There is no permissive mode.
 */

import { z } from 'zod';
import type { CandidateRecord, SalePayload, SchemaErrorReason } from '../types.js';
import { SchemaError } from '../utils/errors.js';

export const PRICE_PATTERN = /^[A-Z]{3}:[0-9]+(\.[0-9]+)?$/;

const DATE_PATTERN = /^([0-9]{4})-([0-9]{2})-([0-9]{2})$/;

/** Printable ASCII, no spaces: nothing for a URL parser to silently strip */
const URI_CHARS = /^[\x21-\x7e]+$/;

const SCHEME_PATTERN = /^([a-zA-Z][a-zA-Z0-9+.-]*):/;

const MAILBOX_PATTERN = /^[^@\s,;]+@[^@\s,;]+\.[^@\s,;]+$/;

/**
 * Check a URI-valued field. Returns an issue, or null when it passes.
 */
function checkUri(
  value: string,
  scheme: 'https' | 'mailto',
): { reason: SchemaErrorReason; message: string } | null {
  if (!URI_CHARS.test(value)) {
    return { reason: 'bad_pattern', message: 'must be printable ASCII without spaces' };
  }

  const found = SCHEME_PATTERN.exec(value)?.[1];
  if (found === undefined) {
    return { reason: 'bad_pattern', message: 'must be an absolute URI' };
  }
  if (found !== scheme) {
    return {
      reason: 'disallowed_scheme',
      message: `scheme "${found}" is not allowed (only ${scheme})`,
    };
  }

  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return { reason: 'bad_pattern', message: 'is not a valid URI' };
  }

  if (scheme === 'https') {
    if (!parsed.hostname) {
      return { reason: 'bad_pattern', message: 'must name a host' };
    }
    if (parsed.username || parsed.password) {
      return { reason: 'bad_pattern', message: 'must not carry credentials' };
    }
    return null;
  }

  let mailbox: string;
  try {
    mailbox = decodeURIComponent(parsed.pathname);
  } catch {
    return { reason: 'bad_pattern', message: 'has a malformed address' };
  }
  if (!MAILBOX_PATTERN.test(mailbox)) {
    return { reason: 'bad_pattern', message: 'must contain a single email address' };
  }
  return null;
}

/**
 * YYYY-MM-DD naming a real calendar day.
 */
export function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  // Date.UTC would read years 0-99 as 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

function uriField(scheme: 'https' | 'mailto') {
  return z.string().superRefine((value, ctx) => {
    const issue = checkUri(value, scheme);
    if (issue) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: issue.message,
        params: { reason: issue.reason },
      });
    }
  });
}

export const SalePayloadSchema = z
  .object({
    price: z
      .string()
      .regex(PRICE_PATTERN, 'must look like CUR:AMOUNT (e.g. USD:1000)')
      .optional(),
    url: uriField('https').optional(),
    contact: uriField('mailto').optional(),
    expires: z
      .string()
      .refine(isCalendarDate, 'must be a calendar date (YYYY-MM-DD)')
      .optional(),
  })
  .strict();

/**
 * Top-level keys of a JSON object text, in order, duplicates included.
 * The text must already be known to parse as an object.
 */
export function topLevelKeys(json: string): string[] {
  const keys: string[] = [];
  let depth = 0;
  let i = 0;

  while (i < json.length) {
    const ch = json[i];

    if (ch === '"') {
      // Scan the whole string token, honouring escapes
      let end = i + 1;
      while (end < json.length && json[end] !== '"') {
        end += json[end] === '\\' ? 2 : 1;
      }
      const token = json.slice(i, end + 1);

      if (depth === 1) {
        let next = end + 1;
        while (next < json.length && /\s/.test(json[next])) next++;
        if (json[next] === ':') {
          const key: unknown = JSON.parse(token);
          if (typeof key === 'string') keys.push(key);
        }
      }

      i = end + 1;
      continue;
    }

    if (ch === '{' || ch === '[') depth++;
    else if (ch === '}' || ch === ']') depth--;
    i++;
  }

  return keys;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Turn zod issues into the single most important schema error.
 * Unknown keys outrank everything else.
 */
function toSchemaError(error: z.ZodError): SchemaError {
  for (const issue of error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      return new SchemaError('unknown_key', `unknown key(s): ${issue.keys.join(', ')}`);
    }
  }

  const [first] = error.issues;
  const field = first?.path.join('.') || 'payload';

  if (first?.code === z.ZodIssueCode.custom) {
    const reason: unknown = first.params?.reason;
    if (reason === 'disallowed_scheme' || reason === 'bad_pattern') {
      return new SchemaError(reason, `${field} ${first.message}`);
    }
  }

  return new SchemaError('bad_pattern', `${field} ${first?.message ?? 'is invalid'}`);
}

/**
 * Parse the JSON text of a payload (version tag already stripped).
 */
export function parsePayload(json: string): SalePayload {
  // Exactly one object, no leading or trailing bytes
  if (!json.startsWith('{') || !json.endsWith('}')) {
    throw new SchemaError('malformed_json', 'payload must be a single JSON object');
  }

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    throw new SchemaError(
      'malformed_json',
      error instanceof Error ? error.message : 'invalid JSON',
    );
  }

  if (!isPlainObject(value)) {
    throw new SchemaError('malformed_json', 'payload must be a single JSON object');
  }

  const keys = topLevelKeys(json);
  const duplicate = keys.find((key, index) => keys.indexOf(key) !== index);
  if (duplicate !== undefined) {
    throw new SchemaError('duplicate_key', `key "${duplicate}" appears more than once`);
  }

  const result = SalePayloadSchema.safeParse(value);
  if (!result.success) {
    throw toSchemaError(result.error);
  }

  const payload: SalePayload = {};
  if (result.data.price !== undefined) payload.price = result.data.price;
  if (result.data.url !== undefined) payload.url = result.data.url;
  if (result.data.contact !== undefined) payload.contact = result.data.contact;
  if (result.data.expires !== undefined) payload.expires = result.data.expires;
  return payload;
}

/**
 * Validate one candidate record.
 *
 * @throws SchemaError with the rejection reason
 */
export function validateCandidate(candidate: CandidateRecord): SalePayload {
  if (!candidate.content.startsWith(candidate.versionTag)) {
    throw new SchemaError('malformed_json', 'record does not carry the version tag');
  }
  return parsePayload(candidate.content.slice(candidate.versionTag.length));
}

/**
 * Has the offer lapsed? Compared by calendar day in UTC; an offer is
 * still valid on its expiry day.
 */
export function isOfferExpired(expires: string, now: Date = new Date()): boolean {
  const today = now.toISOString().slice(0, 10);
  return expires < today;
}
