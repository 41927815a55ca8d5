/**
 * for-sale-check - Core Type Definitions
 *
 * These types describe the data that flows through the lookup pipeline,
 * from the raw DNS answer to the public SaleResponse.
 */

// ═══════════════════════════════════════════════════════════════════════════
// OPTIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Per-call lookup options. Durations are in seconds.
 * Immutable once parsed and part of the cache key.
 */
export interface SaleOptions {
  /** Cross-check the for-sale status via RDAP */
  readonly enableRdapCheck: boolean;

  /** How long a completed lookup is reused */
  readonly cacheTTL: number;

  /** Upper bound for each network stage (DNS, RDAP) */
  readonly timeout: number;
}

/**
 * Fixed behaviour of one lookup instance.
 */
export interface LookupPolicy {
  /** May an RDAP "for sale" status alone mark a domain as for sale? */
  rdapOnlyConfirms: boolean;

  /** Upper bound (seconds) for caching failed lookups */
  failureCacheTtl: number;

  /** Maximum number of cached responses */
  cacheMaxEntries: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// PIPELINE TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One TXT resource record, its character-strings already joined.
 */
export interface TxtString {
  text: string;
  ttl: number;
}

/**
 * The resolver's answer for `_for-sale.<domain>` TXT.
 */
export interface RawAnswer {
  /** Queried owner name */
  name: string;

  /** TXT strings in answer order */
  records: TxtString[];

  /** Did the chain of trust validate down to this answer? */
  dnssecAuthenticated: boolean;

  /** DNS response code when the resolver reports one */
  rcode?: number;
}

/**
 * A TXT string that carries the version tag and fits the size limit.
 */
export interface CandidateRecord {
  versionTag: string;

  /** Full TXT string, version tag included */
  content: string;

  /** UTF-8 octet length of `content` */
  contentBytes: number;

  sourceTTL: number;
}

/**
 * A validated payload. Only recognised keys, all checked.
 */
export interface SalePayload {
  /** "CUR:AMOUNT", e.g. "USD:1000" */
  price?: string;

  /** https URI */
  url?: string;

  /** mailto URI */
  contact?: string;

  /** YYYY-MM-DD */
  expires?: string;
}

export interface RdapResult {
  tagPresent: boolean;
  reachable: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════

export type SaleSource = 'dns' | 'rdap';

export type SaleErrorKind =
  | 'InvalidDomain'
  | 'Timeout'
  | 'NxDomain'
  | 'ResolutionError'
  | 'DnssecValidationError'
  | 'SchemaError'
  | 'RdapUnreachable'
  | 'OfferExpired';

export type SchemaErrorReason =
  | 'malformed_json'
  | 'duplicate_key'
  | 'unknown_key'
  | 'bad_pattern'
  | 'size_exceeded'
  | 'disallowed_scheme';

/**
 * Structured detail for one entry of `SaleResponse.errors`.
 */
export interface SaleErrorDetail {
  kind: SaleErrorKind;
  code: string;
  message: string;
  reason?: SchemaErrorReason;
}

/**
 * Public result of a lookup. Frozen once produced.
 */
export interface SaleResponse {
  /** Normalised domain (or the raw input when it was rejected) */
  readonly domain: string;

  readonly forSale: boolean;

  readonly price?: string;
  readonly url?: string;
  readonly contact?: string;
  readonly expires?: string;

  /** Channels that contributed to a positive verdict */
  readonly source: readonly SaleSource[];

  /** Error kinds in the order they were encountered */
  readonly errors: readonly SaleErrorKind[];

  /** One entry per `errors` element */
  readonly details: readonly SaleErrorDetail[];

  /** ISO 8601 timestamp of the underlying resolution; absent when nothing was resolved */
  readonly checkedAt?: string;
}

/**
 * A `_for-sale` TXT record ready to publish.
 */
export interface ForSaleRecord {
  /** Owner name, `_for-sale.<domain>` */
  readonly name: string;
  readonly type: 'TXT';
  /** Record text, version tag included */
  readonly value: string;
  /** UTF-8 length of `value` */
  readonly bytes: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Process configuration loaded from environment variables.
 */
export interface Config {
  // Logging
  logLevel: 'debug' | 'info' | 'warn' | 'error';

  // Tool output
  outputFormat: 'text' | 'json' | 'both';

  // Upstream services
  dohUrl: string;
  rdapBootstrapUrl: string;

  // Lookup policy
  policy: LookupPolicy;

  // Defaults for tool calls that omit options
  defaults: SaleOptions;
}
