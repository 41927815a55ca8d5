/**
 * Custom Error Classes for for-sale-check.
 *
 * Errors raised by the pipeline collaborators carry a `kind` that ends up in
 * `SaleResponse.errors`. Programming errors (bad options, bad configuration)
 * are the only ones allowed to escape a lookup.
 */

import type {
  SaleErrorDetail,
  SaleErrorKind,
  SchemaErrorReason,
} from '../types.js';

/**
 * Base error class for all for-sale-check errors.
 */
export class ForSaleError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  /** User-friendly message */
  readonly userMessage: string;
  /** Can this operation be retried? */
  readonly retryable: boolean;
  /** Suggested action for the user */
  readonly suggestedAction?: string;

  constructor(
    code: string,
    message: string,
    userMessage: string,
    options?: {
      retryable?: boolean;
      suggestedAction?: string;
      cause?: unknown;
    },
  ) {
    super(message);
    this.name = 'ForSaleError';
    this.code = code;
    this.userMessage = userMessage;
    this.retryable = options?.retryable ?? false;
    this.suggestedAction = options?.suggestedAction;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  /**
   * Convert to a plain object for JSON responses.
   */
  toJSON(): object {
    return {
      code: this.code,
      message: this.userMessage,
      retryable: this.retryable,
      suggestedAction: this.suggestedAction,
    };
  }
}

/**
 * An error that is reported inside a SaleResponse instead of thrown.
 */
export abstract class SaleLookupError extends ForSaleError {
  abstract readonly kind: SaleErrorKind;

  toDetail(): SaleErrorDetail {
    return {
      kind: this.kind,
      code: this.code,
      message: this.userMessage,
    };
  }
}

/**
 * Error when a domain name is malformed.
 */
export class InvalidDomainError extends SaleLookupError {
  readonly kind = 'InvalidDomain';

  constructor(domain: string, reason: string) {
    super(
      'INVALID_DOMAIN',
      `Invalid domain: ${domain} - ${reason}`,
      `The domain "${domain}" is not valid: ${reason}`,
      {
        retryable: false,
        suggestedAction: 'Check the domain name for typos or invalid characters.',
      },
    );
    this.name = 'InvalidDomainError';
  }
}

/**
 * Error when a network stage runs past its timeout.
 */
export class TimeoutError extends SaleLookupError {
  readonly kind = 'Timeout';

  constructor(operation: string, timeoutMs: number) {
    super(
      'TIMEOUT',
      `Operation timed out: ${operation} (${timeoutMs}ms)`,
      `The ${operation} took too long to complete.`,
      {
        retryable: true,
        suggestedAction: 'Try again - this might be a temporary network issue.',
      },
    );
    this.name = 'TimeoutError';
  }
}

/**
 * Error when the domain does not exist in DNS.
 */
export class NxDomainError extends SaleLookupError {
  readonly kind = 'NxDomain';

  constructor(domain: string) {
    super(
      'NXDOMAIN',
      `Domain does not exist: ${domain}`,
      `The domain "${domain}" does not exist in DNS.`,
      { retryable: false },
    );
    this.name = 'NxDomainError';
  }
}

/**
 * Error when the resolver cannot produce an answer.
 */
export class ResolutionError extends SaleLookupError {
  readonly kind = 'ResolutionError';
  /** DNS response code if one was returned */
  readonly rcode?: number;

  constructor(name: string, message: string, rcode?: number, cause?: unknown) {
    super(
      'RESOLUTION_ERROR',
      `DNS resolution failed for ${name}: ${message}`,
      `Could not resolve ${name}: ${message}`,
      {
        retryable: true,
        suggestedAction: 'Try again later or check the resolver configuration.',
        cause,
      },
    );
    this.name = 'ResolutionError';
    this.rcode = rcode;
  }
}

/**
 * Error when the answer is not DNSSEC-authenticated.
 * Unsigned zones land here too.
 */
export class DnssecValidationError extends SaleLookupError {
  readonly kind = 'DnssecValidationError';

  constructor(name: string, reason: string) {
    super(
      'DNSSEC_VALIDATION_FAILED',
      `DNSSEC validation failed for ${name}: ${reason}`,
      `The DNS answer for ${name} could not be authenticated (${reason}).`,
      {
        retryable: false,
        suggestedAction: 'The zone must be DNSSEC-signed with a valid chain of trust.',
      },
    );
    this.name = 'DnssecValidationError';
  }
}

/**
 * Error when a _for-sale record does not conform to the payload schema.
 */
export class SchemaError extends SaleLookupError {
  readonly kind = 'SchemaError';
  readonly reason: SchemaErrorReason;

  constructor(reason: SchemaErrorReason, message: string) {
    super(
      'SCHEMA_ERROR',
      `Invalid _for-sale record (${reason}): ${message}`,
      `A _for-sale record was rejected: ${message}`,
      { retryable: false },
    );
    this.name = 'SchemaError';
    this.reason = reason;
  }

  toDetail(): SaleErrorDetail {
    return { ...super.toDetail(), reason: this.reason };
  }
}

/**
 * Error when the RDAP cross-check gave no signal.
 */
export class RdapUnreachableError extends SaleLookupError {
  readonly kind = 'RdapUnreachable';

  constructor(domain: string) {
    super(
      'RDAP_UNREACHABLE',
      `RDAP cross-check unavailable for ${domain}`,
      `The RDAP service for ${domain} could not be reached.`,
      { retryable: true },
    );
    this.name = 'RdapUnreachableError';
  }
}

/**
 * Error when a valid offer carries an expiry date in the past.
 */
export class OfferExpiredError extends SaleLookupError {
  readonly kind = 'OfferExpired';

  constructor(domain: string, expires: string) {
    super(
      'OFFER_EXPIRED',
      `Offer for ${domain} expired on ${expires}`,
      `The sale offer for ${domain} expired on ${expires}.`,
      { retryable: false },
    );
    this.name = 'OfferExpiredError';
  }
}

/**
 * Error when lookup options have the wrong shape. A programming error.
 */
export class InvalidOptionsError extends ForSaleError {
  constructor(
    issues: string[],
    suggestedAction = 'enableRdapCheck must be a boolean, cacheTTL 0-86400 seconds, timeout 0-60 seconds.',
  ) {
    super(
      'INVALID_OPTIONS',
      `Invalid lookup options: ${issues.join('; ')}`,
      'The lookup options are invalid.',
      { retryable: false, suggestedAction },
    );
    this.name = 'InvalidOptionsError';
  }
}

/**
 * Error when a caller abandons its lookup.
 */
export class LookupCancelledError extends ForSaleError {
  constructor(domain: string) {
    super(
      'CANCELLED',
      `Lookup cancelled: ${domain}`,
      'The lookup was cancelled.',
      { retryable: true },
    );
    this.name = 'LookupCancelledError';
  }
}

/**
 * Error when the configuration cannot be used.
 */
export class ConfigurationError extends ForSaleError {
  constructor(problem: string, howToFix: string) {
    super(
      'CONFIG_ERROR',
      `Invalid configuration: ${problem}`,
      `Server configuration is incomplete.`,
      {
        retryable: false,
        suggestedAction: howToFix,
      },
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * Convert any error to a ForSaleError.
 */
export function wrapError(error: unknown): ForSaleError {
  if (error instanceof ForSaleError) {
    return error;
  }

  if (error instanceof Error) {
    return new ForSaleError(
      'UNKNOWN_ERROR',
      error.message,
      'An unexpected error occurred.',
      {
        retryable: true,
        suggestedAction: 'Try again or contact support if the issue persists.',
        cause: error,
      },
    );
  }

  return new ForSaleError(
    'UNKNOWN_ERROR',
    String(error),
    'An unexpected error occurred.',
    {
      retryable: true,
      suggestedAction: 'Try again or contact support if the issue persists.',
    },
  );
}
