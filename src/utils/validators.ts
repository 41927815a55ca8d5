/**
 * Domain Name Validators.
 *
 * Syntactic checks run before a lookup touches the cache or the network.
 */

import { domainToASCII } from 'node:url';
import { InvalidDomainError } from './errors.js';

/**
 * One DNS label (LDH rule).
 * - 1-63 characters
 * - Alphanumeric and hyphens
 * - Cannot start or end with hyphen
 */
const DOMAIN_LABEL_PATTERN = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

/**
 * TLD: alphabetic, or an IDN A-label.
 */
const TLD_PATTERN = /^([a-z]{2,63}|xn--[a-z0-9-]{1,59})$/;

/**
 * Characters that are definitely not allowed in domains.
 */
const INVALID_CHARS = /[^a-z0-9.-]/;

// 253 minus "_for-sale.", so the query name still fits in DNS
const MAX_DOMAIN_LENGTH = 243;

/**
 * Validate and normalize a full domain name.
 *
 * @returns Normalized domain (lowercase A-labels, no trailing dot)
 * @throws InvalidDomainError if invalid
 */
export function normalizeDomain(input: string): string {
  let normalized = input.trim().toLowerCase();

  if (normalized.endsWith('.')) {
    normalized = normalized.slice(0, -1);
  }

  if (!normalized) {
    throw new InvalidDomainError(input, 'Domain name cannot be empty');
  }

  // IDN: convert to A-labels first; domainToASCII returns '' when it can't
  if (/[^\x00-\x7f]/.test(normalized)) {
    const ascii = domainToASCII(normalized);
    if (!ascii) {
      throw new InvalidDomainError(input, 'Not a valid internationalized name');
    }
    normalized = ascii;
  }

  if (normalized.length > MAX_DOMAIN_LENGTH) {
    throw new InvalidDomainError(
      input,
      `Domain name too long (${normalized.length} chars, max ${MAX_DOMAIN_LENGTH})`,
    );
  }

  const invalidChar = normalized.match(INVALID_CHARS)?.[0];
  if (invalidChar !== undefined) {
    throw new InvalidDomainError(
      input,
      `Contains invalid character: "${invalidChar}"`,
    );
  }

  const labels = normalized.split('.');
  if (labels.length < 2) {
    throw new InvalidDomainError(
      input,
      'No TLD found. Include the extension (e.g., "example.com")',
    );
  }

  for (const label of labels) {
    if (!label) {
      throw new InvalidDomainError(input, 'Empty label');
    }
    if (label.length > 63) {
      throw new InvalidDomainError(
        input,
        `Label too long (${label.length} chars, max 63)`,
      );
    }
    if (!DOMAIN_LABEL_PATTERN.test(label)) {
      if (label.startsWith('-')) {
        throw new InvalidDomainError(input, 'A label cannot start with a hyphen');
      }
      if (label.endsWith('-')) {
        throw new InvalidDomainError(input, 'A label cannot end with a hyphen');
      }
      throw new InvalidDomainError(
        input,
        'Invalid format. Use only letters, numbers, and hyphens.',
      );
    }
  }

  const tld = labels[labels.length - 1];
  if (!TLD_PATTERN.test(tld)) {
    throw new InvalidDomainError(input, `Invalid TLD: "${tld}"`);
  }

  return normalized;
}
