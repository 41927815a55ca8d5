/**
 * Building `_for-sale` records for publication. Whatever comes out passes
 * the same selector and schema checks a lookup applies.
 */

import type { ForSaleRecord, SalePayload } from '../types.js';
import { OfferExpiredError, SchemaError } from '../utils/errors.js';
import { normalizeDomain } from '../utils/validators.js';
import { FOR_SALE_LABEL } from './resolver.js';
import { MAX_RECORD_BYTES, VERSION_TAG } from './selector.js';
import { isOfferExpired, parsePayload } from './schema.js';

export type RecordFields = SalePayload;

const HAS_SCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:/;

/** A bare address becomes a mailto URI */
function contactUri(contact: string): string {
  return HAS_SCHEME.test(contact) ? contact : `mailto:${contact}`;
}

/**
 * Compose the TXT record advertising `domain` for sale.
 *
 * Fields are written in a fixed order (price, url, contact, expires).
 *
 * @throws InvalidDomainError, SchemaError, or OfferExpiredError when the
 *   offer has already lapsed
 */
export function buildForSaleRecord(
  domain: string,
  fields: RecordFields,
  now: Date = new Date(),
): ForSaleRecord {
  const name = normalizeDomain(domain);

  const payload: SalePayload = {};
  if (fields.price !== undefined) payload.price = fields.price;
  if (fields.url !== undefined) payload.url = fields.url;
  if (fields.contact !== undefined) payload.contact = contactUri(fields.contact);
  if (fields.expires !== undefined) payload.expires = fields.expires;

  const json = JSON.stringify(payload);
  parsePayload(json);

  if (payload.expires !== undefined && isOfferExpired(payload.expires, now)) {
    throw new OfferExpiredError(name, payload.expires);
  }

  const value = `${VERSION_TAG}${json}`;
  const bytes = Buffer.byteLength(value, 'utf8');
  if (bytes > MAX_RECORD_BYTES) {
    throw new SchemaError('size_exceeded', `record is ${bytes} bytes (max ${MAX_RECORD_BYTES})`);
  }

  return Object.freeze({
    name: `${FOR_SALE_LABEL}.${name}`,
    type: 'TXT',
    value,
    bytes,
  });
}
