/**
 * for-sale-check - library entry.
 */

export {
  ForSaleLookup,
  createForSaleLookup,
  parseSaleOptions,
  SaleOptionsSchema,
  DEFAULT_POLICY,
  type ForSaleLookupOptions,
  type LookupCallOptions,
  type SaleOptionsInput,
} from './forsale/lookup.js';
export {
  DohDnssecResolver,
  FOR_SALE_LABEL,
  decodeTxtData,
  type DnssecResolver,
  type DohResolverOptions,
  type ResolveOptions,
} from './forsale/resolver.js';
export {
  HttpRdapChecker,
  FOR_SALE_STATUS,
  type CrossCheckOptions,
  type HttpRdapCheckerOptions,
  type RdapCrossChecker,
} from './forsale/rdap.js';
export { selectRecords, VERSION_TAG, MAX_RECORD_BYTES } from './forsale/selector.js';
export {
  validateCandidate,
  parsePayload,
  isOfferExpired,
  SalePayloadSchema,
} from './forsale/schema.js';
export { buildForSaleRecord, type RecordFields } from './forsale/record.js';
export { normalizeDomain } from './utils/validators.js';
export {
  formatSaleText,
  formatSaleJson,
  formatSaleHtml,
  formatZoneLine,
  escapeHtml,
} from './utils/format.js';
export * from './utils/errors.js';
export type * from './types.js';
