/**
 * Tool Exports.
 */

export {
  checkForSaleTool,
  checkForSaleSchema,
  executeCheckForSale,
  type CheckForSaleInput,
} from './check_for_sale.js';
export {
  buildForSaleRecordTool,
  buildForSaleRecordSchema,
  executeBuildForSaleRecord,
  type BuildForSaleRecordInput,
} from './build_for_sale_record.js';
