/**
 * check_for_sale Tool - For-Sale Signal Check.
 *
 * Reads the `_for-sale` TXT record of a domain, accepting it only when the
 * answer is DNSSEC-authenticated and the payload passes the closed schema.
 * Optionally cross-checks the registry's RDAP status.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { SaleOptions, SaleResponse } from '../types.js';
import type { ForSaleLookup } from '../forsale/lookup.js';
import { config } from '../config.js';
import { InvalidOptionsError } from '../utils/errors.js';

/**
 * Input schema for check_for_sale.
 * Bounds are enforced by the lookup itself.
 */
export const checkForSaleSchema = z.object({
  domain: z
    .string()
    .max(512)
    .describe("The domain to check (e.g., 'example.com')."),
  enable_rdap_check: z
    .boolean()
    .optional()
    .describe('Also look for a "for sale" status in RDAP. Defaults to false.'),
  cache_ttl: z
    .number()
    .int()
    .optional()
    .describe('Seconds to reuse the result (0-86400). Defaults to 300.'),
  timeout: z
    .number()
    .optional()
    .describe('Seconds allowed for each network stage (0-60]. Defaults to 5.'),
});

export type CheckForSaleInput = z.infer<typeof checkForSaleSchema>;

/**
 * Tool definition for MCP.
 */
export const checkForSaleTool: Tool = {
  name: 'check_for_sale',
  description: `Check whether a domain is advertised for sale.

Looks up the TXT record at _for-sale.<domain> ("v=FORSALE1;" followed by a
JSON object). The record counts only when DNSSEC validates it and every field
passes validation. Unsigned zones are never trusted.

Returns:
- forSale, with price / url / contact / expires when the record confirmed it
- source: which channels confirmed the sale ("dns", "rdap")
- errors: everything that went wrong, in order

Example:
- check_for_sale("example.com") → for sale at USD:1000 via DNS`,
  inputSchema: {
    type: 'object',
    properties: {
      domain: {
        type: 'string',
        description: "The domain to check (e.g., 'example.com').",
      },
      enable_rdap_check: {
        type: 'boolean',
        description: 'Also look for a "for sale" status in RDAP. Defaults to false.',
      },
      cache_ttl: {
        type: 'integer',
        description: 'Seconds to reuse the result (0-86400). Defaults to 300.',
      },
      timeout: {
        type: 'number',
        description: 'Seconds allowed for each network stage (0-60]. Defaults to 5.',
      },
    },
    required: ['domain'],
  },
};

/**
 * Execute the check_for_sale tool.
 *
 * Options the caller leaves out come from `defaults` (environment).
 */
export async function executeCheckForSale(
  lookup: ForSaleLookup,
  input: unknown,
  signal?: AbortSignal,
  defaults: SaleOptions = config.defaults,
): Promise<SaleResponse> {
  const parsed = checkForSaleSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.errors.map((e) => `${e.path.join('.') || 'input'}: ${e.message}`),
    );
  }

  const { domain, enable_rdap_check, cache_ttl, timeout } = parsed.data;

  return lookup.getDomainSaleStatus(
    domain,
    {
      enableRdapCheck: enable_rdap_check ?? defaults.enableRdapCheck,
      cacheTTL: cache_ttl ?? defaults.cacheTTL,
      timeout: timeout ?? defaults.timeout,
    },
    { signal },
  );
}
