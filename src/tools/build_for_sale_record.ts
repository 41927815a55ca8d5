/**
 * build_for_sale_record Tool - compose a `_for-sale` TXT record.
 *
 * The counterpart of check_for_sale for domain owners: it produces the
 * record text to publish, already validated against the rules a lookup
 * applies.
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ForSaleRecord } from '../types.js';
import { buildForSaleRecord } from '../forsale/record.js';
import { InvalidOptionsError } from '../utils/errors.js';

export const buildForSaleRecordSchema = z.object({
  domain: z.string().max(512).describe("The domain being offered (e.g., 'example.com')."),
  price: z.string().optional().describe("Asking price as CUR:AMOUNT (e.g., 'USD:1000')."),
  url: z.string().optional().describe('https URL of the sale page.'),
  contact: z
    .string()
    .optional()
    .describe("mailto URI or bare email address (e.g., 'sales@example.com')."),
  expires: z.string().optional().describe('Last day of the offer, YYYY-MM-DD (UTC).'),
});

export type BuildForSaleRecordInput = z.infer<typeof buildForSaleRecordSchema>;

export const buildForSaleRecordTool: Tool = {
  name: 'build_for_sale_record',
  description: `Compose the TXT record that advertises a domain for sale.

Returns the owner name (_for-sale.<domain>) and the record value
("v=FORSALE1;" followed by a JSON object). Every field is optional and
checked exactly as check_for_sale would check it; a bare email address
in contact becomes a mailto: URI.

Example:
- build_for_sale_record("example.com", price="USD:1000")
  → _for-sale.example.com TXT "v=FORSALE1;{"price":"USD:1000"}"`,
  inputSchema: {
    type: 'object',
    properties: {
      domain: {
        type: 'string',
        description: "The domain being offered (e.g., 'example.com').",
      },
      price: {
        type: 'string',
        description: "Asking price as CUR:AMOUNT (e.g., 'USD:1000').",
      },
      url: {
        type: 'string',
        description: 'https URL of the sale page.',
      },
      contact: {
        type: 'string',
        description: "mailto URI or bare email address (e.g., 'sales@example.com').",
      },
      expires: {
        type: 'string',
        description: 'Last day of the offer, YYYY-MM-DD (UTC).',
      },
    },
    required: ['domain'],
  },
};

export function executeBuildForSaleRecord(input: unknown, now?: Date): ForSaleRecord {
  const parsed = buildForSaleRecordSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.errors.map((e) => `${e.path.join('.') || 'input'}: ${e.message}`),
      'domain is required; price, url, contact and expires must be strings.',
    );
  }

  const { domain, ...fields } = parsed.data;
  return buildForSaleRecord(domain, fields, now);
}
