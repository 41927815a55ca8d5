import type { Config, ForSaleRecord, SaleResponse } from '../types.js';

type OutputFormat = Config['outputFormat'];

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * Escape text for HTML element content and quoted attribute values.
 */
export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function renderTable(headers: string[], rows: string[][]): string {
  const headerRow = `| ${headers.join(' | ')} |`;
  const separator = `| ${headers.map(() => '---').join(' | ')} |`;
  const body = rows.map((row) => `| ${row.join(' | ')} |`).join('\n');
  return [headerRow, separator, body].filter(Boolean).join('\n');
}

function saleRows(result: SaleResponse): string[][] {
  const rows = [
    ['Domain', result.domain],
    ['For sale', result.forSale ? 'Yes' : 'No'],
  ];
  if (result.price !== undefined) rows.push(['Price', result.price]);
  if (result.url !== undefined) rows.push(['URL', result.url]);
  if (result.contact !== undefined) rows.push(['Contact', result.contact]);
  if (result.expires !== undefined) rows.push(['Expires', result.expires]);
  rows.push(['Source', result.source.length > 0 ? result.source.join(', ') : '-']);
  if (result.checkedAt !== undefined) rows.push(['Checked', result.checkedAt]);
  return rows;
}

/**
 * Markdown table plus one line per reported error.
 */
export function formatSaleText(result: SaleResponse): string {
  const sections = [renderTable(['Field', 'Value'], saleRows(result))];

  if (result.details.length > 0) {
    const lines = result.details.map((detail) =>
      detail.reason
        ? `- ${detail.kind} (${detail.reason}): ${detail.message}`
        : `- ${detail.kind}: ${detail.message}`,
    );
    sections.push(`\nErrors:\n${lines.join('\n')}`);
  }

  return sections.join('\n');
}

export function formatSaleJson(result: SaleResponse): string {
  return JSON.stringify(result, null, 2);
}

/**
 * HTML fragment for a result. Every value is escaped; `href`s are only
 * emitted for url/contact, which the validator restricted to https/mailto.
 */
export function formatSaleHtml(result: SaleResponse): string {
  const rows: string[] = [];
  const row = (label: string, value: string) =>
    rows.push(`<tr><th>${escapeHtml(label)}</th><td>${value}</td></tr>`);
  const link = (href: string) =>
    `<a href="${escapeHtml(href)}" rel="nofollow noopener noreferrer">${escapeHtml(href)}</a>`;

  row('Domain', escapeHtml(result.domain));
  row('For sale', result.forSale ? 'Yes' : 'No');
  if (result.price !== undefined) row('Price', escapeHtml(result.price));
  if (result.url !== undefined) row('URL', link(result.url));
  if (result.contact !== undefined) row('Contact', link(result.contact));
  if (result.expires !== undefined) row('Expires', escapeHtml(result.expires));
  if (result.source.length > 0) row('Source', escapeHtml(result.source.join(', ')));

  const parts = [
    '<section class="for-sale-result">',
    `<table>${rows.join('')}</table>`,
  ];

  if (result.details.length > 0) {
    const items = result.details.map(
      (detail) =>
        `<li><code>${escapeHtml(detail.kind)}</code> ${escapeHtml(detail.message)}</li>`,
    );
    parts.push(`<ul class="errors">${items.join('')}</ul>`);
  }

  parts.push('</section>');
  return parts.join('\n');
}

export function formatToolResult(result: SaleResponse, format: OutputFormat): string {
  if (format === 'json') {
    return formatSaleJson(result);
  }

  const text = formatSaleText(result);

  if (format === 'both') {
    return `${text}\n\n\`\`\`json\n${formatSaleJson(result)}\n\`\`\``;
  }

  return text;
}

/**
 * Zone-file line for a record: owner name, class, type, quoted value.
 */
export function formatZoneLine(record: ForSaleRecord): string {
  const quoted = record.value.replace(/["\\]/g, '\\$&');
  return `${record.name}. IN TXT "${quoted}"`;
}

export function formatRecordResult(record: ForSaleRecord, format: OutputFormat): string {
  const json = JSON.stringify(record, null, 2);
  if (format === 'json') {
    return json;
  }

  const text = [
    renderTable(
      ['Field', 'Value'],
      [
        ['Name', record.name],
        ['Type', record.type],
        ['Value', record.value],
        ['Bytes', String(record.bytes)],
      ],
    ),
    '',
    'Zone file:',
    formatZoneLine(record),
  ].join('\n');

  return format === 'both' ? `${text}\n\n\`\`\`json\n${json}\n\`\`\`` : text;
}

export function formatToolError(
  error: { code?: string; userMessage?: string; retryable?: boolean; suggestedAction?: string },
  format: OutputFormat,
): string {
  const payload = {
    error: true,
    code: error.code || 'unknown',
    message: error.userMessage || 'Unknown error',
    retryable: error.retryable ?? false,
    suggestedAction: error.suggestedAction,
  };

  if (format === 'json' || format === 'both') {
    const json = JSON.stringify(payload, null, 2);
    return format === 'both'
      ? `Error:\n${payload.message}\n\n\`\`\`json\n${json}\n\`\`\``
      : json;
  }

  const lines = [
    `Error: ${payload.message}`,
    `Code: ${payload.code}`,
    `Retryable: ${payload.retryable ? 'yes' : 'no'}`,
  ];
  if (payload.suggestedAction) {
    lines.push(`Suggested action: ${payload.suggestedAction}`);
  }
  return lines.join('\n');
}
