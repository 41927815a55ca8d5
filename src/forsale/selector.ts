/**
 * Record selection: which TXT strings are `_for-sale` candidates.
 */

import type { CandidateRecord, RawAnswer } from '../types.js';
import { SchemaError } from '../utils/errors.js';

/** Exact, case-sensitive version tag every candidate starts with */
export const VERSION_TAG = 'v=FORSALE1;';

/** Maximum octets in one TXT string, version tag included */
export const MAX_RECORD_BYTES = 255;

/**
 * Filter an answer down to version-tagged records within the size limit,
 * keeping answer order. Choosing among them is the validator's job.
 *
 * Oversized tagged records are passed to `onReject`; TXT strings without
 * the tag belong to someone else and are skipped silently.
 */
export function selectRecords(
  answer: RawAnswer,
  onReject?: (error: SchemaError) => void,
): CandidateRecord[] {
  const candidates: CandidateRecord[] = [];

  for (const record of answer.records) {
    if (!record.text.startsWith(VERSION_TAG)) {
      continue;
    }

    const contentBytes = Buffer.byteLength(record.text, 'utf8');
    if (contentBytes > MAX_RECORD_BYTES) {
      onReject?.(
        new SchemaError(
          'size_exceeded',
          `record is ${contentBytes} bytes (max ${MAX_RECORD_BYTES})`,
        ),
      );
      continue;
    }

    candidates.push({
      versionTag: VERSION_TAG,
      content: record.text,
      contentBytes,
      sourceTTL: record.ttl,
    });
  }

  return candidates;
}
