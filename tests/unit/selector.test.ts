/**
 * Unit Tests for Record Selection.
 */

import { selectRecords, VERSION_TAG, MAX_RECORD_BYTES } from '../../src/forsale/selector';
import type { RawAnswer } from '../../src/types';
import type { SchemaError } from '../../src/utils/errors';

function answer(...texts: string[]): RawAnswer {
  return {
    name: '_for-sale.example.com',
    records: texts.map((text, i) => ({ text, ttl: 300 + i })),
    dnssecAuthenticated: true,
  };
}

describe('selectRecords', () => {
  it('keeps tagged records in answer order', () => {
    const first = 'v=FORSALE1;{"price":"USD:1"}';
    const second = 'v=FORSALE1;{"price":"EUR:2"}';

    expect(selectRecords(answer(first, 'google-site-verification=abc', second))).toEqual([
      { versionTag: VERSION_TAG, content: first, contentBytes: first.length, sourceTTL: 300 },
      { versionTag: VERSION_TAG, content: second, contentBytes: second.length, sourceTTL: 302 },
    ]);
  });

  it('matches the version tag exactly and case-sensitively', () => {
    const onReject = jest.fn();
    const result = selectRecords(
      answer('v=forsale1;{}', 'V=FORSALE1;{}', ' v=FORSALE1;{}', 'v=FORSALE2;{}', 'v=FORSALE1{}'),
      onReject,
    );

    expect(result).toEqual([]);
    expect(onReject).not.toHaveBeenCalled();
  });

  it('accepts a record of exactly the maximum size', () => {
    const text = VERSION_TAG + 'x'.repeat(MAX_RECORD_BYTES - VERSION_TAG.length);
    expect(selectRecords(answer(text))).toHaveLength(1);
  });

  it('rejects oversized tagged records by octet length', () => {
    const rejections: SchemaError[] = [];
    // 'é' is two octets in UTF-8
    const text = VERSION_TAG + 'é'.repeat(123);

    const result = selectRecords(answer(text), (error) => rejections.push(error));

    expect(result).toEqual([]);
    expect(rejections).toHaveLength(1);
    expect(rejections[0].reason).toBe('size_exceeded');
    expect(rejections[0].userMessage).toBe(
      'A _for-sale record was rejected: record is 257 bytes (max 255)',
    );
  });

  it('returns nothing for an empty answer', () => {
    expect(selectRecords(answer())).toEqual([]);
  });
});
