import fc from 'fast-check';
import type { TimedRecord } from '../../src/core/types';

const WORD_CHARS = 'abcdefghijklmnopqrstuvwxyz0123456789,.:;[]{}"\\'.split('');

export function arbitraryWord(): fc.Arbitrary<string> {
  return fc.stringOf(fc.constantFrom(...WORD_CHARS), { minLength: 1, maxLength: 12 });
}

export function arbitraryDisplay(): fc.Arbitrary<string> {
  return fc.array(arbitraryWord(), { minLength: 0, maxLength: 30 }).map((words) => words.join(' '));
}

export function arbitraryTimestamp(): fc.Arbitrary<number> {
  // Up to ~2096; composed because fc.integer is limited to 32-bit bounds.
  return fc
    .tuple(fc.integer({ min: 0, max: 4_000_000 }), fc.integer({ min: 0, max: 999_999 }))
    .map(([high, low]) => high * 1_000_000 + low);
}

export function arbitraryRecord(): fc.Arbitrary<TimedRecord> {
  return fc.record({ timestamp: arbitraryTimestamp(), display: arbitraryDisplay() });
}

export function toJsonArray(records: readonly TimedRecord[]): string {
  return JSON.stringify(records, null, 2);
}

export function withoutOuterBrackets(text: string): string {
  const trimmed = text.trim();
  return trimmed.slice(1, -1);
}

/**
 * Serialize with a dangling comma after every object's last field and after
 * the last array element.
 */
export function withTrailingCommas(records: readonly TimedRecord[], commas = 1): string {
  const dangling = ','.repeat(commas);
  const body = records
    .map((record) => `{"timestamp":${record.timestamp},"display":${JSON.stringify(record.display)}${dangling}}`)
    .join(',\n');
  return `[\n${body}${dangling}\n]`;
}

export function toNdjson(records: readonly TimedRecord[]): string {
  return records.map((record) => JSON.stringify(record)).join('\n') + '\n';
}
