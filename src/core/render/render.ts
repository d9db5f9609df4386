import type { FormattedBlock, RecordSequence, RenderConfig, TimedRecord } from '../types';
import { formatTimestamp } from './timestamp';
import { trimWords, wrapWords } from './wrap';

export const TIMESTAMP_SEPARATOR = '  ';
export const MIN_WRAP_COLUMNS = 20;

export function displayText(record: TimedRecord, config: RenderConfig): string {
  return config.trimWords === undefined ? record.display : trimWords(record.display, config.trimWords);
}

export function renderRecord(record: TimedRecord, config: RenderConfig): FormattedBlock {
  const prefix = formatTimestamp(record.timestamp, config.timeZone);
  const indentWidth = prefix.length + TIMESTAMP_SEPARATOR.length;
  const wrapWidth = Math.max(config.width - indentWidth, MIN_WRAP_COLUMNS);
  const lines = wrapWords(displayText(record, config), wrapWidth);

  if (!lines.length) return [prefix];

  const indent = ' '.repeat(indentWidth);
  return lines.map((line, index) => (index === 0 ? `${prefix}${TIMESTAMP_SEPARATOR}${line}` : `${indent}${line}`));
}

/**
 * Blocks separated by one blank line, terminated by a single newline.
 */
export function renderRecords(records: RecordSequence, config: RenderConfig): string {
  if (!records.length) return '';
  return records.map((record) => renderRecord(record, config).join('\n')).join('\n\n') + '\n';
}

export function renderRecordsJson(records: RecordSequence, config: RenderConfig): string {
  const payload = records.map((record) => ({
    timestamp: record.timestamp,
    time: formatTimestamp(record.timestamp, config.timeZone),
    display: displayText(record, config),
  }));
  return JSON.stringify(payload, null, 2) + '\n';
}
