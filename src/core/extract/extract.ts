import { ParseError } from '../errors';
import { logger } from '../logger';
import { safeParseTimedRecord } from '../schema';
import type { RecordWarning, StrategyName, TimedRecord } from '../types';
import { DEFAULT_STRATEGIES } from './strategies';
import type { Candidate, ExtractionStrategy } from './strategies';

export type ExtractResult =
  | { success: true; records: TimedRecord[]; warnings: RecordWarning[]; strategy: StrategyName }
  | { success: false; error: ParseError; warnings: RecordWarning[] };

export const NO_RECORDS_MESSAGE = 'no valid records found';

export function validateCandidates(candidates: Candidate[]): {
  records: TimedRecord[];
  warnings: RecordWarning[];
} {
  const records: TimedRecord[] = [];
  const warnings: RecordWarning[] = [];

  for (const candidate of candidates) {
    const result = safeParseTimedRecord(candidate.value);
    if (result.success) {
      records.push(Object.freeze({ timestamp: result.data.timestamp, display: result.data.display }));
    } else {
      warnings.push({ source: candidate.source, reason: result.errors.join('; ') });
    }
  }

  return { records, warnings };
}

/**
 * Recover the records held in loosely-formed JSON text.
 *
 * Strategies run in order and the first one that yields at least one valid
 * record wins. Only the strict strategy may succeed with an empty sequence
 * (the text is literally an empty array).
 */
export function extractRecords(
  rawText: string,
  strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES,
): ExtractResult {
  if (!rawText.trim()) {
    return { success: false, error: new ParseError(NO_RECORDS_MESSAGE), warnings: [] };
  }

  // Warnings from strategies that never parsed, and from the first one that
  // parsed but rejected every candidate. The latter are the ones reported.
  const unparsed: RecordWarning[] = [];
  let rejected: RecordWarning[] | null = null;

  for (const strategy of strategies) {
    const outcome = strategy.attempt(rawText);
    if (!outcome.ok) {
      logger.debug('extract', `${strategy.name} failed`, { reason: outcome.reason });
      unparsed.push(...outcome.warnings);
      continue;
    }

    if (!outcome.candidates.length) {
      if (strategy.acceptsEmpty) {
        logger.debug('extract', `${strategy.name} produced an empty sequence`);
        return { success: true, records: [], warnings: outcome.warnings, strategy: strategy.name };
      }
      continue;
    }

    const { records, warnings } = validateCandidates(outcome.candidates);
    const allWarnings = [...outcome.warnings, ...warnings];
    if (records.length) {
      logger.debug('extract', `${strategy.name} succeeded`, {
        records: records.length,
        skipped: allWarnings.length,
      });
      return { success: true, records, warnings: allWarnings, strategy: strategy.name };
    }

    logger.debug('extract', `${strategy.name} found no valid records`, { candidates: outcome.candidates.length });
    if (rejected === null) rejected = allWarnings;
  }

  const reported = rejected ?? unparsed;
  logger.warn('extract', NO_RECORDS_MESSAGE, { skipped: reported.length });
  return { success: false, error: new ParseError(NO_RECORDS_MESSAGE, reported), warnings: reported };
}
