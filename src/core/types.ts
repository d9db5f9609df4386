export type TimeZoneMode = 'utc' | 'local';

export interface TimedRecord {
  readonly timestamp: number;
  readonly display: string;
}

export type RecordSequence = readonly TimedRecord[];

/**
 * One rendered record. The first line carries the timestamp prefix, every
 * following line only the hanging indent.
 */
export type FormattedBlock = string[];

export interface RenderConfig {
  readonly width: number;
  readonly trimWords?: number;
  readonly timeZone: TimeZoneMode;
}

export type OutputFormat = 'text' | 'json';

/** A candidate that was dropped from the sequence without failing the run. */
export interface RecordWarning {
  source: string;
  reason: string;
}

export type StrategyName = 'strict' | 'bracket-wrap' | 'comma-repair' | 'ndjson' | 'object-scan';
