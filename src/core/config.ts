import { UsageError } from './errors';
import { safeParseRenderConfig } from './schema';
import type { OutputFormat, RenderConfig } from './types';

export const DEFAULT_WIDTH = 120;

export interface RenderOptions {
  trim?: string;
  width?: string;
  local?: boolean;
}

export interface TerminalInfo {
  columns?: number;
  env: NodeJS.ProcessEnv;
}

function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function parseTrimOption(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === null) {
    throw new UsageError(`--trim expects a non-negative integer, got '${value}'.`);
  }
  return parsed;
}

export function parseWidthOption(value: string): number {
  const parsed = parseInteger(value);
  if (parsed === null || parsed < 1) {
    throw new UsageError(`--width expects a positive integer, got '${value}'.`);
  }
  return parsed;
}

export function parseFormat(format?: string): OutputFormat {
  if (format === undefined) return 'text';
  const normalized = format.toLowerCase();
  if (normalized === 'text' || normalized === 'json') return normalized;
  throw new UsageError(`--format expects 'text' or 'json', got '${format}'.`);
}

/**
 * Stdout columns when attached to a terminal, then $COLUMNS, then the default.
 */
export function resolveTerminalWidth(terminal: TerminalInfo): number {
  if (terminal.columns !== undefined && Number.isInteger(terminal.columns) && terminal.columns >= 1) {
    return terminal.columns;
  }
  const fromEnv = terminal.env.COLUMNS === undefined ? null : parseInteger(terminal.env.COLUMNS);
  if (fromEnv !== null && fromEnv >= 1) {
    return fromEnv;
  }
  return DEFAULT_WIDTH;
}

export function buildRenderConfig(options: RenderOptions, terminal: TerminalInfo): RenderConfig {
  const raw = {
    width: options.width === undefined ? resolveTerminalWidth(terminal) : parseWidthOption(options.width),
    trimWords: options.trim === undefined ? undefined : parseTrimOption(options.trim),
    timeZone: options.local ? 'local' : 'utc',
  };

  const validation = safeParseRenderConfig(raw);
  if (!validation.success) {
    throw new UsageError(`Invalid render options:\n  ${validation.errors.join('\n  ')}`);
  }
  return Object.freeze(validation.data);
}
