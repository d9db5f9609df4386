import { describe, it, expect } from 'vitest';
import {
  buildRenderConfig,
  DEFAULT_WIDTH,
  parseFormat,
  parseTrimOption,
  parseWidthOption,
  resolveTerminalWidth,
} from '../src/core/config';
import { UsageError } from '../src/core/errors';

describe('parseTrimOption', () => {
  it('accepts non-negative integers', () => {
    expect(parseTrimOption('5')).toBe(5);
    expect(parseTrimOption('0')).toBe(0);
  });

  it.each(['-1', 'abc', '1.5', '', '3x'])('rejects %j', (value) => {
    expect(() => parseTrimOption(value)).toThrow(UsageError);
  });

  it('names the option and value in the error', () => {
    expect(() => parseTrimOption('abc')).toThrow("--trim expects a non-negative integer, got 'abc'.");
  });
});

describe('parseWidthOption', () => {
  it('accepts positive integers', () => {
    expect(parseWidthOption('80')).toBe(80);
  });

  it('rejects zero', () => {
    expect(() => parseWidthOption('0')).toThrow(UsageError);
  });
});

describe('parseFormat', () => {
  it('defaults to text and ignores case', () => {
    expect(parseFormat()).toBe('text');
    expect(parseFormat('JSON')).toBe('json');
  });

  it('rejects unknown formats', () => {
    const attempt = () => parseFormat('xml');
    expect(attempt).toThrow(UsageError);
    expect(attempt).toThrow("--format expects 'text' or 'json', got 'xml'.");
  });

  it('uses the usage exit code', () => {
    expect(new UsageError('bad').exitCode).toBe(2);
  });
});

describe('resolveTerminalWidth', () => {
  it('prefers the terminal columns', () => {
    expect(resolveTerminalWidth({ columns: 80, env: { COLUMNS: '100' } })).toBe(80);
  });

  it('falls back to $COLUMNS', () => {
    expect(resolveTerminalWidth({ columns: 0, env: { COLUMNS: '100' } })).toBe(100);
  });

  it('falls back to the default width', () => {
    expect(resolveTerminalWidth({ env: { COLUMNS: 'wide' } })).toBe(DEFAULT_WIDTH);
    expect(resolveTerminalWidth({ env: {} })).toBe(120);
  });
});

describe('buildRenderConfig', () => {
  it('builds a frozen UTC config from the terminal', () => {
    const config = buildRenderConfig({ trim: '3' }, { columns: 90, env: {} });
    expect(config).toEqual({ width: 90, trimWords: 3, timeZone: 'utc' });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('lets --width and --local override the defaults', () => {
    const config = buildRenderConfig({ width: '60', local: true }, { columns: 90, env: {} });
    expect(config.width).toBe(60);
    expect(config.timeZone).toBe('local');
    expect(config.trimWords).toBeUndefined();
  });

  it('raises a usage error for an invalid trim value', () => {
    expect(() => buildRenderConfig({ trim: 'many' }, { env: {} })).toThrow(UsageError);
  });
});
