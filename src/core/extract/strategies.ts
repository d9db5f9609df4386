import type { RecordWarning, StrategyName } from '../types';

export interface Candidate {
  source: string;
  value: unknown;
}

export type StrategyOutcome =
  | { ok: true; candidates: Candidate[]; warnings: RecordWarning[] }
  | { ok: false; reason: string; warnings: RecordWarning[] };

export interface ExtractionStrategy {
  name: StrategyName;
  /** Whether a successful parse with zero candidates ends extraction. */
  acceptsEmpty: boolean;
  attempt(text: string): StrategyOutcome;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function describeJsonType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

type JsonParse = { ok: true; value: unknown } | { ok: false; error: string };

function tryParseJson(text: string): JsonParse {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return { ok: false, error: errorMessage(err) };
  }
}

function failed(reason: string, warnings: RecordWarning[] = []): StrategyOutcome {
  return { ok: false, reason, warnings };
}

function isBracketed(trimmed: string): boolean {
  return trimmed.startsWith('[') && trimmed.endsWith(']');
}

function wrapInBrackets(trimmed: string): string {
  return `[\n${trimmed}\n]`;
}

/**
 * Parse text as one JSON value: an array yields its elements, an object
 * yields itself. Anything else is a failure.
 */
export function parseCollection(text: string): StrategyOutcome {
  const result = tryParseJson(text);
  if (!result.ok) {
    return failed(`invalid JSON: ${result.error}`);
  }
  const parsed = result.value;
  if (Array.isArray(parsed)) {
    const elements: unknown[] = parsed;
    return {
      ok: true,
      candidates: elements.map((value, index) => ({ source: `element ${index + 1}`, value })),
      warnings: [],
    };
  }
  if (isPlainObject(parsed)) {
    return { ok: true, candidates: [{ source: 'element 1', value: parsed }], warnings: [] };
  }
  return failed(`expected an array or object, got ${describeJsonType(parsed)}`);
}

/**
 * Drop every comma that is followed, ignoring whitespace and further commas,
 * by a closing `]` or `}`. Commas inside string literals are left alone.
 */
export function removeTrailingCommas(text: string): string {
  let out = '';
  let inString = false;
  let escaped = false;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      out += ch;
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
      out += ch;
      continue;
    }
    if (ch === ',') {
      let j = i + 1;
      while (j < text.length && (text[j] === ',' || /\s/.test(text[j]))) j += 1;
      if (text[j] === ']' || text[j] === '}') continue;
    }
    out += ch;
  }

  return out;
}

/**
 * Match every brace that sits outside a string literal when scanning from
 * `start`. Each opening offset maps to its closing offset, or -1 when the
 * object never closes. A brace seen outside a string here is in the same
 * state as a fresh scan starting at it, so one pass answers for all of them.
 */
export function matchBraces(text: string, start: number): Map<number, number> {
  const matches = new Map<number, number>();
  const open: number[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
    } else if (ch === '{') {
      open.push(i);
      matches.set(i, -1);
    } else if (ch === '}') {
      const opened = open.pop();
      if (opened !== undefined) matches.set(opened, i);
    }
  }

  return matches;
}

export const strictStrategy: ExtractionStrategy = {
  name: 'strict',
  acceptsEmpty: true,
  attempt: (text) => parseCollection(text),
};

export const bracketWrapStrategy: ExtractionStrategy = {
  name: 'bracket-wrap',
  acceptsEmpty: false,
  attempt(text) {
    const trimmed = text.trim();
    if (isBracketed(trimmed)) {
      return failed('text is already bracketed');
    }
    return parseCollection(wrapInBrackets(trimmed));
  },
};

export const commaRepairStrategy: ExtractionStrategy = {
  name: 'comma-repair',
  acceptsEmpty: false,
  attempt(text) {
    const direct = parseCollection(removeTrailingCommas(text));
    if (direct.ok) return direct;

    const trimmed = text.trim();
    if (isBracketed(trimmed)) return direct;
    return parseCollection(removeTrailingCommas(wrapInBrackets(trimmed)));
  },
};

export const ndjsonStrategy: ExtractionStrategy = {
  name: 'ndjson',
  acceptsEmpty: false,
  attempt(text) {
    const lines = text.split(/\r?\n/);
    const candidates: Candidate[] = [];
    const warnings: RecordWarning[] = [];

    for (let i = 0; i < lines.length; i += 1) {
      let line = lines[i].trim();
      if (!line) continue;
      if (line.endsWith(',')) line = line.slice(0, -1).trimEnd();

      const source = `line ${i + 1}`;
      const parsed = tryParseJson(line);
      if (!parsed.ok) {
        warnings.push({ source, reason: `invalid JSON: ${parsed.error}` });
        continue;
      }
      if (!isPlainObject(parsed.value)) {
        warnings.push({ source, reason: `expected an object, got ${describeJsonType(parsed.value)}` });
        continue;
      }
      candidates.push({ source, value: parsed.value });
    }

    if (!candidates.length) {
      return failed('no line parsed as a JSON object', warnings);
    }
    return { ok: true, candidates, warnings };
  },
};

export const objectScanStrategy: ExtractionStrategy = {
  name: 'object-scan',
  acceptsEmpty: false,
  attempt(text) {
    const candidates: Candidate[] = [];
    let matches = new Map<number, number>();
    let pos = text.indexOf('{');

    while (pos !== -1) {
      let end = matches.get(pos);
      if (end === undefined) {
        // only braces that sat inside a string during the last pass rescan
        matches = matchBraces(text, pos);
        end = matches.get(pos) ?? -1;
      }
      let next = pos + 1;
      if (end !== -1) {
        const parsed = tryParseJson(text.slice(pos, end + 1));
        if (parsed.ok && isPlainObject(parsed.value)) {
          candidates.push({ source: `object at offset ${pos}`, value: parsed.value });
          next = end + 1;
        }
      }
      pos = text.indexOf('{', next);
    }

    if (!candidates.length) {
      return failed('no balanced JSON object found');
    }
    return { ok: true, candidates, warnings: [] };
  },
};

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [
  strictStrategy,
  bracketWrapStrategy,
  commaRepairStrategy,
  ndjsonStrategy,
  objectScanStrategy,
];
