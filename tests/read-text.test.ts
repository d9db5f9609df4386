import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { readInputFile } from '../src/core/input/read_text';
import { FileError } from '../src/core/errors';

describe('readInputFile', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'recwrap-read-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('reads UTF-8 text', () => {
    const p = path.join(tmpDir, 'records.json');
    fs.writeFileSync(p, '[{"timestamp":1,"display":"héllo"}]', 'utf8');
    expect(readInputFile(p)).toBe('[{"timestamp":1,"display":"héllo"}]');
  });

  it('raises a FileError naming a missing file', () => {
    const p = path.join(tmpDir, 'missing.json');
    expect(() => readInputFile(p)).toThrow(FileError);
    expect(() => readInputFile(p)).toThrow(`'${p}' not found.`);
  });

  it('raises a FileError for a directory', () => {
    expect(() => readInputFile(tmpDir)).toThrow(`'${tmpDir}' is a directory.`);
  });
});
