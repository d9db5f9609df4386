#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { runCli } from './program';

function readVersion(): string {
  const packageJsonPath = path.resolve(__dirname, '..', '..', 'package.json');
  if (!fs.existsSync(packageJsonPath)) return '0.0.0';
  const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (parsed && typeof parsed === 'object' && 'version' in parsed && typeof parsed.version === 'string') {
    return parsed.version;
  }
  return '0.0.0';
}

runCli(
  process.argv.slice(2),
  {
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
    columns: process.stdout.isTTY ? process.stdout.columns : undefined,
    env: process.env,
    exit: (code) => {
      process.exitCode = code;
    },
  },
  readVersion(),
);
