import type { RecordWarning } from './types';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export class RecwrapError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class UsageError extends RecwrapError {
  constructor(message: string) {
    super(message, EXIT_USAGE);
  }
}

export class FileError extends RecwrapError {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(message, EXIT_FAILURE);
    this.filePath = filePath;
  }
}

export class ParseError extends RecwrapError {
  readonly warnings: RecordWarning[];

  constructor(message: string, warnings: RecordWarning[] = []) {
    super(message, EXIT_FAILURE);
    this.warnings = warnings;
  }
}

export function formatWarning(warning: RecordWarning): string {
  return `Warning: skipped ${warning.source}: ${warning.reason}`;
}
