import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { buildRenderConfig, parseFormat } from '../core/config';
import type { RenderOptions } from '../core/config';
import { EXIT_OK, EXIT_USAGE, formatWarning, RecwrapError } from '../core/errors';
import { extractRecords } from '../core/extract/extract';
import { readInputFile } from '../core/input/read_text';
import { logger } from '../core/logger';
import { renderRecords, renderRecordsJson } from '../core/render/render';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Stdout width when it is a terminal. */
  columns?: number;
  env: NodeJS.ProcessEnv;
  exit(code: number): void;
}

export interface FormatOptions extends RenderOptions {
  format?: string;
}

/**
 * Read, extract and render one file. Nothing reaches stdout unless every
 * step succeeded.
 */
export function runFormat(file: string, options: FormatOptions, io: CliIO): number {
  try {
    const format = parseFormat(options.format);
    const config = buildRenderConfig(options, { columns: io.columns, env: io.env });
    logger.debug('cli', 'resolved render config', { format, ...config });
    const result = extractRecords(readInputFile(file));
    for (const warning of result.warnings) {
      io.stderr(chalk.yellow(formatWarning(warning)) + '\n');
    }
    if (!result.success) {
      throw result.error;
    }

    const output = format === 'json' ? renderRecordsJson(result.records, config) : renderRecords(result.records, config);
    if (output) {
      io.stdout(output);
    }
    return EXIT_OK;
  } catch (err) {
    if (err instanceof RecwrapError) {
      io.stderr(chalk.red(`Error: ${err.message}`) + '\n');
      return err.exitCode;
    }
    throw err;
  }
}

export function createProgram(io: CliIO, version: string): Command {
  const program = new Command();

  program
    .name('recwrap')
    .description('Display JSON records with millisecond timestamps as wrapped, aligned text.')
    .version(version)
    .argument('<file>', 'JSON records file to read')
    .option('--trim <n>', 'Truncate display text to N words, appending "..." if trimmed')
    .option('--width <n>', 'Wrap to N columns instead of the terminal width')
    .option('--local', 'Render timestamps in the local time zone instead of UTC')
    .option('--format <format>', 'Output format: text|json', 'text')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
      outputError: (text, write) => write(chalk.red(text)),
    })
    .action((file: string, options: FormatOptions) => {
      io.exit(runFormat(file, options, io));
    });

  return program;
}

/**
 * Parse user arguments (without the node and script entries) and run.
 * Commander's own parse errors exit with the usage code.
 */
export function runCli(argv: string[], io: CliIO, version: string): void {
  const program = createProgram(io, version);
  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      io.exit(err.exitCode === 0 ? EXIT_OK : EXIT_USAGE);
      return;
    }
    throw err;
  }
}
