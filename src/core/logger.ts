/**
 * Debug tracing for the extraction and render pipeline.
 *
 * Set RECWRAP_DEBUG=1 to see which fallback strategy handled a file and the
 * resolved render settings, e.g.
 *
 *   recwrap:extract DEBUG comma-repair succeeded {"records":2,"skipped":0}
 *
 * Lines go to stderr so they never mix with rendered output.
 */

export type LogComponent = 'extract' | 'cli';

const ENABLED = !!process.env.RECWRAP_DEBUG;

function write(level: 'DEBUG' | 'WARN', component: LogComponent, message: string, extra?: Record<string, unknown>): void {
  if (!ENABLED) return;
  const detail = extra ? ` ${JSON.stringify(extra)}` : '';
  process.stderr.write(`recwrap:${component} ${level} ${message}${detail}\n`);
}

export const logger = {
  debug(component: LogComponent, message: string, extra?: Record<string, unknown>): void {
    write('DEBUG', component, message, extra);
  },
  warn(component: LogComponent, message: string, extra?: Record<string, unknown>): void {
    write('WARN', component, message, extra);
  },
};
