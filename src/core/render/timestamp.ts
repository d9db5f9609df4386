import type { TimeZoneMode } from '../types';

function pad(value: number, length: number): string {
  return String(value).padStart(length, '0');
}

/**
 * Format epoch milliseconds as `YYYY-MM-DD HH:MM:SS.mmm` on a 24-hour clock.
 */
export function formatTimestamp(ms: number, timeZone: TimeZoneMode = 'utc'): string {
  const date = new Date(ms);
  const utc = timeZone === 'utc';

  const year = utc ? date.getUTCFullYear() : date.getFullYear();
  const month = (utc ? date.getUTCMonth() : date.getMonth()) + 1;
  const day = utc ? date.getUTCDate() : date.getDate();
  const hours = utc ? date.getUTCHours() : date.getHours();
  const minutes = utc ? date.getUTCMinutes() : date.getMinutes();
  const seconds = utc ? date.getUTCSeconds() : date.getSeconds();
  const millis = utc ? date.getUTCMilliseconds() : date.getMilliseconds();

  return (
    `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)} ` +
    `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`
  );
}
