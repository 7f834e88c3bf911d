/**
 * Canonical text for date, time and timestamp values, rendered in UTC
 */

const MILLIS_PER_SECOND = 1000;
const NANOS_PER_MILLI = 1_000_000;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function toUtcDate(epochMillis: number): Date {
  const date = new Date(epochMillis);
  if (Number.isNaN(date.getTime())) {
    throw new RangeError(`Epoch milliseconds out of range: ${epochMillis}`);
  }
  return date;
}

/** `yyyy-mm-dd` */
export function formatDate(epochMillis: number): string {
  const date = toUtcDate(epochMillis);
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

/** `hh:mm:ss` */
export function formatTime(epochMillis: number): string {
  const date = toUtcDate(epochMillis);
  return `${pad(date.getUTCHours(), 2)}:${pad(date.getUTCMinutes(), 2)}:${pad(date.getUTCSeconds(), 2)}`;
}

/**
 * `yyyy-mm-dd hh:mm:ss.f...`, with the fractional second trimmed of
 * trailing zeros but never empty
 */
export function formatTimestamp(epochMillis: number, nanos?: number): string {
  const fractionNanos =
    nanos ?? (((epochMillis % MILLIS_PER_SECOND) + MILLIS_PER_SECOND) % MILLIS_PER_SECOND) * NANOS_PER_MILLI;
  if (!Number.isInteger(fractionNanos) || fractionNanos < 0 || fractionNanos >= 1_000_000_000) {
    throw new RangeError(`Invalid nanosecond fraction: ${fractionNanos}`);
  }

  const fraction = fractionNanos === 0 ? '0' : pad(fractionNanos, 9).replace(/0+$/, '');
  return `${formatDate(epochMillis)} ${formatTime(epochMillis)}.${fraction}`;
}
