import bytesLib from 'bytes';

/**
 * Format a byte count as a human-readable string, base 1024, two decimals.
 * Anything at or past 1024 TB is shown in PB.
 */
export function formatBytes(value: number): string {
  return (
    bytesLib.format(value, { unitSeparator: ' ', decimalPlaces: 2, fixedDecimals: true }) ??
    '0.00 B'
  );
}

/**
 * Format a duration in seconds as e.g. "2d 3h 4m 5s".
 * Zero-valued units are dropped, but the result is never empty.
 */
export function formatDuration(seconds: number): string {
  let remainder = Math.trunc(seconds);
  const days = Math.floor(remainder / 86_400);
  remainder %= 86_400;
  const hours = Math.floor(remainder / 3_600);
  remainder %= 3_600;
  const minutes = Math.floor(remainder / 60);
  const secs = remainder % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (hours > 0) parts.push(`${hours}h`);
  if (minutes > 0) parts.push(`${minutes}m`);
  if (secs > 0 || parts.length === 0) parts.push(`${secs}s`);

  return parts.join(' ');
}

/**
 * Count the non-empty lines of a newline-delimited listing.
 */
export function countLines(value: string): number {
  return value
    .trim()
    .split('\n')
    .filter((line) => line.length > 0).length;
}
