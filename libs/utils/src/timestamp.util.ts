function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Formats a date as `YYYYMMDD_HHMMSS` in UTC, the stamp used in upload keys.
 */
export function formatCompactTimestamp(date: Date): string {
  const day = [
    pad(date.getUTCFullYear(), 4),
    pad(date.getUTCMonth() + 1),
    pad(date.getUTCDate()),
  ].join('');
  const time = [
    pad(date.getUTCHours()),
    pad(date.getUTCMinutes()),
    pad(date.getUTCSeconds()),
  ].join('');

  return `${day}_${time}`;
}
