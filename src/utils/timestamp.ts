/**
 * Timestamp helpers
 *
 * Local-timezone ISO strings for log lines and dated log directories.
 */

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * ISO 8601 timestamp with the local UTC offset
 * (e.g. 2026-10-19T12:34:56.789+02:00)
 */
export function getTimestampWithTimezone(date: Date = new Date()): string {
  const offset = -date.getTimezoneOffset();
  const sign = offset >= 0 ? "+" : "-";
  const offsetHours = pad(Math.floor(Math.abs(offset) / 60));
  const offsetMinutes = pad(Math.abs(offset) % 60);

  return (
    `${getDateStringWithDash(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:` +
    `${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}${sign}${offsetHours}:${offsetMinutes}`
  );
}

/**
 * YYYY-MM-DD in local time
 */
export function getDateStringWithDash(date: Date = new Date()): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}
