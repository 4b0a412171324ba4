/**
 * Date Utility
 *
 * Timestamps leave the API as ISO 8601 UTC strings (YYYY-MM-DDTHH:mm:ss.sssZ).
 * PostgreSQL returns TIMESTAMPTZ columns as Date objects; convert them at
 * read time with toISOTimestamp().
 */

/**
 * Parse any date-like value to a Date object.
 * Returns null if the value is not a valid date.
 */
export function parseDate(value: Date | string | number | null | undefined): Date | null {
  if (!value) return null;
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? null : value;
  }
  const d = new Date(value);
  return isNaN(d.getTime()) ? null : d;
}

/**
 * Get an ISO 8601 timestamp string (UTC). Missing or unparseable values
 * yield the current time.
 */
export function toISOTimestamp(value?: Date | string | number | null): string {
  if (!value) return new Date().toISOString();
  const d = parseDate(value);
  return d ? d.toISOString() : new Date().toISOString();
}
