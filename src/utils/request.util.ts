/**
 * Request value helpers
 *
 * Route params and query values reach controllers as strings, or as
 * numbers once a Joi schema has converted them.
 */

export function toInt(value: unknown): number {
  return parseInt(String(value));
}

export function optionalInt(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const parsed = parseInt(String(value));
  return isNaN(parsed) ? undefined : parsed;
}

export function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}
