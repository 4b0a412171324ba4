/**
 * SQL helpers
 */

/**
 * Placeholder list for an IN clause: placeholders(3, 2) -> "$2, $3, $4".
 */
export function placeholders(count: number, startAt = 1): string {
  return Array.from({ length: count }, (_, index) => `$${startAt + index}`).join(', ');
}
