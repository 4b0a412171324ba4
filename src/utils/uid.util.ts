/**
 * Human-readable identifiers of the form `<Prefix>_<n>`.
 */

/**
 * Smallest n >= 1 such that `<prefix>_<n>` is not in `existing`.
 * Values that do not match the pattern are ignored.
 */
export function nextSequentialUid(prefix: string, existing: Iterable<string | null>): string {
  const used = new Set<number>();
  const pattern = new RegExp(`^${prefix}_(\\d+)$`);

  for (const uid of existing) {
    const match = uid ? pattern.exec(uid) : null;
    if (match) {
      used.add(parseInt(match[1]));
    }
  }

  let n = 1;
  while (used.has(n)) {
    n += 1;
  }
  return `${prefix}_${n}`;
}
