/**
 * Token separators: Unicode whitespace plus the C0 separators \x1c-\x1f and
 * NEL, but not the byte order mark.
 */
const WHITESPACE_REGEX = /(?:[^\S\ufeff]|[\x1c-\x1f\x85])+/;

/**
 * The leading whitespace-delimited token of a log line (the client IP).
 * Returns null if the line has no tokens at all.
 */
export function extractIdentifier(line: string): string | null {
  for (const token of line.split(WHITESPACE_REGEX)) {
    if (token) return token;
  }
  return null;
}

/**
 * Add one occurrence of `key` to a tally.
 */
export function incrementTally(tally: Map<string, number>, key: string): void {
  tally.set(key, (tally.get(key) ?? 0) + 1);
}

/**
 * Tally entries ordered by descending count.
 * Array#sort is stable, so equal counts keep first-encountered order.
 */
export function rankByCount(tally: Map<string, number>): [string, number][] {
  return [...tally.entries()].sort((a, b) => b[1] - a[1]);
}
