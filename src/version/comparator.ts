/**
 * Comparator
 *
 * Total order over long versions. Components are compared numerically left
 * to right, so 1.2.10 sorts after 1.2.9.
 */

import { IncomparableVersionsError } from "#/errors";
import { defaultVersionCaches, type Ordering, type VersionCaches } from "#/cache";
import type { GameVersion } from "./version";

/**
 * Compare two numeric component sequences.
 * When one is a prefix of the other, the shorter one sorts first.
 *
 * @example compareComponents([1n, 2n, 9n], [1n, 2n, 10n]) → -1
 * @example compareComponents([1n, 2n, 3n], [1n, 2n, 3n, 0n]) → -1
 */
export function compareComponents(a: readonly bigint[], b: readonly bigint[]): Ordering {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? 0n;
    const right = b[i] ?? 0n;
    if (left !== right) {
      return left < right ? -1 : 1;
    }
  }
  if (a.length === b.length) return 0;
  return a.length < b.length ? -1 : 1;
}

/**
 * Compare two long versions.
 * Returns -1 if a < b, 0 if equal, 1 if a > b.
 * Throws IncomparableVersionsError if either operand is short or the wildcard.
 *
 * Results are memoized by (a, b) in the order given; (b, a) is a separate entry.
 */
export function compareVersions(
  a: GameVersion,
  b: GameVersion,
  caches: VersionCaches = defaultVersionCaches,
  operation = "compare"
): Ordering {
  const left = a.version;
  const right = b.version;
  if (left === null || right === null || a.isShort() || b.isShort()) {
    throw new IncomparableVersionsError(a.toString(), b.toString(), operation);
  }

  const cached = caches.comparison.get(left, right);
  if (cached !== undefined) {
    return cached;
  }

  const result = compareComponents(a.components(), b.components());
  caches.comparison.set(left, right, result);
  return result;
}

/**
 * Sort versions in descending order (highest first).
 * Short and wildcard versions are filtered out.
 * Each comparison goes through the caches its values were parsed with.
 */
export function sortVersionsDesc(versions: GameVersion[]): GameVersion[] {
  const long = versions.filter((v) => v.isLong());
  return long.sort((a, b) => b.compareTo(a));
}

/**
 * Get the highest long version from a list.
 * Returns null if the list has no long versions.
 */
export function getHighestVersion(versions: GameVersion[]): GameVersion | null {
  const sorted = sortVersionsDesc(versions);
  return sorted[0] ?? null;
}
