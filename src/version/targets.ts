/**
 * Range matcher
 *
 * Decides whether a filter version (any, short or long) accepts a concrete
 * long release.
 */

import { IncomparableVersionsError } from "#/errors";
import { defaultVersionCaches, type VersionCaches } from "#/cache";
import { compareVersions } from "./comparator";
import type { GameVersion } from "./version";

/**
 * Check if `filter` targets `candidate`.
 * The candidate must be long; anything else throws IncomparableVersionsError.
 *
 * @example targets(parseVersion("0.25"), parseVersion("0.25.2")) → true
 * @example targets(parseVersion("0.25"), parseVersion("0.26.0")) → false
 * @example targets(parseVersion("1.2.3"), parseVersion("1.2.4")) → false
 */
export function targets(
  filter: GameVersion,
  candidate: GameVersion,
  caches: VersionCaches = defaultVersionCaches
): boolean {
  if (!candidate.isLong()) {
    throw new IncomparableVersionsError(filter.toString(), candidate.toString(), "targets");
  }

  if (filter.isAny()) {
    return true;
  }

  // A long filter names exactly one release
  if (filter.isLong()) {
    return compareVersions(filter, candidate, caches, "targets") === 0;
  }

  // Same major.minor is always a match, whatever the patch
  if (filter.short() === candidate.short()) {
    return true;
  }

  // Textually different prefix that may still be numerically equal (01.2 vs 1.2)

  const min = filter.toLongMin();
  const max = filter.toLongMax();
  return (
    compareVersions(candidate, min, caches, "targets") >= 0 &&
    compareVersions(candidate, max, caches, "targets") <= 0
  );
}

/**
 * Keep only the candidates that `filter` targets.
 */
export function filterTargeting(
  filter: GameVersion,
  candidates: GameVersion[],
  caches: VersionCaches = defaultVersionCaches
): GameVersion[] {
  return candidates.filter((candidate) => targets(filter, candidate, caches));
}
