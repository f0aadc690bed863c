/**
 * Version normalizer
 *
 * Classifies a raw version string as wildcard, short or long and produces
 * its canonical form. The only textual rewrite is a leading "0" for inputs
 * such as ".5".
 */

import { ANY_VERSION, LONG_VERSION_REGEX, SHORT_VERSION_REGEX } from "#/constants";
import { MalformedVersionError } from "#/errors";
import type { MemoCache } from "#/cache";

export interface NormalizedVersion {
  // null means wildcard
  canonical: string | null;
  isShort: boolean;
}

const WILDCARD: NormalizedVersion = Object.freeze({ canonical: null, isShort: false });

/**
 * Apply the leading-dot fix-up.
 *
 * @example fixLeadingDot(".5") → "0.5"
 * @example fixLeadingDot("1.2") → "1.2"
 */
export function fixLeadingDot(input: string): string {
  return input.startsWith(".") ? `0${input}` : input;
}

function classify(input: string): NormalizedVersion {
  const fixed = fixLeadingDot(input);

  if (fixed === ANY_VERSION) {
    return WILDCARD;
  }
  if (SHORT_VERSION_REGEX.test(fixed)) {
    return { canonical: fixed, isShort: true };
  }
  if (LONG_VERSION_REGEX.test(fixed)) {
    return { canonical: fixed, isShort: false };
  }

  throw new MalformedVersionError(input);
}

/**
 * Normalize a raw version string.
 * null/undefined mean "unspecified" and normalize to the wildcard without touching the cache.
 * Throws MalformedVersionError for anything that is not a version.
 *
 * @example normalizeVersion(".5") → { canonical: "0.5", isShort: true }
 * @example normalizeVersion("any") → { canonical: null, isShort: false }
 */
export function normalizeVersion(
  input: string | null | undefined,
  cache?: MemoCache<string, NormalizedVersion>
): NormalizedVersion {
  if (input === null || input === undefined) {
    return WILDCARD;
  }

  const cached = cache?.get(input);
  if (cached) {
    return cached;
  }

  const normalized = classify(input);
  cache?.set(input, normalized);
  return normalized;
}

/**
 * Check if a string is a valid game version (short, long or "any").
 * Leading-dot inputs such as ".5" count as valid.
 */
export function isValidVersionString(input: string): boolean {
  const fixed = fixLeadingDot(input);
  return (
    fixed === ANY_VERSION || SHORT_VERSION_REGEX.test(fixed) || LONG_VERSION_REGEX.test(fixed)
  );
}
