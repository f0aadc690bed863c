/**
 * Game version value
 *
 * Immutable version identifier in one of three shapes:
 * - wildcard ("any"): targets every release, has no order
 * - short (x.y): a family of releases, widened with toLongMin/toLongMax
 * - long (x.y.z[...]): a concrete release, totally ordered
 */

import { ANY_VERSION, LONG_MAX_PATCH, LONG_MIN_PATCH } from "#/constants";
import { captureVersionResult, type VersionResult } from "#/errors";
import { defaultVersionCaches, type Ordering, type VersionCaches } from "#/cache";
import { normalizeVersion } from "#/normalizer";
import { compareVersions } from "./comparator";
import { targets } from "./targets";

export class GameVersion {
  private parsedComponents: readonly bigint[] | undefined;

  private constructor(
    // Canonical form, null for the wildcard
    readonly version: string | null,
    private readonly shortForm: boolean,
    private readonly caches: VersionCaches
  ) {}

  /**
   * Parse a raw version string. null/undefined yield the wildcard.
   * Throws MalformedVersionError for invalid input.
   * Returns the same instance for every input with the same canonical form.
   *
   * @example GameVersion.parse(".5").toString() → "0.5"
   * @example GameVersion.parse("any").isAny() → true
   */
  static parse(
    input: string | null | undefined,
    caches: VersionCaches = defaultVersionCaches
  ): GameVersion {
    const { canonical, isShort } = normalizeVersion(input, caches.normalization);
    return GameVersion.intern(canonical, canonical !== null && isShort, caches);
  }

  static any(caches: VersionCaches = defaultVersionCaches): GameVersion {
    return GameVersion.intern(null, false, caches);
  }

  private static intern(
    canonical: string | null,
    isShort: boolean,
    caches: VersionCaches
  ): GameVersion {
    const key = canonical ?? ANY_VERSION;
    const existing = caches.values.get(key);
    if (existing) {
      return existing;
    }
    const created = new GameVersion(canonical, isShort, caches);
    caches.values.set(key, created);
    return created;
  }

  isAny(): boolean {
    return this.version === null;
  }

  isNotAny(): boolean {
    return !this.isAny();
  }

  isShort(): boolean {
    return this.shortForm;
  }

  isLong(): boolean {
    return this.version !== null && !this.shortForm;
  }

  /**
   * Numeric components, parsed on first use.
   * bigint keeps components beyond 2^53 exact.
   */
  components(): readonly bigint[] {
    if (this.version === null) {
      throw new Error("The wildcard version has no components");
    }
    if (!this.parsedComponents) {
      this.parsedComponents = Object.freeze(this.version.split(".").map((part) => BigInt(part)));
    }
    return this.parsedComponents;
  }

  /**
   * Smallest long release a short version covers (x.y → x.y.0).
   * Long and wildcard versions return themselves; always use the return value.
   */
  toLongMin(): GameVersion {
    return this.widen(LONG_MIN_PATCH);
  }

  /**
   * Largest long release a short version covers (x.y → x.y.99).
   * Long and wildcard versions return themselves; always use the return value.
   */
  toLongMax(): GameVersion {
    return this.widen(LONG_MAX_PATCH);
  }

  private widen(patch: number): GameVersion {
    if (!this.shortForm || this.version === null) {
      return this;
    }
    return GameVersion.parse(`${this.version}.${patch}`, this.caches);
  }

  /**
   * The major.minor prefix.
   * Must not be called on the wildcard; check isAny() first.
   *
   * @example GameVersion.parse("0.25.2").short() → "0.25"
   */
  short(): string {
    if (this.version === null) {
      throw new Error("The wildcard version has no short form");
    }
    if (this.shortForm) {
      return this.version;
    }
    const [major, minor] = this.version.split(".");
    return `${major}.${minor}`;
  }

  compareTo(other: GameVersion): Ordering {
    return compareVersions(this, other, this.caches);
  }

  lessThan(other: GameVersion): boolean {
    return compareVersions(this, other, this.caches, "lessThan") < 0;
  }

  lessThanOrEqual(other: GameVersion): boolean {
    return compareVersions(this, other, this.caches, "lessThanOrEqual") <= 0;
  }

  greaterThan(other: GameVersion): boolean {
    return compareVersions(this, other, this.caches, "greaterThan") > 0;
  }

  greaterThanOrEqual(other: GameVersion): boolean {
    return compareVersions(this, other, this.caches, "greaterThanOrEqual") >= 0;
  }

  /**
   * Check if this version accepts the long release `candidate`.
   */
  targets(candidate: GameVersion): boolean {
    return targets(this, candidate, this.caches);
  }

  /**
   * Equality on the canonical string only. All wildcards are equal.
   */
  equals(other: GameVersion): boolean {
    return this.version === other.version;
  }

  /**
   * Stable key for Maps and Sets, consistent with equals().
   */
  hashKey(): string {
    return this.version ?? ANY_VERSION;
  }

  toString(): string {
    return this.version ?? ANY_VERSION;
  }

  /**
   * Serialized form: the canonical string, or null for the wildcard.
   */
  toJSON(): string | null {
    return this.version;
  }
}

/**
 * Parse a version using the process-wide caches.
 */
export function parseVersion(input: string | null | undefined): GameVersion {
  return GameVersion.parse(input);
}

/**
 * Parse a version without throwing.
 *
 * @example
 * ```ts
 * const result = safeParseVersion(raw);
 * if (!result.success) {
 *   console.error(result.error.message);
 *   return;
 * }
 * const version = result.data;
 * ```
 */
export function safeParseVersion(
  input: string | null | undefined,
  caches: VersionCaches = defaultVersionCaches
): VersionResult<GameVersion> {
  return captureVersionResult(() => GameVersion.parse(input, caches));
}

/**
 * Compare two versions without throwing.
 */
export function safeCompareVersions(a: GameVersion, b: GameVersion): VersionResult<Ordering> {
  return captureVersionResult(() => a.compareTo(b));
}
