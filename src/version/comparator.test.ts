import { describe, test, expect } from "vitest";
import { compareComponents, compareVersions, sortVersionsDesc, getHighestVersion } from "./comparator";
import { GameVersion, parseVersion } from "./version";
import { IncomparableVersionsError } from "#/errors";
import { createVersionCaches } from "#/cache";

describe("comparator", () => {
  describe("compareComponents", () => {
    test("first differing component decides", () => {
      expect(compareComponents([1n, 2n, 9n], [1n, 2n, 10n])).toBe(-1);
      expect(compareComponents([2n, 0n, 0n], [1n, 9n, 9n])).toBe(1);
      expect(compareComponents([1n, 2n, 3n], [1n, 2n, 3n])).toBe(0);
    });

    test("shorter prefix sorts first", () => {
      expect(compareComponents([1n, 2n, 3n], [1n, 2n, 3n, 0n])).toBe(-1);
      expect(compareComponents([1n, 2n, 3n, 0n], [1n, 2n, 3n])).toBe(1);
    });
  });

  describe("compareVersions", () => {
    test("returns -1, 0 or 1", () => {
      expect(compareVersions(parseVersion("1.0.0"), parseVersion("2.0.0"))).toBe(-1);
      expect(compareVersions(parseVersion("2.5.3"), parseVersion("2.5.3"))).toBe(0);
      expect(compareVersions(parseVersion("1.10.0"), parseVersion("1.9.0"))).toBe(1);
    });

    test("treats leading zeros numerically", () => {
      expect(compareVersions(parseVersion("1.2.03"), parseVersion("1.2.3"))).toBe(0);
    });

    test("orders components beyond 2^53 exactly", () => {
      const below = parseVersion("1.2.99999999999999999999");
      const above = parseVersion("1.2.100000000000000000000");
      expect(compareVersions(below, above)).toBe(-1);
      expect(below.lessThan(above)).toBe(true);

      const odd = parseVersion("1.2.9007199254740993");
      const even = parseVersion("1.2.9007199254740992");
      expect(compareVersions(odd, even)).toBe(1);
      expect(odd.greaterThan(even)).toBe(true);
      expect(odd.equals(even)).toBe(false);
    });

    test("rejects short and wildcard operands", () => {
      const long = parseVersion("1.2.3");
      expect(() => compareVersions(parseVersion("1.2"), long)).toThrow(IncomparableVersionsError);
      expect(() => compareVersions(long, parseVersion("1.2"))).toThrow(IncomparableVersionsError);
      expect(() => compareVersions(long, parseVersion("any"))).toThrow(IncomparableVersionsError);
      expect(() => compareVersions(parseVersion("1.2"), parseVersion("1.3"))).toThrow(
        "1.2 and 1.3 cannot be compared by compare"
      );
    });

    test("does not cache refused comparisons", () => {
      const caches = createVersionCaches();
      expect(() =>
        compareVersions(parseVersion("1.2"), parseVersion("1.2.3"), caches)
      ).toThrow(IncomparableVersionsError);
      expect(caches.comparison.size).toBe(0);
    });

    test("cached result matches a fresh computation", () => {
      const caches = createVersionCaches();
      const a = parseVersion("3.1.4");
      const b = parseVersion("3.1.15");

      const first = compareVersions(a, b, caches);
      const second = compareVersions(a, b, caches);

      expect(second).toBe(first);
      expect(second).toBe(compareVersions(a, b, createVersionCaches()));
    });
  });

  describe("sortVersionsDesc", () => {
    test("sorts long versions highest first", () => {
      const versions = ["1.0.0", "10.0.0", "2.0.0", "1.2.10", "1.2.9"].map(parseVersion);
      expect(sortVersionsDesc(versions).map(String)).toEqual([
        "10.0.0",
        "2.0.0",
        "1.2.10",
        "1.2.9",
        "1.0.0",
      ]);
    });

    test("compares through the caches the values were parsed with", () => {
      const caches = createVersionCaches();
      const versions = ["7.7.1", "7.7.2"].map((raw) => GameVersion.parse(raw, caches));

      expect(sortVersionsDesc(versions).map(String)).toEqual(["7.7.2", "7.7.1"]);
      expect(caches.comparison.size).toBe(1);
    });

    test("filters out short and wildcard versions", () => {
      const versions = ["1.0.0", "1.5", "any", "2.0.0"].map(parseVersion);
      expect(sortVersionsDesc(versions).map(String)).toEqual(["2.0.0", "1.0.0"]);
    });

    test("returns empty array for empty input", () => {
      expect(sortVersionsDesc([])).toEqual([]);
    });
  });

  describe("getHighestVersion", () => {
    test("returns highest long version", () => {
      const highest = getHighestVersion(["0.25.2", "0.90.0", "0.24.9"].map(parseVersion));
      expect(highest?.toString()).toBe("0.90.0");
    });

    test("returns null when there is no long version", () => {
      expect(getHighestVersion([])).toBeNull();
      expect(getHighestVersion(["1.2", "any"].map(parseVersion))).toBeNull();
    });

    test("fills the owned comparison cache", () => {
      const caches = createVersionCaches();
      const versions = ["3.0.1", "3.0.10"].map((raw) => GameVersion.parse(raw, caches));

      expect(getHighestVersion(versions)?.toString()).toBe("3.0.10");
      expect(caches.comparison.size).toBe(1);
    });
  });
});
