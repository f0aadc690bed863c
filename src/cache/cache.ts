/**
 * Memo caches for normalization, value interning and comparison.
 *
 * Caches grow for as long as their owner lives and are never evicted.
 * JavaScript runs each isolate on one thread, so plain Maps need no locking;
 * a cache shared across worker threads would have to live in each worker.
 */

import type { NormalizedVersion } from "#/normalizer";
import type { GameVersion } from "#/version";

export type Ordering = -1 | 0 | 1;

export class MemoCache<K, V> {
  private readonly entries = new Map<K, V>();

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  set(key: K, value: V): void {
    this.entries.set(key, value);
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Memo keyed by an ordered pair of strings.
 * Not symmetrized: (a, b) and (b, a) are separate entries.
 */
export class PairCache<V> {
  private readonly entries = new Map<string, Map<string, V>>();
  private count = 0;

  get(left: string, right: string): V | undefined {
    return this.entries.get(left)?.get(right);
  }

  set(left: string, right: string, value: V): void {
    let row = this.entries.get(left);
    if (!row) {
      row = new Map<string, V>();
      this.entries.set(left, row);
    }
    if (!row.has(right)) {
      this.count++;
    }
    row.set(right, value);
  }

  get size(): number {
    return this.count;
  }
}

export interface VersionCaches {
  // Raw input string (before any fix-up) -> normalized form
  normalization: MemoCache<string, NormalizedVersion>;
  // Canonical string ("any" for the wildcard) -> the one value for it
  values: MemoCache<string, GameVersion>;
  // Canonical strings in caller order -> ordering
  comparison: PairCache<Ordering>;
}

export function createVersionCaches(): VersionCaches {
  return {
    normalization: new MemoCache<string, NormalizedVersion>(),
    values: new MemoCache<string, GameVersion>(),
    comparison: new PairCache<Ordering>(),
  };
}

/**
 * Process-wide caches used when a caller does not pass its own.
 */
export const defaultVersionCaches: VersionCaches = createVersionCaches();
