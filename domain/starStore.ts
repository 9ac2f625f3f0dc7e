/**
 * Star store abstraction: versioned, star-keyed.
 * Writes carry the version they were based on; stale writes are rejected.
 */

import type { Identifier } from "./core.js";
import { ConcurrencyError } from "./errors.js";
import type { Star } from "./star.js";

export interface StoredStar {
  readonly star: Star;
  /** Number of saves so far. 0 means never saved. */
  readonly version: number;
}

export interface StarStore {
  load(starId: Identifier): Promise<StoredStar | null>;
  /** Stars that exist among the given ids, in the order asked. Missing ids are skipped. */
  loadMany(starIds: readonly Identifier[]): Promise<Star[]>;
  /** Save on top of `expectedVersion` (0 to create). Returns the new version. */
  save(star: Star, expectedVersion: number): Promise<number>;
}

/** In-memory adapter. For tests and single-process deployments. */
export class InMemoryStarStore implements StarStore {
  private byId = new Map<Identifier, StoredStar>();

  async load(starId: Identifier): Promise<StoredStar | null> {
    const stored = this.byId.get(starId);
    if (!stored) return null;
    return { star: structuredClone(stored.star), version: stored.version };
  }

  async loadMany(starIds: readonly Identifier[]): Promise<Star[]> {
    const stars: Star[] = [];
    for (const id of starIds) {
      const stored = this.byId.get(id);
      if (stored) stars.push(structuredClone(stored.star));
    }
    return stars;
  }

  async save(star: Star, expectedVersion: number): Promise<number> {
    const currentVersion = this.byId.get(star.id)?.version ?? 0;
    if (currentVersion !== expectedVersion) {
      throw new ConcurrencyError("Concurrent modification detected", {
        starId: star.id,
        expectedVersion,
        currentVersion,
      });
    }
    const version = currentVersion + 1;
    this.byId.set(star.id, { star: structuredClone(star), version });
    return version;
  }

  /** Reset for tests. Not on StarStore interface. */
  clear(): void {
    this.byId.clear();
  }
}
