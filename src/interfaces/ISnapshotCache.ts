/**
 * @fileoverview Interface for the snapshot cache.
 *
 * @module interfaces/ISnapshotCache
 */

import type { Snapshot } from '../types/snapshot';

/**
 * Cache state as reported to callers.
 */
export interface CacheStatus {
  exists: boolean;
  valid: boolean;
  /** Age of the stored snapshot, when one exists */
  ageMs?: number;
}

/**
 * Durable cache of a single {@link Snapshot} with a time-to-live.
 *
 * Validity and loading are separate so callers choose the policy
 * (e.g. serve stale while rebuilding).
 */
export interface ISnapshotCache {
  /** True iff a snapshot exists and is younger than the TTL. */
  isValid(): Promise<boolean>;

  /** The stored snapshot, or `undefined` when none exists. Does not check validity. */
  load(): Promise<Snapshot | undefined>;

  /** Replace the stored snapshot atomically. */
  save(snapshot: Snapshot): Promise<void>;

  /** Remove the stored snapshot. A missing snapshot is not an error. */
  invalidate(): Promise<void>;

  describe(): Promise<CacheStatus>;
}
