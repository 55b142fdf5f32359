/**
 * @fileoverview Interface for the job history log.
 *
 * @module interfaces/IHistoryLog
 */

import type { HistoryEntry } from '../types/job';

/**
 * Ordered, append-only, size-capped log of job status observations.
 * Oldest entries are evicted first when an append exceeds the cap.
 */
export interface IHistoryLog {
  append(entry: HistoryEntry): Promise<void>;

  /** Append several entries with one load and one write. */
  appendMany(entries: readonly HistoryEntry[]): Promise<void>;

  /**
   * The most recent `limit` entries whose job name or job id equals
   * `nameOrId`, oldest first.
   */
  queryByJob(nameOrId: string, limit?: number): Promise<HistoryEntry[]>;

  /** The most recent `limit` entries overall, oldest first. */
  queryAll(limit?: number): Promise<HistoryEntry[]>;

  /** Distinct job names present in the log, sorted. */
  jobNames(): Promise<string[]>;
}
