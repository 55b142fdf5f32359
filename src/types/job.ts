/**
 * @fileoverview Job-related type definitions for the scheduler mirror.
 *
 * This module contains the records the mirror keeps about scheduler jobs:
 * - Jobs as reported by the scheduler (identity and last known status)
 * - Trigger records (job A completing starts job B)
 * - History entries (status observations over time)
 *
 * @module types/job
 */

/**
 * Every status the mirror understands. Anything else the scheduler reports
 * is recorded as `unknown`.
 */
export const JOB_STATUSES = ['success', 'failed', 'running', 'pending', 'unknown'] as const;

/**
 * Possible states of a scheduler job.
 */
export type JobStatus = typeof JOB_STATUSES[number];

/**
 * A unit of work tracked by the external scheduler.
 * Immutable once fetched; a refresh replaces the whole list.
 */
export interface Job {
  /** Stable scheduler identifier */
  readonly id: string;
  /** Unique within a snapshot; used as the graph key */
  readonly name: string;
  readonly status: JobStatus;
  /** ISO-8601 start time, present only when the scheduler sent a parseable value */
  readonly startTime?: string;
  /** ISO-8601 end time, present only when the scheduler sent a parseable value */
  readonly endTime?: string;
}

/**
 * One scheduler-declared trigger: completion of the owning job starts
 * `triggeredJobName`.
 */
export interface TriggerRecord {
  readonly triggeredJobName: string;
}

/**
 * A single status observation appended to the history log.
 */
export interface HistoryEntry {
  /** ISO-8601 time the observation was recorded */
  readonly timestamp: string;
  readonly jobId: string;
  readonly jobName: string;
  readonly status: JobStatus;
  /** Captured job output, when fetched */
  readonly output?: string;
  /** Captured error log (stderr), when fetched */
  readonly errorLog?: string;
}
