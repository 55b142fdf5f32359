/**
 * @fileoverview Interface for the external batch scheduler.
 *
 * Every method rejects with a {@link MirrorError} subclass
 * (`ConnectionError`, `TimeoutError`, `AuthError`, `NotFoundError`,
 * `MalformedResponseError`); transport details never leak past it.
 *
 * @module interfaces/ISchedulerClient
 */

import type { Job, JobStatus, TriggerRecord } from '../types/job';

/**
 * Log streams the scheduler keeps per job.
 */
export type JobLogType = 'stdout' | 'stderr';

export interface ISchedulerClient {
  /**
   * List jobs, optionally restricted to a scheduler folder.
   *
   * @param directory - Folder to list; empty string lists every job
   */
  listJobs(directory: string): Promise<Job[]>;

  /** Triggers declared by one job. */
  listTriggers(jobId: string): Promise<TriggerRecord[]>;

  /** Current status of one job. Unrecognised values come back as `unknown`. */
  getStatus(jobId: string): Promise<JobStatus>;

  /** Output of the job's latest run. */
  getOutput(jobId: string): Promise<string>;

  /** Raw text of one log stream of the job's latest run. */
  getLog(jobId: string, logType: JobLogType): Promise<string>;
}
