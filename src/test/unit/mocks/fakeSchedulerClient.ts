/**
 * @fileoverview Scripted ISchedulerClient for unit tests.
 */

import type { ISchedulerClient, JobLogType } from '../../../interfaces/ISchedulerClient';
import type { Job, JobStatus, TriggerRecord } from '../../../types/job';
import { NotFoundError } from '../../../core/errors';

export function job(id: string, name: string, status: JobStatus = 'success'): Job {
  return { id, name, status };
}

export class FakeSchedulerClient implements ISchedulerClient {
  jobs: Job[] = [];
  /** Trigger targets by job id */
  triggers = new Map<string, string[]>();
  statuses = new Map<string, JobStatus>();
  outputs = new Map<string, string>();
  logs = new Map<string, string>();
  /** Errors thrown by the named operation for the given job id */
  failures = new Map<string, Error>();
  listJobsCalls = 0;

  async listJobs(_directory: string): Promise<Job[]> {
    this.listJobsCalls++;
    return this.jobs.map(j => ({ ...j }));
  }

  async listTriggers(jobId: string): Promise<TriggerRecord[]> {
    this.throwIfFailing('listTriggers', jobId);
    return (this.triggers.get(jobId) ?? []).map(triggeredJobName => ({ triggeredJobName }));
  }

  async getStatus(jobId: string): Promise<JobStatus> {
    this.throwIfFailing('getStatus', jobId);
    return this.statuses.get(jobId) ?? 'unknown';
  }

  async getOutput(jobId: string): Promise<string> {
    this.throwIfFailing('getOutput', jobId);
    const output = this.outputs.get(jobId);
    if (output === undefined) throw new NotFoundError(`no output for ${jobId}`);
    return output;
  }

  async getLog(jobId: string, logType: JobLogType): Promise<string> {
    this.throwIfFailing('getLog', jobId);
    const log = this.logs.get(`${jobId}:${logType}`);
    if (log === undefined) throw new NotFoundError(`no ${logType} log for ${jobId}`);
    return log;
  }

  private throwIfFailing(operation: string, jobId: string): void {
    const error = this.failures.get(`${operation}:${jobId}`);
    if (error) throw error;
  }
}
