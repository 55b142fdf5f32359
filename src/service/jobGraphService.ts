/**
 * @fileoverview Job graph service: the query surface request layers call.
 *
 * Decides between the cached snapshot and a fresh build, records a status
 * observation per job whenever it builds, and hands out layouts and
 * history. Errors from the scheduler, cache and log propagate with their
 * kind intact; there is no fallback to stale or sample data.
 *
 * @module service/jobGraphService
 */

import type { ILogger } from '../interfaces/ILogger';
import type { IHistoryLog } from '../interfaces/IHistoryLog';
import type { ISchedulerClient } from '../interfaces/ISchedulerClient';
import type { CacheStatus, ISnapshotCache } from '../interfaces/ISnapshotCache';
import type { HistoryEntry, Job, JobStatus } from '../types/job';
import type { Snapshot } from '../types/snapshot';
import { errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import { buildJobGraph } from '../graph/builder';
import type { JobGraph } from '../graph/jobGraph';
import { hierarchicalLayout, type LayoutOptions, type Point } from '../graph/layout';
import { createHistoryEntry, DEFAULT_ALL_QUERY_LIMIT, DEFAULT_JOB_QUERY_LIMIT } from '../history/historyLog';

export type SnapshotSource = 'cache' | 'fresh';

export interface SnapshotView {
  jobs: Job[];
  graph: JobGraph;
  source: SnapshotSource;
  partial: boolean;
  timestamp: string;
}

export interface JobGraphServiceOptions {
  /** Scheduler folder to mirror; empty mirrors every job */
  jobDirectory: string;
  onTriggerError?: 'fail' | 'skip';
  /** Statuses for which output and stderr are captured into history */
  captureOutputFor?: readonly JobStatus[];
  layout?: LayoutOptions;
  now?: () => number;
  log?: ILogger;
}

export class JobGraphService {
  private readonly log: ILogger;
  private readonly now: () => number;
  private readonly captureOutputFor: ReadonlySet<JobStatus>;

  constructor(
    private readonly scheduler: ISchedulerClient,
    private readonly cache: ISnapshotCache,
    private readonly history: IHistoryLog,
    private readonly options: JobGraphServiceOptions
  ) {
    this.log = options.log ?? Logger.for('service');
    this.now = options.now ?? Date.now;
    this.captureOutputFor = new Set<JobStatus>(options.captureOutputFor ?? ['failed']);
  }

  /**
   * Serve the cached snapshot while it is valid; otherwise rebuild it.
   */
  async getSnapshot(): Promise<SnapshotView> {
    if (await this.cache.isValid()) {
      const cached = await this.cache.load();
      if (cached) {
        this.log.debug('Serving snapshot from cache', { timestamp: cached.timestamp });
        return this.view(cached, 'cache');
      }
    }

    this.log.info('Cache missing or expired, fetching fresh data from scheduler');
    return this.view(await this.rebuild(), 'fresh');
  }

  /**
   * Drop the cached snapshot and rebuild it from the scheduler.
   */
  async refresh(): Promise<Snapshot> {
    await this.cache.invalidate();
    return this.rebuild();
  }

  /**
   * Coordinates for every node of `graph`.
   *
   * @throws CyclicGraphError when the trigger graph has a cycle
   */
  layout(graph: JobGraph): Map<string, Point> {
    return hierarchicalLayout(graph, this.options.layout);
  }

  historyFor(jobNameOrId: string, limit: number = DEFAULT_JOB_QUERY_LIMIT): Promise<HistoryEntry[]> {
    return this.history.queryByJob(jobNameOrId, limit);
  }

  recentHistory(limit: number = DEFAULT_ALL_QUERY_LIMIT): Promise<HistoryEntry[]> {
    return this.history.queryAll(limit);
  }

  cacheStatus(): Promise<CacheStatus> {
    return this.cache.describe();
  }

  /**
   * Fetch jobs, build the graph, cache the snapshot, then record statuses.
   * Nothing is cached when the build fails.
   */
  private async rebuild(): Promise<Snapshot> {
    const jobs = await this.scheduler.listJobs(this.options.jobDirectory);
    const build = await buildJobGraph(jobs, jobId => this.scheduler.listTriggers(jobId), {
      onTriggerError: this.options.onTriggerError,
      log: this.options.log,
    });

    const snapshot: Snapshot = {
      jobs,
      graph: build.graph,
      timestamp: new Date(this.now()).toISOString(),
      partial: build.partial,
      failedJobs: build.failedJobs,
    };
    await this.cache.save(snapshot);
    this.log.info(`Cached snapshot of ${jobs.length} jobs`, { partial: snapshot.partial });

    await this.recordStatuses(jobs);
    return snapshot;
  }

  /**
   * Append one history entry per job. A job whose status cannot be fetched
   * is logged and skipped; the others are still recorded.
   */
  private async recordStatuses(jobs: readonly Job[]): Promise<void> {
    const entries: HistoryEntry[] = [];
    for (const job of jobs) {
      let status: JobStatus;
      try {
        status = await this.scheduler.getStatus(job.id);
      } catch (error) {
        this.log.warn(`Failed to get status for job ${job.name}: ${errorMessage(error)}`, { jobId: job.id });
        continue;
      }
      entries.push(createHistoryEntry(job, status, await this.captureExtras(job, status), this.now));
    }
    await this.history.appendMany(entries);
  }

  private async captureExtras(job: Job, status: JobStatus): Promise<{ output?: string; errorLog?: string }> {
    if (!this.captureOutputFor.has(status)) {
      return {};
    }
    const extras: { output?: string; errorLog?: string } = {};
    try {
      extras.output = await this.scheduler.getOutput(job.id);
    } catch (error) {
      this.log.warn(`Failed to get output for job ${job.name}: ${errorMessage(error)}`, { jobId: job.id });
    }
    try {
      extras.errorLog = await this.scheduler.getLog(job.id, 'stderr');
    } catch (error) {
      this.log.warn(`Failed to get error log for job ${job.name}: ${errorMessage(error)}`, { jobId: job.id });
    }
    return extras;
  }

  private view(snapshot: Snapshot, source: SnapshotSource): SnapshotView {
    return {
      jobs: snapshot.jobs,
      graph: snapshot.graph,
      source,
      partial: snapshot.partial,
      timestamp: snapshot.timestamp,
    };
  }
}
