/**
 * @fileoverview File-backed bounded history log.
 *
 * The whole log lives in one JSON array, oldest entry first. Each append
 * loads the array, adds to it, keeps the newest `cap` entries and writes
 * it back (O(n) per append; batch with {@link FileHistoryLog.appendMany}
 * when recording many jobs at once).
 *
 * All writes from one instance go through a single promise chain, so
 * load-modify-store cycles never interleave within a process. Processes
 * sharing a history file must route their appends through one writer.
 *
 * @module history/historyLog
 */

import type { HistoryConfig } from '../core/config';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { isNotFound } from '../interfaces/IFileSystem';
import type { IHistoryLog } from '../interfaces/IHistoryLog';
import type { ILogger } from '../interfaces/ILogger';
import type { HistoryEntry, Job, JobStatus } from '../types/job';
import { JOB_STATUSES } from '../types/job';
import { writeFileAtomic } from '../core/atomicWrite';
import { DefaultFileSystem } from '../core/defaultFileSystem';
import { errorMessage, HistoryIOError } from '../core/errors';
import { Logger } from '../core/logger';
import { ajv, formatSchemaErrors } from '../core/validation';

export const DEFAULT_HISTORY_CAP = 1000;
export const DEFAULT_JOB_QUERY_LIMIT = 10;
export const DEFAULT_ALL_QUERY_LIMIT = 20;

export interface HistoryLogDeps {
  fs?: IFileSystem;
  log?: ILogger;
}

const historySchema = {
  type: 'array',
  items: {
    type: 'object',
    required: ['timestamp', 'jobId', 'jobName', 'status'],
    properties: {
      timestamp: { type: 'string' },
      jobId: { type: 'string' },
      jobName: { type: 'string' },
      status: { type: 'string', enum: JOB_STATUSES },
      output: { type: 'string' },
      errorLog: { type: 'string' },
    },
  },
};

const validateHistory = ajv.compile<HistoryEntry[]>(historySchema);

/**
 * Stamp a new history entry. Absent extras are left out of the record.
 */
export function createHistoryEntry(
  job: Pick<Job, 'id' | 'name'>,
  status: JobStatus,
  extras: { output?: string; errorLog?: string } = {},
  now: () => number = Date.now
): HistoryEntry {
  return {
    timestamp: new Date(now()).toISOString(),
    jobId: job.id,
    jobName: job.name,
    status,
    ...(extras.output !== undefined ? { output: extras.output } : {}),
    ...(extras.errorLog !== undefined ? { errorLog: extras.errorLog } : {}),
  };
}

/**
 * Last `limit` items of `items`; none for a non-positive limit.
 */
function tail<T>(items: T[], limit: number): T[] {
  return limit > 0 ? items.slice(-limit) : [];
}

export class FileHistoryLog implements IHistoryLog {
  private readonly fs: IFileSystem;
  private readonly log: ILogger;
  private readonly cap: number;
  /** Tail of the write chain; never rejects */
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly config: Pick<HistoryConfig, 'file'> & { cap?: number }, deps: HistoryLogDeps = {}) {
    this.fs = deps.fs ?? new DefaultFileSystem();
    this.log = deps.log ?? Logger.for('history');
    this.cap = config.cap ?? DEFAULT_HISTORY_CAP;
  }

  append(entry: HistoryEntry): Promise<void> {
    return this.appendMany([entry]);
  }

  appendMany(entries: readonly HistoryEntry[]): Promise<void> {
    if (entries.length === 0) {
      return Promise.resolve();
    }
    return this.withWriteLock(async () => {
      const history = await this.loadAll();
      history.push(...entries);
      const kept = history.length > this.cap ? history.slice(history.length - this.cap) : history;
      await this.persist(kept);
      this.log.debug(`Appended ${entries.length} history entries`, {
        total: kept.length,
        evicted: history.length - kept.length,
      });
    });
  }

  async queryByJob(nameOrId: string, limit: number = DEFAULT_JOB_QUERY_LIMIT): Promise<HistoryEntry[]> {
    const history = await this.loadAll();
    const matching = history.filter(entry => entry.jobName === nameOrId || entry.jobId === nameOrId);
    return tail(matching, limit);
  }

  async queryAll(limit: number = DEFAULT_ALL_QUERY_LIMIT): Promise<HistoryEntry[]> {
    return tail(await this.loadAll(), limit);
  }

  async jobNames(): Promise<string[]> {
    const history = await this.loadAll();
    return [...new Set(history.map(entry => entry.jobName))].sort();
  }

  /**
   * Read the full log. A missing file is an empty log.
   *
   * @throws HistoryIOError when the file cannot be read or parsed
   */
  async loadAll(): Promise<HistoryEntry[]> {
    let content: string;
    try {
      content = await this.fs.readFileAsync(this.config.file);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new HistoryIOError(`Failed to read history ${this.config.file}: ${errorMessage(error)}`, { cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new HistoryIOError(`History ${this.config.file} is not valid JSON`, { cause: error });
    }

    if (!validateHistory(data)) {
      const details = formatSchemaErrors(validateHistory.errors);
      throw new HistoryIOError(`History ${this.config.file} has an unexpected shape: ${details.join('; ')}`);
    }
    return data;
  }

  private async persist(history: HistoryEntry[]): Promise<void> {
    try {
      await writeFileAtomic(this.fs, this.config.file, JSON.stringify(history, null, 2));
    } catch (error) {
      this.log.error('Failed to write history', { file: this.config.file, error: errorMessage(error) });
      throw new HistoryIOError(`Failed to write history ${this.config.file}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Run `fn` after every previously queued write has settled.
   */
  private withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.writeChain.then(fn);
    // The caller receives the rejection through `next`; the chain itself moves on.
    this.writeChain = next.then(() => undefined, () => undefined);
    return next;
  }
}
