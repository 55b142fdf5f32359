/**
 * @fileoverview File-backed TTL snapshot cache.
 *
 * Stores one {@link Snapshot} as JSON, graph in node-link form. Validity
 * is judged from the file's modification time by default, or from the
 * embedded timestamp when `validityBasis` is `payload`.
 *
 * Concurrency: no in-process locking. Saves go through temp-file-then-rename,
 * so racing writers are serialised by the rename and readers never see a
 * partial file.
 *
 * @module cache/snapshotCache
 */

import type { CacheConfig } from '../core/config';
import type { IFileSystem } from '../interfaces/IFileSystem';
import { isNotFound } from '../interfaces/IFileSystem';
import type { ILogger } from '../interfaces/ILogger';
import type { CacheStatus, ISnapshotCache } from '../interfaces/ISnapshotCache';
import type { PersistedSnapshot, Snapshot } from '../types/snapshot';
import { JOB_STATUSES } from '../types/job';
import { writeFileAtomic } from '../core/atomicWrite';
import { DefaultFileSystem } from '../core/defaultFileSystem';
import { CacheIOError, errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import { ajv, formatSchemaErrors } from '../core/validation';
import { JobGraph } from '../graph/jobGraph';

const HOUR_MS = 60 * 60 * 1000;

export interface SnapshotCacheDeps {
  fs?: IFileSystem;
  /** Current time in epoch milliseconds */
  now?: () => number;
  log?: ILogger;
}

const persistedSnapshotSchema = {
  type: 'object',
  required: ['jobs', 'graph', 'timestamp'],
  properties: {
    jobs: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'name', 'status'],
        properties: {
          id: { type: 'string' },
          name: { type: 'string' },
          status: { type: 'string', enum: JOB_STATUSES },
          startTime: { type: 'string' },
          endTime: { type: 'string' },
        },
      },
    },
    graph: {
      type: 'object',
      required: ['directed', 'multigraph', 'nodes', 'links'],
      properties: {
        directed: { type: 'boolean', enum: [true] },
        multigraph: { type: 'boolean', enum: [false] },
        nodes: {
          type: 'array',
          items: { type: 'object', required: ['id'], properties: { id: { type: 'string' } } },
        },
        links: {
          type: 'array',
          items: {
            type: 'object',
            required: ['source', 'target'],
            properties: { source: { type: 'string' }, target: { type: 'string' } },
          },
        },
      },
    },
    timestamp: { type: 'string' },
    partial: { type: 'boolean' },
    failedJobs: { type: 'array', items: { type: 'string' } },
  },
};

const validatePersistedSnapshot = ajv.compile<PersistedSnapshot>(persistedSnapshotSchema);

/**
 * Convert a snapshot to its on-disk form.
 */
export function serializeSnapshot(snapshot: Snapshot): PersistedSnapshot {
  return {
    jobs: snapshot.jobs.map(job => ({ ...job })),
    graph: snapshot.graph.toNodeLink(),
    timestamp: snapshot.timestamp,
    partial: snapshot.partial,
    failedJobs: [...snapshot.failedJobs],
  };
}

/**
 * Rebuild a snapshot from its on-disk form.
 * Files written before `partial` existed read as complete.
 */
export function deserializeSnapshot(data: PersistedSnapshot): Snapshot {
  return {
    jobs: data.jobs.map(job => ({ ...job })),
    graph: JobGraph.fromNodeLink(data.graph),
    timestamp: data.timestamp,
    partial: data.partial ?? false,
    failedJobs: [...(data.failedJobs ?? [])],
  };
}

export class FileSnapshotCache implements ISnapshotCache {
  private readonly fs: IFileSystem;
  private readonly now: () => number;
  private readonly log: ILogger;
  private readonly ttlMs: number;

  constructor(private readonly config: CacheConfig, deps: SnapshotCacheDeps = {}) {
    this.fs = deps.fs ?? new DefaultFileSystem();
    this.now = deps.now ?? Date.now;
    this.log = deps.log ?? Logger.for('cache');
    this.ttlMs = config.ttlHours * HOUR_MS;
  }

  async isValid(): Promise<boolean> {
    return (await this.describe()).valid;
  }

  async describe(): Promise<CacheStatus> {
    const createdAt = await this.createdAt();
    if (createdAt === undefined) {
      return { exists: false, valid: false };
    }
    const ageMs = this.now() - createdAt;
    return { exists: true, valid: ageMs < this.ttlMs, ageMs };
  }

  async load(): Promise<Snapshot | undefined> {
    const data = await this.readPersisted();
    return data && deserializeSnapshot(data);
  }

  async save(snapshot: Snapshot): Promise<void> {
    const content = JSON.stringify(serializeSnapshot(snapshot), null, 2);
    try {
      await writeFileAtomic(this.fs, this.config.file, content);
    } catch (error) {
      this.log.error(`Failed to write snapshot cache`, { file: this.config.file, error: errorMessage(error) });
      throw new CacheIOError(`Failed to write snapshot cache ${this.config.file}: ${errorMessage(error)}`, { cause: error });
    }
    this.log.debug(`Saved snapshot`, { file: this.config.file, jobs: snapshot.jobs.length });
  }

  async invalidate(): Promise<void> {
    try {
      await this.fs.unlinkAsync(this.config.file);
      this.log.info('Snapshot cache invalidated');
    } catch (error) {
      if (isNotFound(error)) return;
      throw new CacheIOError(`Failed to delete snapshot cache ${this.config.file}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Creation time of the stored snapshot in epoch ms, or `undefined` when
   * there is none (or, on the payload basis, its timestamp is unreadable).
   */
  private async createdAt(): Promise<number | undefined> {
    if (this.config.validityBasis === 'payload') {
      const data = await this.readPersisted();
      if (!data) return undefined;
      const parsed = Date.parse(data.timestamp);
      if (Number.isNaN(parsed)) {
        this.log.warn(`Snapshot timestamp is not a date, treating cache as absent`, { timestamp: data.timestamp });
        return undefined;
      }
      return parsed;
    }

    try {
      return (await this.fs.statAsync(this.config.file)).mtimeMs;
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new CacheIOError(`Failed to stat snapshot cache ${this.config.file}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async readPersisted(): Promise<PersistedSnapshot | undefined> {
    let content: string;
    try {
      content = await this.fs.readFileAsync(this.config.file);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw new CacheIOError(`Failed to read snapshot cache ${this.config.file}: ${errorMessage(error)}`, { cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new CacheIOError(`Snapshot cache ${this.config.file} is not valid JSON`, { cause: error });
    }

    if (!validatePersistedSnapshot(data)) {
      const details = formatSchemaErrors(validatePersistedSnapshot.errors);
      throw new CacheIOError(`Snapshot cache ${this.config.file} has an unexpected shape: ${details.join('; ')}`);
    }
    return data;
  }
}
