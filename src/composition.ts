/**
 * @fileoverview Composition root: wires configuration into the mirror's services.
 *
 * This is the single place where concrete classes meet their interfaces.
 *
 * ```
 * MirrorConfig.scheduler ──→ HttpSchedulerClient  (ISchedulerClient)
 * MirrorConfig.cache     ──→ FileSnapshotCache    (ISnapshotCache)
 * MirrorConfig.history   ──→ FileHistoryLog       (IHistoryLog)
 *                         └─ all three used by JobGraphService
 * ```
 *
 * @module composition
 */

import { FileSnapshotCache } from './cache/snapshotCache';
import type { MirrorConfig } from './core/config';
import { DefaultFileSystem } from './core/defaultFileSystem';
import { FileHistoryLog } from './history/historyLog';
import type { IFileSystem } from './interfaces/IFileSystem';
import type { IHistoryLog } from './interfaces/IHistoryLog';
import type { ISchedulerClient } from './interfaces/ISchedulerClient';
import type { ISnapshotCache } from './interfaces/ISnapshotCache';
import { HttpSchedulerClient } from './scheduler/httpSchedulerClient';
import { JobGraphService } from './service/jobGraphService';

export interface MirrorServices {
  scheduler: ISchedulerClient;
  cache: ISnapshotCache;
  history: IHistoryLog;
  service: JobGraphService;
}

/**
 * Overrides for tests and embedding; production passes none.
 */
export interface MirrorOverrides {
  fs?: IFileSystem;
  scheduler?: ISchedulerClient;
  now?: () => number;
}

/**
 * Create the production services for `config`.
 */
export function createMirror(config: MirrorConfig, overrides: MirrorOverrides = {}): MirrorServices {
  const fs = overrides.fs ?? new DefaultFileSystem();
  const now = overrides.now ?? Date.now;

  const scheduler = overrides.scheduler ?? new HttpSchedulerClient(config.scheduler);
  const cache = new FileSnapshotCache(config.cache, { fs, now });
  const history = new FileHistoryLog(config.history, { fs });
  const service = new JobGraphService(scheduler, cache, history, {
    jobDirectory: config.scheduler.jobDirectory,
    onTriggerError: config.graph.onTriggerError,
    captureOutputFor: config.history.captureOutputFor,
    now,
  });

  return { scheduler, cache, history, service };
}
