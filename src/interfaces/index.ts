/**
 * @fileoverview Central export for all interfaces.
 *
 * Import interfaces from this module for convenience:
 * ```typescript
 * import { ISchedulerClient, ISnapshotCache } from './interfaces';
 * ```
 *
 * @module interfaces
 */

export * from './IConfigProvider';
export * from './IFileSystem';
export * from './IHistoryLog';
export * from './ILogger';
export * from './ISchedulerClient';
export * from './ISnapshotCache';
