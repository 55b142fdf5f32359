/**
 * @fileoverview Public API of the scheduler mirror.
 *
 * @module job-trigger-mirror
 */

export * from './types';
export * from './interfaces';
export * from './core/errors';
export { loadConfig, EnvConfigProvider, ENV_KEYS } from './core/config';
export type { MirrorConfig, SchedulerConfig, CacheConfig, HistoryConfig, GraphConfig, LoggingConfig } from './core/config';
export { Logger, ComponentLogger, LOG_LEVELS, LOG_COMPONENTS } from './core/logger';
export type { LogLevel, LogComponent, LoggerOptions, LogSink } from './core/logger';
export { DefaultFileSystem } from './core/defaultFileSystem';
export { JobGraph } from './graph/jobGraph';
export type { JobEdge, NodeLinkGraph } from './graph/jobGraph';
export { buildJobGraph, classifyNodes } from './graph/builder';
export type { GraphBuildOptions, GraphBuildResult, NodeClassification, TriggerLookup } from './graph/builder';
export { computeLevels, groupByLevel, hierarchicalLayout, DEFAULT_X_SPACING, DEFAULT_Y_SPACING } from './graph/layout';
export type { LayoutOptions, Point } from './graph/layout';
export { FileSnapshotCache, serializeSnapshot, deserializeSnapshot } from './cache/snapshotCache';
export { FileHistoryLog, createHistoryEntry, DEFAULT_HISTORY_CAP } from './history/historyLog';
export { HttpSchedulerClient } from './scheduler/httpSchedulerClient';
export { normalizeStatus, parseTimestamp } from './scheduler/jobRecords';
export { JobGraphService } from './service/jobGraphService';
export type { SnapshotSource, SnapshotView, JobGraphServiceOptions } from './service/jobGraphService';
export { createMirror } from './composition';
export type { MirrorServices, MirrorOverrides } from './composition';
