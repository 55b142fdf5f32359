/**
 * @fileoverview Snapshot type definitions.
 *
 * @module types/snapshot
 */

import type { JobGraph, NodeLinkGraph } from '../graph/jobGraph';
import type { Job } from './job';

/**
 * The job list paired with the trigger graph derived from it.
 * Owned by the snapshot cache and replaced as a whole.
 */
export interface Snapshot {
  jobs: Job[];
  graph: JobGraph;
  /** ISO-8601 creation time */
  timestamp: string;
  /** True when some jobs' triggers could not be fetched */
  partial: boolean;
  /** Names of the jobs whose outgoing edges are missing */
  failedJobs: string[];
}

/**
 * On-disk form of a {@link Snapshot}; the graph is kept in node-link form.
 */
export interface PersistedSnapshot {
  jobs: Job[];
  graph: NodeLinkGraph;
  timestamp: string;
  /** Absent in files that predate partial builds */
  partial?: boolean;
  failedJobs?: string[];
}
