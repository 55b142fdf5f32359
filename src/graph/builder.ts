/**
 * @fileoverview Dependency Graph Builder
 *
 * Turns the flat job list plus one trigger lookup per job into a
 * {@link JobGraph}. Handles:
 * - One node per job name (idempotent)
 * - One edge per trigger, creating implicit nodes for unknown targets
 * - Fail-fast or skip-and-mark-partial on trigger lookup failure
 *
 * Cycles are accepted here; only the layout engine rejects them.
 *
 * @module graph/builder
 */

import type { Job, TriggerRecord } from '../types/job';
import type { ILogger } from '../interfaces/ILogger';
import { errorMessage } from '../core/errors';
import { Logger } from '../core/logger';
import { JobGraph } from './jobGraph';

/**
 * Fetches the triggers declared for one job id.
 */
export type TriggerLookup = (jobId: string) => Promise<TriggerRecord[]>;

export interface GraphBuildOptions {
  /**
   * `fail` (default): the first lookup failure aborts the build.
   * `skip`: the job keeps its node but loses its outgoing edges, and the
   * result is marked partial.
   */
  onTriggerError?: 'fail' | 'skip';
  log?: ILogger;
}

export interface GraphBuildResult {
  graph: JobGraph;
  /** True when at least one trigger lookup failed in `skip` mode */
  partial: boolean;
  /** Names of jobs whose trigger lookup failed */
  failedJobs: string[];
  /** Edge targets that are not in the job list (no status, no history) */
  implicitNodes: string[];
}

export interface NodeClassification {
  /** Nodes backed by a job in the list */
  known: string[];
  /** Nodes only reached as trigger targets */
  implicit: string[];
}

/**
 * Build the trigger graph for `jobs`.
 *
 * Trigger lookups run one job at a time, in list order.
 *
 * @throws whatever the lookup throws, unchanged, when `onTriggerError` is `fail`
 */
export async function buildJobGraph(
  jobs: readonly Job[],
  fetchTriggers: TriggerLookup,
  options: GraphBuildOptions = {}
): Promise<GraphBuildResult> {
  const log = options.log ?? Logger.for('graph');
  const onTriggerError = options.onTriggerError ?? 'fail';
  const graph = new JobGraph();
  const failedJobs: string[] = [];

  for (const job of jobs) {
    graph.addNode(job.name);
  }

  for (const job of jobs) {
    let triggers: TriggerRecord[];
    try {
      triggers = await fetchTriggers(job.id);
    } catch (error) {
      if (onTriggerError === 'fail') {
        log.error(`Trigger lookup failed for '${job.name}', aborting build`, { jobId: job.id, error: errorMessage(error) });
        throw error;
      }
      log.warn(`Trigger lookup failed for '${job.name}', skipping its edges`, { jobId: job.id, error: errorMessage(error) });
      failedJobs.push(job.name);
      continue;
    }

    for (const trigger of triggers) {
      graph.addEdge(job.name, trigger.triggeredJobName);
    }
  }

  const { implicit } = classifyNodes(graph, jobs);
  if (implicit.length > 0) {
    // Kept as nodes, but they have no job record behind them.
    log.warn(`Trigger targets missing from the job list: ${implicit.join(', ')}`);
  }

  log.info(`Built trigger graph: ${graph.nodeCount} nodes, ${graph.edgeCount} edges`, {
    partial: failedJobs.length > 0,
  });

  return {
    graph,
    partial: failedJobs.length > 0,
    failedJobs,
    implicitNodes: implicit,
  };
}

/**
 * Split graph nodes into those backed by a job record and implicit ones.
 * Both lists keep graph node order.
 */
export function classifyNodes(graph: JobGraph, jobs: readonly Job[]): NodeClassification {
  const jobNames = new Set(jobs.map(job => job.name));
  const known: string[] = [];
  const implicit: string[] = [];
  for (const name of graph.nodes()) {
    (jobNames.has(name) ? known : implicit).push(name);
  }
  return { known, implicit };
}
