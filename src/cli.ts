#!/usr/bin/env node
/**
 * @fileoverview Command-line entry point.
 *
 *   job-trigger-mirror graph
 *   job-trigger-mirror refresh
 *   job-trigger-mirror layout
 *   job-trigger-mirror history [jobNameOrId] [--limit N]
 *
 * Settings come from the environment, after a `.env` file in the working
 * directory (variables already set win). Results go to stdout; logs and
 * errors go to stderr.
 *
 * @module cli
 */

import * as dotenv from 'dotenv';
import { createMirror } from './composition';
import { loadConfig } from './core/config';
import { errorMessage, isMirrorError } from './core/errors';
import { Logger } from './core/logger';
import { DEFAULT_ALL_QUERY_LIMIT } from './history/historyLog';
import type { JobGraphService } from './service/jobGraphService';

export const USAGE = [
  'Usage: job-trigger-mirror <command> [args]',
  '',
  'Commands:',
  '  graph                              Show the trigger graph (cached when fresh)',
  '  refresh                            Rebuild the graph from the scheduler',
  '  layout                             Show layout coordinates per job',
  '  history [jobNameOrId] [--limit N]  Show recorded job statuses',
].join('\n');

export interface CliArgs {
  command?: string;
  positional: string[];
  limit?: number;
  /** Set when the arguments cannot be used as given */
  usageError?: string;
}

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

/**
 * Parse command-line arguments.
 * Supports: <command> [positional...] [--limit N]
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { positional: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--limit') {
      const value = argv[++i];
      const limit = value === undefined ? NaN : Number.parseInt(value, 10);
      if (Number.isFinite(limit)) {
        result.limit = limit;
      } else if (result.usageError === undefined) {
        result.usageError = value === undefined
          ? 'Missing value for --limit'
          : `Invalid value for --limit: ${value}`;
      }
    } else if (result.command === undefined) {
      result.command = arg;
    } else {
      result.positional.push(arg);
    }
  }

  return result;
}

/**
 * Run one command against `service`. Resolves with the process exit code.
 */
export async function runCommand(args: CliArgs, service: JobGraphService, io: CliIO): Promise<number> {
  if (args.usageError !== undefined) {
    io.err(`error: ${args.usageError}`);
    io.err(USAGE);
    return 1;
  }

  try {
    switch (args.command) {
      case 'graph': {
        const view = await service.getSnapshot();
        io.out(`source: ${view.source}`);
        io.out(`jobs: ${view.jobs.length}`);
        io.out(`edges: ${view.graph.edgeCount}`);
        if (view.partial) {
          io.out('partial: some trigger lookups failed');
        }
        for (const edge of view.graph.edges()) {
          io.out(`${edge.source} -> ${edge.target}`);
        }
        return 0;
      }
      case 'refresh': {
        const snapshot = await service.refresh();
        io.out(`Refreshed ${snapshot.jobs.length} jobs at ${snapshot.timestamp}`);
        return 0;
      }
      case 'layout': {
        const view = await service.getSnapshot();
        for (const [name, point] of service.layout(view.graph)) {
          io.out(`${name}\t${point.x}\t${point.y}`);
        }
        return 0;
      }
      case 'history': {
        const limit = args.limit ?? DEFAULT_ALL_QUERY_LIMIT;
        const target = args.positional[0];
        const entries = target !== undefined
          ? await service.historyFor(target, limit)
          : await service.recentHistory(limit);
        for (const entry of entries) {
          io.out(`${entry.timestamp}  ${entry.jobName}  ${entry.status}`);
        }
        return 0;
      }
      default:
        io.err(USAGE);
        return 1;
    }
  } catch (error) {
    if (isMirrorError(error)) {
      io.err(`error [${error.kind}]: ${error.message}`);
    } else {
      io.err(`error: ${errorMessage(error)}`);
    }
    return 1;
  }
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  Logger.initialize({ level: config.logging.level, debugComponents: config.logging.debug });

  const { service } = createMirror(config);
  const io: CliIO = {
    out: line => process.stdout.write(line + '\n'),
    err: line => process.stderr.write(line + '\n'),
  };
  process.exitCode = await runCommand(parseArgs(process.argv.slice(2)), service, io);
}

if (require.main === module) {
  main().catch((err) => {
    const prefix = isMirrorError(err) ? `error [${err.kind}]` : 'Fatal error';
    process.stderr.write(`${prefix}: ${errorMessage(err)}\n`);
    process.exit(1);
  });
}
