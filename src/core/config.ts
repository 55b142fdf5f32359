/**
 * @fileoverview Mirror configuration.
 *
 * {@link MirrorConfig} is an explicit struct handed to the constructors of
 * the scheduler client, snapshot cache and history log. It is assembled
 * from an {@link IConfigProvider}, validated and defaulted by Ajv.
 *
 * | Field                   | Environment variable       | Default                      |
 * |-------------------------|----------------------------|------------------------------|
 * | scheduler.baseUrl       | SCHEDULER_API_URL          | http://localhost:8080        |
 * | scheduler.username      | SCHEDULER_USERNAME         | ''                           |
 * | scheduler.password      | SCHEDULER_PASSWORD         | ''                           |
 * | scheduler.jobDirectory  | SCHEDULER_JOB_DIRECTORY    | '' (all jobs)                |
 * | scheduler.timeoutMs     | SCHEDULER_TIMEOUT_MS       | 30000 (max 2147483647)       |
 * | cache.file              | MIRROR_CACHE_FILE          | data/job_graph_cache.json    |
 * | cache.ttlHours          | CACHE_EXPIRY_HOURS         | 24                           |
 * | cache.validityBasis     | MIRROR_CACHE_VALIDITY      | mtime                        |
 * | history.file            | MIRROR_HISTORY_FILE        | data/job_history.json        |
 * | history.cap             | MIRROR_HISTORY_CAP         | 1000                         |
 * | history.captureOutputFor| MIRROR_CAPTURE_OUTPUT      | failed                       |
 * | graph.onTriggerError    | MIRROR_TRIGGER_ERRORS      | fail                         |
 * | logging.level           | MIRROR_LOG_LEVEL           | info                         |
 * | logging.debug           | MIRROR_DEBUG               | (none)                       |
 *
 * @module core/config
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';
import type { JobStatus } from '../types/job';
import { JOB_STATUSES } from '../types/job';
import { ConfigError } from './errors';
import { LOG_COMPONENTS, LOG_LEVELS, type LogComponent, type LogLevel } from './logger';
import { coercingAjv, formatSchemaErrors } from './validation';

export interface SchedulerConfig {
  baseUrl: string;
  username: string;
  password: string;
  /** Scheduler folder to list; empty lists every job */
  jobDirectory: string;
  timeoutMs: number;
}

export interface CacheConfig {
  file: string;
  ttlHours: number;
  /** `mtime` uses the file modification time, `payload` the embedded timestamp */
  validityBasis: 'mtime' | 'payload';
}

export interface HistoryConfig {
  file: string;
  cap: number;
  /** Statuses for which output and stderr are captured into the entry */
  captureOutputFor: JobStatus[];
}

export interface GraphConfig {
  /** `fail` aborts the build on the first trigger lookup failure; `skip` builds a partial graph */
  onTriggerError: 'fail' | 'skip';
}

export interface LoggingConfig {
  level: LogLevel;
  debug: LogComponent[];
}

export interface MirrorConfig {
  scheduler: SchedulerConfig;
  cache: CacheConfig;
  history: HistoryConfig;
  graph: GraphConfig;
  logging: LoggingConfig;
}

/**
 * Environment variable behind each `section.key`.
 */
export const ENV_KEYS: Readonly<Record<string, string>> = {
  'scheduler.baseUrl': 'SCHEDULER_API_URL',
  'scheduler.username': 'SCHEDULER_USERNAME',
  'scheduler.password': 'SCHEDULER_PASSWORD',
  'scheduler.jobDirectory': 'SCHEDULER_JOB_DIRECTORY',
  'scheduler.timeoutMs': 'SCHEDULER_TIMEOUT_MS',
  'cache.file': 'MIRROR_CACHE_FILE',
  'cache.ttlHours': 'CACHE_EXPIRY_HOURS',
  'cache.validityBasis': 'MIRROR_CACHE_VALIDITY',
  'history.file': 'MIRROR_HISTORY_FILE',
  'history.cap': 'MIRROR_HISTORY_CAP',
  'history.captureOutputFor': 'MIRROR_CAPTURE_OUTPUT',
  'graph.onTriggerError': 'MIRROR_TRIGGER_ERRORS',
  'logging.level': 'MIRROR_LOG_LEVEL',
  'logging.debug': 'MIRROR_DEBUG',
};

/**
 * Reads configuration from environment variables named in {@link ENV_KEYS}.
 * Empty strings count as unset.
 */
export class EnvConfigProvider implements IConfigProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getConfig(section: string, key: string): string | undefined {
    const name = ENV_KEYS[`${section}.${key}`];
    if (!name) return undefined;
    const value = this.env[name];
    return value === undefined || value === '' ? undefined : value;
  }
}

/** Largest delay `setTimeout` honours; longer ones fire after 1 ms. */
export const MAX_TIMER_MS = 2147483647;

const configSchema = {
  type: 'object',
  required: ['scheduler', 'cache', 'history', 'graph', 'logging'],
  additionalProperties: false,
  properties: {
    scheduler: {
      type: 'object',
      required: ['baseUrl', 'username', 'password', 'jobDirectory', 'timeoutMs'],
      additionalProperties: false,
      properties: {
        baseUrl: { type: 'string', pattern: '^https?://', default: 'http://localhost:8080' },
        username: { type: 'string', default: '' },
        password: { type: 'string', default: '' },
        jobDirectory: { type: 'string', default: '' },
        timeoutMs: { type: 'integer', minimum: 1, maximum: MAX_TIMER_MS, default: 30000 },
      },
    },
    cache: {
      type: 'object',
      required: ['file', 'ttlHours', 'validityBasis'],
      additionalProperties: false,
      properties: {
        file: { type: 'string', minLength: 1, default: 'data/job_graph_cache.json' },
        ttlHours: { type: 'number', minimum: 0, default: 24 },
        validityBasis: { type: 'string', enum: ['mtime', 'payload'], default: 'mtime' },
      },
    },
    history: {
      type: 'object',
      required: ['file', 'cap', 'captureOutputFor'],
      additionalProperties: false,
      properties: {
        file: { type: 'string', minLength: 1, default: 'data/job_history.json' },
        cap: { type: 'integer', minimum: 1, default: 1000 },
        captureOutputFor: {
          type: 'array',
          items: { type: 'string', enum: JOB_STATUSES },
          default: ['failed'],
        },
      },
    },
    graph: {
      type: 'object',
      required: ['onTriggerError'],
      additionalProperties: false,
      properties: {
        onTriggerError: { type: 'string', enum: ['fail', 'skip'], default: 'fail' },
      },
    },
    logging: {
      type: 'object',
      required: ['level', 'debug'],
      additionalProperties: false,
      properties: {
        level: { type: 'string', enum: LOG_LEVELS, default: 'info' },
        debug: {
          type: 'array',
          items: { type: 'string', enum: LOG_COMPONENTS },
          default: [],
        },
      },
    },
  },
};

const validateConfig = coercingAjv.compile<MirrorConfig>(configSchema);

const LIST_KEYS = new Set(['history.captureOutputFor', 'logging.debug']);

/**
 * Assemble, default and validate the mirror configuration.
 *
 * @throws ConfigError listing every invalid value
 */
export function loadConfig(provider: IConfigProvider = new EnvConfigProvider()): MirrorConfig {
  const raw: Record<string, Record<string, unknown>> = {
    scheduler: {},
    cache: {},
    history: {},
    graph: {},
    logging: {},
  };

  for (const fullKey of Object.keys(ENV_KEYS)) {
    const [section, key] = fullKey.split('.');
    const value = provider.getConfig(section, key);
    if (value === undefined) continue;
    raw[section][key] = LIST_KEYS.has(fullKey)
      ? value.split(',').map(item => item.trim()).filter(item => item.length > 0)
      : value;
  }

  if (!validateConfig(raw)) {
    const details = formatSchemaErrors(validateConfig.errors);
    throw new ConfigError(`Invalid configuration:\n- ${details.join('\n- ')}`, details);
  }
  return raw;
}
