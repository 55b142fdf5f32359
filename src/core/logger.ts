/**
 * @fileoverview Centralized logging system with per-component debug control.
 *
 * All output goes to stderr so that stdout stays reserved for command
 * results. Debug logging can be enabled per component; every other level
 * is gated by a single threshold.
 *
 * Components:
 * - scheduler-client: HTTP calls to the scheduler
 * - graph: dependency graph building
 * - layout: level assignment and positioning
 * - cache: snapshot cache reads and writes
 * - history: history log appends and queries
 * - service: cache-vs-refresh decisions
 * - cli: command-line entry point
 *
 * @example
 * ```typescript
 * import { Logger } from './core/logger';
 *
 * const log = Logger.for('cache');
 * log.info('Snapshot saved');
 * log.debug('Cache file', { path: '/tmp/cache.json' });
 * log.error('Write failed', error);
 * ```
 *
 * @module core/logger
 */

import type { ILogger } from '../interfaces/ILogger';

/**
 * Log levels supported by the logger, lowest first.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

/**
 * Components that can have logging enabled.
 */
export const LOG_COMPONENTS = ['scheduler-client', 'graph', 'layout', 'cache', 'history', 'service', 'cli'] as const;

export type LogComponent = typeof LOG_COMPONENTS[number];

/**
 * Destination for formatted log lines.
 */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
  /** Minimum level written for all components (default `info`) */
  level?: LogLevel;
  /** Components whose debug output is written regardless of `level` */
  debugComponents?: readonly LogComponent[];
  /** Defaults to writing to stderr */
  sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

/**
 * Process-wide logger. Use {@link Logger.for} to get a component-scoped logger.
 */
export class Logger {
  private static instance: Logger | undefined;
  private level: LogLevel;
  private readonly debugComponents: Set<LogComponent>;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.debugComponents = new Set(options.debugComponents ?? []);
    this.sink = options.sink ?? stderrSink;
  }

  /**
   * Install the process-wide logger. Call once at startup; later calls replace it.
   */
  static initialize(options: LoggerOptions = {}): Logger {
    Logger.instance = new Logger(options);
    return Logger.instance;
  }

  /**
   * Drop the installed logger; component loggers fall back to defaults.
   */
  static reset(): void {
    Logger.instance = undefined;
  }

  /**
   * Get the installed logger, creating a default one on first use.
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Create a component-scoped logger.
   *
   * @param component - The component name for log prefixes
   */
  static for(component: LogComponent): ComponentLogger {
    return new ComponentLogger(component);
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isDebugEnabled(component: LogComponent): boolean {
    return this.level === 'debug' || this.debugComponents.has(component);
  }

  private isEnabled(level: LogLevel, component: LogComponent): boolean {
    if (level === 'debug') {
      return this.isDebugEnabled(component);
    }
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  /**
   * Format a log message with timestamp and component prefix.
   */
  private formatMessage(level: LogLevel, component: LogComponent, message: string): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    return `[${timestamp}] [${levelStr}] [${component}] ${message}`;
  }

  /**
   * Format additional data for logging.
   */
  private formatData(data?: unknown): string {
    if (data === undefined) return '';
    if (data instanceof Error) {
      return `\n  Error: ${data.message}${data.stack ? `\n  Stack: ${data.stack}` : ''}`;
    }
    try {
      return '\n  ' + JSON.stringify(data, null, 2).split('\n').join('\n  ');
    } catch {
      return `\n  [Unserializable data: ${typeof data}]`;
    }
  }

  log(level: LogLevel, component: LogComponent, message: string, data?: unknown): void {
    if (!this.isEnabled(level, component)) {
      return;
    }
    this.sink(this.formatMessage(level, component, message) + this.formatData(data));
  }
}

/**
 * Component-scoped logger for convenience.
 *
 * Resolves the process-wide {@link Logger} on every call, so loggers created
 * at module load pick up a later {@link Logger.initialize}.
 */
export class ComponentLogger implements ILogger {
  constructor(private readonly component: LogComponent) {}

  debug(message: string, data?: unknown): void {
    Logger.getInstance().log('debug', this.component, message, data);
  }

  info(message: string, data?: unknown): void {
    Logger.getInstance().log('info', this.component, message, data);
  }

  warn(message: string, data?: unknown): void {
    Logger.getInstance().log('warn', this.component, message, data);
  }

  error(message: string, data?: unknown): void {
    Logger.getInstance().log('error', this.component, message, data);
  }

  isDebugEnabled(): boolean {
    return Logger.getInstance().isDebugEnabled(this.component);
  }
}
