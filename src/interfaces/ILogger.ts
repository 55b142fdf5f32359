/**
 * @fileoverview Interface for logging abstraction.
 *
 * Mirrors the public API of `ComponentLogger` so components can take a
 * logger by injection and tests can pass stubs.
 *
 * @module interfaces/ILogger
 */

/**
 * Interface for a component-scoped logger.
 *
 * @example
 * ```typescript
 * class HistoryReader {
 *   constructor(private readonly log: ILogger) {}
 *
 *   read(): void {
 *     this.log.info('Reading history');
 *     this.log.debug('Details', { limit: 20 });
 *   }
 * }
 * ```
 */
export interface ILogger {
  /**
   * Log at debug level.
   * Only emitted if debug logging is enabled for the component.
   *
   * @param data - Optional structured data or Error
   */
  debug(message: string, data?: unknown): void;

  info(message: string, data?: unknown): void;

  warn(message: string, data?: unknown): void;

  error(message: string, data?: unknown): void;

  /**
   * Check if debug logging is enabled.
   * Useful to skip expensive data formatting when debug is off.
   */
  isDebugEnabled(): boolean;
}
