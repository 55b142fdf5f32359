/**
 * @fileoverview Error taxonomy for the scheduler mirror.
 *
 * Every failure the core reports is a {@link MirrorError} carrying a
 * discriminating `kind` plus the underlying message, so that a caller
 * (CLI, request layer) can pick its response without parsing text.
 *
 * @module core/errors
 */

/**
 * Discriminator for every error the core raises.
 */
export type MirrorErrorKind =
  | 'connection'
  | 'timeout'
  | 'auth'
  | 'not-found'
  | 'malformed-response'
  | 'cache-io'
  | 'cyclic-graph'
  | 'history-io'
  | 'config';

/**
 * Base class for all mirror errors.
 */
export abstract class MirrorError extends Error {
  abstract readonly kind: MirrorErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The scheduler could not be reached, or answered with an unexpected HTTP status.
 */
export class ConnectionError extends MirrorError {
  readonly kind = 'connection';

  constructor(message: string, public readonly statusCode?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * A scheduler call did not complete within the configured timeout.
 */
export class TimeoutError extends MirrorError {
  readonly kind = 'timeout';

  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
  }
}

/**
 * The scheduler rejected the configured credentials (401) or denied access (403).
 */
export class AuthError extends MirrorError {
  readonly kind = 'auth';

  constructor(message: string, public readonly statusCode: number) {
    super(message);
  }
}

export class NotFoundError extends MirrorError {
  readonly kind = 'not-found';
}

/**
 * The scheduler answered, but the body does not have the expected shape.
 */
export class MalformedResponseError extends MirrorError {
  readonly kind = 'malformed-response';

  constructor(message: string, public readonly details: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CacheIOError extends MirrorError {
  readonly kind = 'cache-io';
}

export class HistoryIOError extends MirrorError {
  readonly kind = 'history-io';
}

/**
 * Raised by the layout engine when the trigger graph contains a cycle.
 * `cycle` lists the node names along the cycle, first node repeated at the end.
 */
export class CyclicGraphError extends MirrorError {
  readonly kind = 'cyclic-graph';

  constructor(public readonly cycle: string[]) {
    super(`Circular trigger chain detected: ${cycle.join(' -> ')}`);
  }
}

/**
 * Configuration values failed validation.
 */
export class ConfigError extends MirrorError {
  readonly kind = 'config';

  constructor(message: string, public readonly details: string[] = []) {
    super(message);
  }
}

export function isMirrorError(value: unknown): value is MirrorError {
  return value instanceof MirrorError;
}

/**
 * Extract a message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
