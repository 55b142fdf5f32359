/**
 * @fileoverview Central export for all type definitions.
 *
 * @module types
 */

export * from './job';
export * from './snapshot';
