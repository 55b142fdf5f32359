/**
 * @fileoverview JSON Schema validation using Ajv.
 *
 * Used for everything that crosses a trust boundary: scheduler responses,
 * persisted snapshot and history files, and configuration values.
 *
 * @module core/validation
 */

import Ajv, { type ErrorObject } from 'ajv';

/**
 * Ajv instance for data that must already have the right types
 * (scheduler responses, persisted files).
 *
 * Configuration:
 * - allErrors: true - Collect all errors, not just the first
 * - strict: true - Enforce strict mode
 * - allowUnionTypes: true - Allow `type: ['string', 'null']`
 */
export const ajv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
});

/**
 * Ajv instance for configuration, where every value starts as an
 * environment string. Coerces scalars, splits nothing, fills defaults.
 */
export const coercingAjv = new Ajv({
  allErrors: true,
  strict: true,
  allowUnionTypes: true,
  coerceTypes: true,
  useDefaults: true,
});

/**
 * Format Ajv errors into one line per violation.
 * Duplicate `path:keyword` pairs are reported once.
 */
export function formatSchemaErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ['Validation failed (no details available)'];
  }

  const messages: string[] = [];
  const seenPaths = new Set<string>();

  for (const err of errors) {
    const path = err.instancePath || '/';
    const key = `${path}:${err.keyword}`;
    if (seenPaths.has(key)) continue;
    seenPaths.add(key);

    switch (err.keyword) {
      case 'required':
        messages.push(`Missing required field '${err.params.missingProperty}' at ${path}`);
        break;
      case 'type':
        messages.push(`Expected ${err.params.type} at ${path}`);
        break;
      case 'enum':
        messages.push(`Invalid value at ${path}. Allowed: ${(err.params.allowedValues ?? []).join(', ')}`);
        break;
      case 'minimum':
        messages.push(`Value at ${path} is too small (min ${err.params.limit})`);
        break;
      case 'maximum':
        messages.push(`Value at ${path} is too large (max ${err.params.limit})`);
        break;
      case 'minLength':
        messages.push(`Value at ${path} is too short (min ${err.params.limit} chars)`);
        break;
      default:
        messages.push(`${err.keyword} error at ${path}: ${err.message}`);
    }
  }

  return messages;
}
