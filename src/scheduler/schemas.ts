/**
 * @fileoverview JSON Schema definitions for scheduler responses.
 *
 * Responses are checked before any field is read; a mismatch becomes a
 * `MalformedResponseError`. Fields whose format varies between scheduler
 * versions (status, timestamps) are left open here and normalised in
 * `jobRecords`.
 *
 * @module scheduler/schemas
 */

import { ajv } from '../core/validation';

/**
 * A job as listed by `GET /api/jobs`.
 */
export interface RawJob {
  id: string | number;
  name: string;
  status?: unknown;
  start_time?: unknown;
  startTime?: unknown;
  end_time?: unknown;
  endTime?: unknown;
}

/**
 * One entry of `GET /api/jobs/{id}/dependencies`. Older servers use the
 * snake_case field.
 */
export type RawTrigger = { triggered_job_name: string } | { triggeredJobName: string };

export interface RawStatus {
  status?: unknown;
}

export interface RawOutput {
  output?: unknown;
}

const rawJobSchema = {
  type: 'object',
  required: ['id', 'name'],
  properties: {
    id: { type: ['string', 'integer'] },
    name: { type: 'string', minLength: 1 },
    status: {},
    start_time: {},
    startTime: {},
    end_time: {},
    endTime: {},
  },
};

export const validateJobArray = ajv.compile<RawJob[]>({
  type: 'array',
  items: rawJobSchema,
});

/** `{ jobs: [...] }` envelope some scheduler versions return */
export const validateJobEnvelope = ajv.compile<{ jobs: RawJob[] }>({
  type: 'object',
  required: ['jobs'],
  properties: {
    jobs: { type: 'array', items: rawJobSchema },
  },
});

export const validateTriggers = ajv.compile<RawTrigger[]>({
  type: 'array',
  items: {
    type: 'object',
    anyOf: [
      { type: 'object', required: ['triggered_job_name'], properties: { triggered_job_name: { type: 'string', minLength: 1 } } },
      { type: 'object', required: ['triggeredJobName'], properties: { triggeredJobName: { type: 'string', minLength: 1 } } },
    ],
  },
});

export const validateStatus = ajv.compile<RawStatus>({
  type: 'object',
  properties: {
    status: {},
  },
});

export const validateOutput = ajv.compile<RawOutput>({
  type: 'object',
  properties: {
    output: {},
  },
});
