/**
 * @fileoverview Normalisation of raw scheduler records into typed jobs.
 *
 * The scheduler's payloads are only loosely specified: ids may be numbers,
 * statuses use their own vocabulary, and timestamps are free text. Shape
 * is checked by schema first; this module maps the loose fields.
 *
 * @module scheduler/jobRecords
 */

import type { Job, JobStatus, TriggerRecord } from '../types/job';
import type { RawJob, RawTrigger } from './schemas';

const STATUS_ALIASES: Readonly<Record<string, JobStatus>> = {
  success: 'success',
  succeeded: 'success',
  completed: 'success',
  complete: 'success',
  ok: 'success',
  failed: 'failed',
  failure: 'failed',
  error: 'failed',
  aborted: 'failed',
  running: 'running',
  active: 'running',
  executing: 'running',
  pending: 'pending',
  queued: 'pending',
  waiting: 'pending',
  scheduled: 'pending',
};

const ISO_8601 = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Map a scheduler status onto the closed status set.
 * Matching ignores case and surrounding whitespace; anything else is `unknown`.
 */
export function normalizeStatus(raw: unknown): JobStatus {
  if (typeof raw !== 'string') return 'unknown';
  return STATUS_ALIASES[raw.trim().toLowerCase()] ?? 'unknown';
}

/**
 * Keep `raw` only if it is an ISO-8601 date or date-time naming a real
 * instant. Returns the trimmed text, or `undefined`.
 */
export function parseTimestamp(raw: unknown): string | undefined {
  if (typeof raw !== 'string') return undefined;
  const text = raw.trim();
  if (!ISO_8601.test(text) || Number.isNaN(Date.parse(text))) {
    return undefined;
  }
  return text;
}

export function toJob(raw: RawJob): Job {
  const startTime = parseTimestamp(raw.start_time ?? raw.startTime);
  const endTime = parseTimestamp(raw.end_time ?? raw.endTime);
  return {
    id: String(raw.id),
    name: raw.name,
    status: normalizeStatus(raw.status),
    ...(startTime !== undefined ? { startTime } : {}),
    ...(endTime !== undefined ? { endTime } : {}),
  };
}

export function toTrigger(raw: RawTrigger): TriggerRecord {
  return { triggeredJobName: 'triggered_job_name' in raw ? raw.triggered_job_name : raw.triggeredJobName };
}
