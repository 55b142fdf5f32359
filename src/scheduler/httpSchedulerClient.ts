/**
 * @fileoverview HTTP implementation of the scheduler client.
 *
 * Talks JSON over HTTP(S) with Basic credentials. Every call has an
 * overall deadline (connect + response + body). Transport failures are
 * mapped onto the mirror's error taxonomy:
 *
 * | Failure                         | Error                    |
 * |---------------------------------|--------------------------|
 * | refused / reset / DNS           | ConnectionError          |
 * | deadline exceeded               | TimeoutError             |
 * | HTTP 401 / 403                  | AuthError                |
 * | HTTP 404                        | NotFoundError            |
 * | other non-2xx                   | ConnectionError (status) |
 * | unparseable or unexpected body  | MalformedResponseError   |
 *
 * @module scheduler/httpSchedulerClient
 */

import * as http from 'http';
import * as https from 'https';
import type { SchedulerConfig } from '../core/config';
import type { ILogger } from '../interfaces/ILogger';
import type { ISchedulerClient, JobLogType } from '../interfaces/ISchedulerClient';
import type { Job, JobStatus, TriggerRecord } from '../types/job';
import {
  AuthError,
  ConnectionError,
  MalformedResponseError,
  MirrorError,
  NotFoundError,
  TimeoutError,
} from '../core/errors';
import { Logger } from '../core/logger';
import { formatSchemaErrors } from '../core/validation';
import { normalizeStatus, toJob, toTrigger } from './jobRecords';
import {
  validateJobArray,
  validateJobEnvelope,
  validateOutput,
  validateStatus,
  validateTriggers,
} from './schemas';

const TIMEOUT_CODES = new Set(['ETIMEDOUT', 'ESOCKETTIMEDOUT']);

interface HttpResponse {
  statusCode: number;
  body: string;
}

export interface HttpSchedulerClientDeps {
  log?: ILogger;
}

/**
 * Scheduler client speaking the scheduler's REST API.
 *
 * @example
 * ```typescript
 * const client = new HttpSchedulerClient(config.scheduler);
 * const jobs = await client.listJobs(config.scheduler.jobDirectory);
 * ```
 */
export class HttpSchedulerClient implements ISchedulerClient {
  private readonly baseUrl: string;
  private readonly log: ILogger;

  constructor(private readonly config: SchedulerConfig, deps: HttpSchedulerClientDeps = {}) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.log = deps.log ?? Logger.for('scheduler-client');
  }

  async listJobs(directory: string): Promise<Job[]> {
    const query: Record<string, string> = directory ? { directory } : {};
    const data = await this.getJson('/api/jobs', query);

    if (validateJobArray(data)) {
      return data.map(toJob);
    }
    if (validateJobEnvelope(data)) {
      return data.jobs.map(toJob);
    }
    throw new MalformedResponseError(
      'Unexpected job list format: expected an array of jobs or an object with a jobs array',
      formatSchemaErrors(validateJobArray.errors)
    );
  }

  async listTriggers(jobId: string): Promise<TriggerRecord[]> {
    const data = await this.getJson(`/api/jobs/${encodeURIComponent(jobId)}/dependencies`);
    if (!validateTriggers(data)) {
      throw new MalformedResponseError(
        `Unexpected trigger list format for job ${jobId}`,
        formatSchemaErrors(validateTriggers.errors)
      );
    }
    return data.map(toTrigger);
  }

  async getStatus(jobId: string): Promise<JobStatus> {
    const data = await this.getJson(`/api/jobs/${encodeURIComponent(jobId)}/status`);
    if (!validateStatus(data)) {
      throw new MalformedResponseError(
        `Unexpected status format for job ${jobId}`,
        formatSchemaErrors(validateStatus.errors)
      );
    }
    return normalizeStatus(data.status);
  }

  async getOutput(jobId: string): Promise<string> {
    const data = await this.getJson(`/api/jobs/${encodeURIComponent(jobId)}/output`);
    if (typeof data === 'string') {
      return data;
    }
    if (!validateOutput(data)) {
      throw new MalformedResponseError(
        `Unexpected output format for job ${jobId}`,
        formatSchemaErrors(validateOutput.errors)
      );
    }
    return typeof data.output === 'string' ? data.output : '';
  }

  async getLog(jobId: string, logType: JobLogType): Promise<string> {
    const response = await this.request(
      `/api/jobs/${encodeURIComponent(jobId)}/logs/${logType}`,
      {},
      'text/plain'
    );
    return response.body;
  }

  private async getJson(path: string, query: Record<string, string> = {}): Promise<unknown> {
    const response = await this.request(path, query, 'application/json');
    try {
      return JSON.parse(response.body);
    } catch (error) {
      throw new MalformedResponseError(`Response from ${path} is not valid JSON`, [], { cause: error });
    }
  }

  /**
   * Perform a GET and resolve with a 2xx response, or reject with a
   * {@link MirrorError}.
   */
  private request(path: string, query: Record<string, string>, accept: string): Promise<HttpResponse> {
    const url = new URL(this.baseUrl + path);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }
    const client = url.protocol === 'https:' ? https : http;
    const timeoutMs = this.config.timeoutMs;

    const headers: http.OutgoingHttpHeaders = {
      Accept: accept,
      'Content-Type': 'application/json',
    };
    if (this.config.username) {
      const credentials = Buffer.from(`${this.config.username}:${this.config.password}`).toString('base64');
      headers.Authorization = `Basic ${credentials}`;
    }

    this.log.debug(`GET ${url.pathname}${url.search}`);

    return new Promise<HttpResponse>((resolve, reject) => {
      let settled = false;
      const fail = (error: MirrorError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.log.warn(`GET ${url.pathname} failed: ${error.message}`, { kind: error.kind });
        reject(error);
      };

      const req = client.request(
        {
          method: 'GET',
          protocol: url.protocol,
          hostname: url.hostname,
          port: url.port || (url.protocol === 'https:' ? 443 : 80),
          path: url.pathname + url.search,
          headers,
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('error', (err) => fail(new ConnectionError(`Response from scheduler interrupted: ${err.message}`, undefined, { cause: err })));
          res.on('end', () => {
            if (settled) return;
            const statusCode = res.statusCode ?? 0;
            const body = Buffer.concat(chunks).toString('utf-8');
            const statusError = this.statusError(statusCode, body, path);
            if (statusError) {
              fail(statusError);
              return;
            }
            settled = true;
            clearTimeout(timer);
            resolve({ statusCode, body });
          });
        }
      );

      const timer = setTimeout(() => {
        fail(new TimeoutError(`Connection to scheduler timed out after ${timeoutMs} ms. Server may be unresponsive.`, timeoutMs));
        req.destroy();
      }, timeoutMs);

      req.on('error', (err: NodeJS.ErrnoException) => {
        if (err.code && TIMEOUT_CODES.has(err.code)) {
          fail(new TimeoutError(`Connection to scheduler timed out: ${err.message}`, timeoutMs));
        } else {
          fail(new ConnectionError(
            `Unable to connect to scheduler at ${url.host}: ${err.message}. Check network connectivity and server address.`,
            undefined,
            { cause: err }
          ));
        }
      });

      req.end();
    });
  }

  private statusError(statusCode: number, body: string, path: string): MirrorError | undefined {
    if (statusCode >= 200 && statusCode < 300) return undefined;
    switch (statusCode) {
      case 401:
        return new AuthError('Authentication failed. Check username and password.', statusCode);
      case 403:
        return new AuthError('Access denied. Check user permissions.', statusCode);
      case 404:
        return new NotFoundError(`Scheduler resource not found: ${path}`);
      default:
        return new ConnectionError(`HTTP error ${statusCode}: ${body.slice(0, 200)}`, statusCode);
    }
  }
}
