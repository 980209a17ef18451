/**
 * BigQuery jobs client.
 *
 * BigQuery jobs are not google.longrunning operations; their snapshots are
 * adapted so they wait through the same poller.
 * @module client/jobs
 */

import { z } from 'zod';
import type { OperationsClientConfig } from '../config.js';
import { TransportError } from '../errors.js';
import type { OperationPoller } from '../poller/poller.js';
import { operationHandleFromJob } from '../references/parse.js';
import type { JobReference } from '../references/types.js';
import type { OperationResource } from '../types/operation.js';
import type { PollOptions } from '../types/poll.js';
import type { AuthorizedTransport } from './transport.js';

const JobErrorResultSchema = z.object({
  reason: z.string().default(''),
  location: z.string().optional(),
  message: z.string().default(''),
});

/**
 * Wire shape of a BigQuery job. Fields beyond the ones read here are kept.
 */
export const BigQueryJobSchema = z
  .object({
    jobReference: z.object({
      projectId: z.string(),
      jobId: z.string(),
      location: z.string().optional(),
    }),
    status: z.object({
      state: z.enum(['PENDING', 'RUNNING', 'DONE']),
      errorResult: JobErrorResultSchema.optional(),
      errors: z.array(JobErrorResultSchema).optional(),
    }),
  })
  .passthrough();

export type BigQueryJob = z.infer<typeof BigQueryJobSchema>;

export type JobErrorResult = z.infer<typeof JobErrorResultSchema>;

const CancelJobResponseSchema = z.object({ job: BigQueryJobSchema });

/**
 * google.rpc.Code for BigQuery error reasons.
 */
const REASON_CODES: Record<string, number> = {
  notFound: 5,
  accessDenied: 7,
  invalid: 3,
  invalidQuery: 3,
  quotaExceeded: 8,
  rateLimitExceeded: 8,
  resourcesExceeded: 8,
  timeout: 4,
  stopped: 1,
  backendError: 13,
  internalError: 13,
};

/**
 * Maps a BigQuery error reason to a google.rpc.Code; unknown reasons are UNKNOWN (2).
 */
export function jobReasonToCode(reason: string): number {
  return REASON_CODES[reason] ?? 2;
}

/**
 * Validates a BigQuery job body.
 *
 * @throws {TransportError} of kind MalformedResponse
 */
export function parseBigQueryJob(body: unknown, operationName?: string): BigQueryJob {
  const result = BigQueryJobSchema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw TransportError.malformed(
      `Malformed BigQuery job${issue ? ` at ${issue.path.join('.')}: ${issue.message}` : ''}`,
      operationName
    );
  }
  return result.data;
}

/**
 * Presents a job snapshot as an operation snapshot. A failed job's
 * `errorResult` comes first in the error details, followed by every entry
 * of `status.errors`.
 */
export function jobAsOperation(job: BigQueryJob): OperationResource {
  const { projectId, jobId, location } = job.jobReference;
  const operation: OperationResource = {
    name: `projects/${projectId}/jobs/${jobId}`,
    done: job.status.state === 'DONE',
    metadata: { state: job.status.state },
  };
  if (!operation.done) {
    return operation;
  }

  const errorResult = job.status.errorResult;
  if (errorResult) {
    operation.error = {
      code: jobReasonToCode(errorResult.reason),
      message: errorResult.message,
      details: [
        { reason: errorResult.reason, location: errorResult.location ?? location },
        ...(job.status.errors ?? []).map((entry) => ({
          reason: entry.reason,
          location: entry.location,
          message: entry.message,
        })),
      ],
    };
  } else {
    operation.response = job;
  }
  return operation;
}

/**
 * Result of waiting on a job.
 */
export interface JobWaitResult {
  job: BigQueryJob;
  pollCount: number;
  durationMs: number;
}

/**
 * Reads, cancels and waits on BigQuery jobs.
 */
export class JobsClient {
  constructor(
    private readonly config: OperationsClientConfig,
    private readonly transport: AuthorizedTransport,
    private readonly poller: OperationPoller
  ) {}

  /**
   * Gets a job.
   */
  async get(ref: JobReference): Promise<BigQueryJob> {
    const handle = operationHandleFromJob(ref);
    const response = await this.transport.request('GET', this.config.bigQueryEndpoint, this.jobPath(ref), {
      label: 'jobs.get',
      query: { location: ref.location },
      operationName: handle.name,
    });
    return parseBigQueryJob(response.data, handle.name);
  }

  /**
   * Requests cancellation of a job and returns the job as of the request.
   */
  async cancel(ref: JobReference): Promise<BigQueryJob> {
    const handle = operationHandleFromJob(ref);
    const response = await this.transport.request('POST', this.config.bigQueryEndpoint, `${this.jobPath(ref)}/cancel`, {
      label: 'jobs.cancel',
      query: { location: ref.location },
      operationName: handle.name,
    });
    const result = CancelJobResponseSchema.safeParse(response.data);
    if (!result.success) {
      throw TransportError.malformed('Malformed cancel response', handle.name);
    }
    return result.data.job;
  }

  /**
   * Polls a job until it is DONE. A job that finished with an error
   * raises OperationFailedError with the code of its error reason.
   */
  async wait(ref: JobReference, options: PollOptions = {}): Promise<JobWaitResult> {
    const handle = operationHandleFromJob(ref);
    const result = await this.poller.poll(handle, async () => jobAsOperation(await this.get(ref)), {
      ...this.config.polling,
      ...options,
    });
    return {
      job: parseBigQueryJob(result.response, handle.name),
      pollCount: result.pollCount,
      durationMs: result.durationMs,
    };
  }

  private jobPath(ref: JobReference): string {
    return `/bigquery/v2/projects/${encodeURIComponent(ref.projectId)}/jobs/${encodeURIComponent(ref.jobId)}`;
  }
}
