/**
 * Client module.
 * @module client
 */

export { buildUrl, httpRequest, type HttpMethod, type HttpResponse, type QueryParams } from './http.js';
export { AuthorizedTransport, type TransportDeps, type TransportRequest } from './transport.js';
export { OperationsClient, type ListOperationsOptions, type OperationsPage } from './operations.js';
export {
  JobsClient,
  BigQueryJobSchema,
  jobAsOperation,
  jobReasonToCode,
  parseBigQueryJob,
  type BigQueryJob,
  type JobErrorResult,
  type JobWaitResult,
} from './jobs.js';
