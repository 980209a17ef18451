/**
 * Client for the `operations` collection of a Google Cloud API.
 * @module client/operations
 */

import { z } from 'zod';
import type { OperationsClientConfig } from '../config.js';
import { TransportError } from '../errors.js';
import type { OperationPoller } from '../poller/poller.js';
import {
  parseOperationResource,
  resolveOperationName,
  type OperationHandle,
  type OperationResource,
  type OperationScope,
} from '../types/operation.js';
import type { PollOptions, PollSuccess } from '../types/poll.js';
import type { AuthorizedTransport } from './transport.js';

/**
 * Options for listing operations.
 */
export interface ListOperationsOptions {
  /** Server-side filter expression */
  filter?: string;
  pageSize?: number;
  pageToken?: string;
}

/**
 * One page of operations.
 */
export interface OperationsPage {
  items: OperationResource[];
  nextPageToken?: string;
}

const ListOperationsResponseSchema = z.object({
  operations: z.array(z.unknown()).default([]),
  nextPageToken: z.string().optional(),
});

/**
 * Reads, lists, cancels, deletes and waits on long-running operations.
 *
 * @example
 * ```typescript
 * const context = createCloudContext({ config: configFromEnv() });
 * const handle = createOperationHandle('operation-1718', { project: 'my-project', location: 'us-central1' });
 * const { response } = await context.operations().wait(handle, { maxWaitMs: 600000 });
 * ```
 */
export class OperationsClient {
  constructor(
    private readonly config: OperationsClientConfig,
    private readonly transport: AuthorizedTransport,
    private readonly poller: OperationPoller
  ) {}

  /**
   * Gets the current snapshot of an operation.
   */
  async get(handle: OperationHandle): Promise<OperationResource> {
    const name = this.resolveName(handle);
    const response = await this.transport.request('GET', this.config.apiEndpoint, this.path(name), {
      label: 'operations.get',
      operationName: name,
    });
    return parseOperationResource(response.data, name);
  }

  /**
   * Lists one page of operations under `parent` (e.g. `projects/p/locations/l`).
   * An empty parent lists the API's top-level collection.
   */
  async list(parent: string, options: ListOperationsOptions = {}): Promise<OperationsPage> {
    const collection = parent ? `${parent}/operations` : 'operations';
    const response = await this.transport.request('GET', this.config.apiEndpoint, this.path(collection), {
      label: 'operations.list',
      query: {
        filter: options.filter,
        pageSize: options.pageSize,
        pageToken: options.pageToken,
      },
    });

    const result = ListOperationsResponseSchema.safeParse(response.data ?? {});
    if (!result.success) {
      throw TransportError.malformed(`Malformed list response for ${collection}`);
    }

    const page: OperationsPage = {
      items: result.data.operations.map((item) => parseOperationResource(item)),
    };
    if (result.data.nextPageToken) {
      page.nextPageToken = result.data.nextPageToken;
    }
    return page;
  }

  /**
   * Lists every operation under `parent`, following page tokens.
   */
  async listAll(parent: string, options: Omit<ListOperationsOptions, 'pageToken'> = {}): Promise<OperationResource[]> {
    const items: OperationResource[] = [];
    let pageToken: string | undefined;

    do {
      const page = await this.list(parent, { ...options, pageToken });
      items.push(...page.items);
      pageToken = page.nextPageToken;
    } while (pageToken);

    return items;
  }

  /**
   * Asks the server to cancel an operation. Success does not mean the
   * operation stopped; poll it to find out.
   */
  async cancel(handle: OperationHandle): Promise<void> {
    const name = this.resolveName(handle);
    await this.transport.request('POST', this.config.apiEndpoint, this.path(`${name}:cancel`), {
      label: 'operations.cancel',
      body: {},
      operationName: name,
    });
  }

  /**
   * Deletes an operation record.
   */
  async delete(handle: OperationHandle): Promise<void> {
    const name = this.resolveName(handle);
    await this.transport.request('DELETE', this.config.apiEndpoint, this.path(name), {
      label: 'operations.delete',
      operationName: name,
    });
  }

  /**
   * Polls an operation until it finishes. Unset timing options fall back
   * to the configured poll defaults.
   */
  async wait(handle: OperationHandle, options: PollOptions = {}): Promise<PollSuccess> {
    return this.poller.poll(handle, (h) => this.get(h), { ...this.config.polling, ...options });
  }

  /**
   * Status line for a request that was issued without waiting.
   */
  describeAsync(handle: OperationHandle, verb: string): string {
    return `${verb} request issued. Check operation [${handle.name}] for status.`;
  }

  /**
   * Resolves a handle to its relative name using the configured scope.
   */
  resolveName(handle: OperationHandle): string {
    const fallback: OperationScope = {
      project: this.config.projectId,
      location: this.config.defaultLocation,
    };
    return resolveOperationName(handle, fallback);
  }

  private path(relative: string): string {
    return `/${this.config.apiVersion}/${relative}`;
  }
}
