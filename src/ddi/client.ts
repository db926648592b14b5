/**
 * DDI Store Client
 *
 * Pooled, rate-limited and retrying client for a WAPI-style DDI REST
 * interface. One instance owns one connection pool and one throttle; share
 * it between everything that talks to the same target and close it when done.
 */

import { Agent, fetch, type Dispatcher } from "undici";

import {
  AuthenticationError,
  TransientError,
  ValidationError,
  errorMessage,
} from "../errors.js";
import { ddiLogger } from "../logger.js";
import { chunk, sleep } from "../utils/async.js";
import {
  resolveDdiClientConfig,
  type DdiClientConfig,
  type DdiClientSettings,
} from "./config.js";
import { createCachedLookup } from "./dns-cache.js";
import { TokenBucket } from "./token-bucket.js";
import {
  ATTRIBUTE_DEF_RETURN_FIELDS,
  NETWORK_RETURN_FIELDS,
  NETWORK_VIEW_RETURN_FIELDS,
  WapiAttributeDefListSchema,
  WapiNetworkListSchema,
  WapiNetworkPageSchema,
  WapiNetworkViewListSchema,
  decode,
  extractRef,
  toAttributeDefinition,
  toNetworkView,
  toTargetNetwork,
} from "./wapi.js";
import { WorkerPool } from "./worker-pool.js";

import type {
  AttributeDefinition,
  AttributeType,
  BatchCreateResult,
  ExtAttrs,
  NetworkCandidate,
  NetworkView,
  TargetNetwork,
} from "../types/index.js";

// ============================================================================
// Types
// ============================================================================

type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

type QueryValue = string | number | undefined;

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  body?: unknown;
  signal?: AbortSignal;
}

export interface DdiClientOptions {
  /**
   * Dispatcher to send requests through instead of the client's own pooled
   * agent (an undici MockAgent in tests). The caller owns its lifecycle.
   */
  dispatcher?: Dispatcher;
}

export interface CreateNetworkInput {
  subnet: string;
  networkView: string;
  comment?: string;
  extattrs?: ExtAttrs;
}

export interface UpdateNetworkInput {
  comment?: string;
  extattrs?: ExtAttrs;
}

export interface BatchCreateOptions {
  batchSize?: number;
  batchDelayMs?: number;
  signal?: AbortSignal;
}

export interface CreateAttributeInput {
  name: string;
  type?: AttributeType;
  comment?: string;
}

interface DispatchResult {
  status: number;
  location: string | null;
  body: string;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_PAGE_SIZE = 1000;
export const DEFAULT_MAX_RESULTS = 10_000;
export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_BATCH_DELAY_MS = 500;

export const ATTRIBUTE_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9_]*$/;
export const MAX_ATTRIBUTE_NAME_LENGTH = 64;
export const RESERVED_ATTRIBUTE_NAMES: readonly string[] = [
  "network",
  "network_view",
  "comment",
  "_ref",
];

/**
 * Check an extensible attribute name. Returns the reason it is rejected, or
 * null when it is acceptable.
 */
export function checkAttributeName(name: string): string | null {
  if (name === "") return "Attribute name is required";
  if (name.length > MAX_ATTRIBUTE_NAME_LENGTH) {
    return `Attribute name must be at most ${String(MAX_ATTRIBUTE_NAME_LENGTH)} characters`;
  }
  if (!ATTRIBUTE_NAME_PATTERN.test(name)) {
    return "Attribute name must start with a letter and contain only letters, digits and underscores";
  }
  if (RESERVED_ATTRIBUTE_NAMES.includes(name.toLowerCase())) {
    return `Attribute name '${name}' is reserved`;
  }
  return null;
}

function networkPath(ref: string): string {
  return ref.startsWith("network/") ? ref : `network/${ref}`;
}

function parseBody(body: string): unknown {
  if (body === "") return null;
  try {
    return JSON.parse(body);
  } catch {
    // WAPI answers some writes with a bare reference string
    return body;
  }
}

// ============================================================================
// Client
// ============================================================================

export class DdiClient {
  readonly config: DdiClientConfig;
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly throttle: TokenBucket;
  private readonly pool: WorkerPool;
  private readonly externalDispatcher: Dispatcher | undefined;
  private agent: Agent | null = null;

  constructor(settings: DdiClientSettings, options: DdiClientOptions = {}) {
    this.config = resolveDdiClientConfig(settings);
    this.baseUrl = `${this.config.host}/${this.config.apiRoot}/v${this.config.apiVersion}/`;
    this.authorization = `Basic ${Buffer.from(
      `${this.config.username}:${this.config.password}`
    ).toString("base64")}`;
    this.throttle = new TokenBucket({
      ratePerSecond: this.config.requestsPerSecond,
    });
    this.pool = new WorkerPool({
      name: "ddi-requests",
      concurrency: this.config.maxConnections,
      maxQueueSize: this.config.maxQueuedRequests,
    });
    this.externalDispatcher = options.dispatcher;
  }

  /** Whether the pooled agent has been created and not yet closed */
  get isConnected(): boolean {
    return this.agent !== null;
  }

  /**
   * Release pooled connections. Safe to call more than once; a later request
   * opens a new pool.
   */
  async close(): Promise<void> {
    const agent = this.agent;
    if (agent === null) return;

    this.agent = null;
    await agent.close();
    ddiLogger.debug({ host: this.config.host }, "Closed DDI connection pool");
  }

  // ==========================================================================
  // Request execution
  // ==========================================================================

  /**
   * Send one WAPI request with throttling and retries.
   *
   * 200 resolves with the parsed body, 201 with `{ _ref }`. 401 throws
   * AuthenticationError at once; any other status or a transport failure is
   * retried up to `maxAttempts` times before TransientError is thrown.
   */
  async request(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {}
  ): Promise<unknown> {
    const url = this.buildUrl(path, options.query);
    const { maxAttempts, retryDelayMs } = this.config;

    let lastStatus: number | undefined;
    let lastBody: string | undefined;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      await this.throttle.acquire(options.signal);

      let result: DispatchResult | undefined;
      try {
        result = await this.pool.submit(() =>
          this.dispatch(method, url, options)
        );
      } catch (error) {
        if (options.signal?.aborted === true) throw error;
        lastError = error;
        lastStatus = undefined;
        lastBody = undefined;
      }

      if (result !== undefined) {
        if (result.status === 200) {
          return parseBody(result.body);
        }
        if (result.status === 201) {
          const ref =
            result.location ?? extractRef(parseBody(result.body), "create");
          return { _ref: ref };
        }
        if (result.status === 401) {
          ddiLogger.error({ method, path }, "DDI store rejected credentials");
          throw new AuthenticationError();
        }
        lastStatus = result.status;
        lastBody = result.body;
        lastError = undefined;
      }

      ddiLogger.warn(
        {
          method,
          path,
          attempt,
          maxAttempts,
          status: lastStatus,
          error: lastError === undefined ? undefined : errorMessage(lastError),
        },
        "DDI request failed"
      );

      if (attempt < maxAttempts) {
        await sleep(retryDelayMs * attempt, options.signal);
      }
    }

    const reason =
      lastStatus !== undefined
        ? `${String(lastStatus)} - ${lastBody ?? ""}`
        : errorMessage(lastError);
    throw new TransientError(
      `DDI request ${method} ${path} failed after ${String(maxAttempts)} attempts: ${reason}`,
      {
        status: lastStatus,
        body: lastBody,
        attempts: maxAttempts,
        cause: lastError,
      }
    );
  }

  private buildUrl(path: string, query?: Record<string, QueryValue>): URL {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url;
  }

  private async dispatch(
    method: HttpMethod,
    url: URL,
    options: RequestOptions
  ): Promise<DispatchResult> {
    const timeout = AbortSignal.timeout(this.config.totalTimeoutMs);
    const signal =
      options.signal === undefined
        ? timeout
        : AbortSignal.any([timeout, options.signal]);

    const headers: Record<string, string> = {
      Authorization: this.authorization,
      Accept: "application/json",
    };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    ddiLogger.debug(
      { method, url: url.toString() },
      "Sending request to DDI store"
    );

    const startTime = performance.now();
    const response = await fetch(url, {
      method,
      headers,
      body:
        options.body === undefined ? undefined : JSON.stringify(options.body),
      signal,
      dispatcher: this.getDispatcher(),
    });
    const body = await response.text();
    const duration = Math.round(performance.now() - startTime);

    ddiLogger.debug(
      {
        method,
        url: url.toString(),
        status: response.status,
        duration: `${String(duration)}ms`,
      },
      "Received response from DDI store"
    );

    return {
      status: response.status,
      location: response.headers.get("location"),
      body,
    };
  }

  private getDispatcher(): Dispatcher {
    if (this.externalDispatcher !== undefined) return this.externalDispatcher;

    if (this.agent === null) {
      this.agent = new Agent({
        connections: this.config.maxConnectionsPerHost,
        keepAliveTimeout: 30_000,
        connect: {
          timeout: this.config.connectTimeoutMs,
          rejectUnauthorized: this.config.verifyTls,
          lookup: createCachedLookup(this.config.dnsCacheTtlMs),
        },
      });
      ddiLogger.debug(
        {
          host: this.config.host,
          maxConnectionsPerHost: this.config.maxConnectionsPerHost,
        },
        "Opened DDI connection pool"
      );
    }
    return this.agent;
  }

  // ==========================================================================
  // Grid and views
  // ==========================================================================

  /**
   * Probe the store. Resolves false when it cannot be reached; bad
   * credentials still throw AuthenticationError.
   */
  async testConnection(signal?: AbortSignal): Promise<boolean> {
    try {
      await this.request("GET", "grid", { signal });
      return true;
    } catch (error) {
      if (!(error instanceof TransientError)) throw error;
      ddiLogger.warn(
        { host: this.config.host, error: error.message },
        "DDI store is not reachable"
      );
      return false;
    }
  }

  async getNetworkViews(signal?: AbortSignal): Promise<NetworkView[]> {
    const data = await this.request("GET", "networkview", {
      query: { _return_fields: NETWORK_VIEW_RETURN_FIELDS },
      signal,
    });
    return data === null
      ? []
      : decode(WapiNetworkViewListSchema, data, "network view").map(
          toNetworkView
        );
  }

  // ==========================================================================
  // Networks
  // ==========================================================================

  async getNetworks(
    networkView: string,
    maxResults = DEFAULT_MAX_RESULTS,
    signal?: AbortSignal
  ): Promise<TargetNetwork[]> {
    const data = await this.request("GET", "network", {
      query: {
        network_view: networkView,
        _return_fields: NETWORK_RETURN_FIELDS,
        _max_results: maxResults,
      },
      signal,
    });
    return data === null
      ? []
      : decode(WapiNetworkListSchema, data, "network").map(
          toTargetNetwork
        );
  }

  /**
   * All networks in a view, fetched page by page.
   *
   * Follows `next_page_id` until the store stops returning one; a store that
   * never does would keep this looping.
   */
  async listNetworksBatched(
    networkView: string,
    pageSize = DEFAULT_PAGE_SIZE,
    signal?: AbortSignal
  ): Promise<TargetNetwork[]> {
    const networks: TargetNetwork[] = [];
    let pageId: string | undefined;
    let pages = 0;

    do {
      const data = await this.request("GET", "network", {
        query: {
          network_view: networkView,
          _return_fields: NETWORK_RETURN_FIELDS,
          _max_results: pageSize,
          _paging: 1,
          _return_as_object: 1,
          _page_id: pageId,
        },
        signal,
      });
      pages++;

      if (Array.isArray(data)) {
        // Store ignored paging; the whole view came back at once
        networks.push(
          ...decode(WapiNetworkListSchema, data, "network").map(
            toTargetNetwork
          )
        );
        pageId = undefined;
      } else {
        const page = decode(WapiNetworkPageSchema, data, "network page");
        networks.push(...page.result.map(toTargetNetwork));
        pageId =
          page.next_page_id === undefined || page.next_page_id === ""
            ? undefined
            : page.next_page_id;
      }

      ddiLogger.debug(
        { networkView, pages, networks: networks.length },
        "Fetched network page"
      );
    } while (pageId !== undefined);

    ddiLogger.info(
      { networkView, pages, networks: networks.length },
      "Listed networks"
    );
    return networks;
  }

  async getNetworkBySubnet(
    subnet: string,
    networkView: string,
    signal?: AbortSignal
  ): Promise<TargetNetwork | null> {
    const data = await this.request("GET", "network", {
      query: {
        network: subnet,
        network_view: networkView,
        _return_fields: NETWORK_RETURN_FIELDS,
      },
      signal,
    });
    if (data === null) return null;

    const [first] = decode(WapiNetworkListSchema, data, "network");
    return first === undefined ? null : toTargetNetwork(first);
  }

  /**
   * Create a network and resolve with its reference
   */
  async createNetwork(
    input: CreateNetworkInput,
    signal?: AbortSignal
  ): Promise<string> {
    const body: Record<string, unknown> = {
      network: input.subnet,
      network_view: input.networkView,
      comment: input.comment ?? "",
    };
    if (
      input.extattrs !== undefined &&
      Object.keys(input.extattrs).length > 0
    ) {
      body.extattrs = input.extattrs;
    }

    const data = await this.request("POST", "network", { body, signal });
    const ref = extractRef(data, "network create");
    ddiLogger.info(
      { subnet: input.subnet, networkView: input.networkView, ref },
      "Created network"
    );
    return ref;
  }

  /**
   * Update a network's comment and/or attributes; resolves with its reference
   */
  async updateNetwork(
    ref: string,
    input: UpdateNetworkInput,
    signal?: AbortSignal
  ): Promise<string> {
    const body: Record<string, unknown> = {};
    if (input.comment !== undefined) body.comment = input.comment;
    if (input.extattrs !== undefined) body.extattrs = input.extattrs;

    const path = networkPath(ref);
    const data = await this.request("PUT", path, { body, signal });
    ddiLogger.info({ ref: path }, "Updated network");
    return data === null ? path : extractRef(data, "network update");
  }

  /**
   * Create many networks in fixed-size batches. Calls within a batch run
   * concurrently and fail independently; batches are separated by a pause.
   */
  async createNetworksBatch(
    candidates: readonly NetworkCandidate[],
    networkView: string,
    options: BatchCreateOptions = {}
  ): Promise<BatchCreateResult> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const batchDelayMs = options.batchDelayMs ?? DEFAULT_BATCH_DELAY_MS;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ValidationError("batchSize must be a positive integer", {
        batchSize,
      });
    }

    const result: BatchCreateResult = {
      createdCount: 0,
      failedCount: 0,
      errors: [],
    };

    const batches = chunk(candidates, batchSize);
    for (const [index, batch] of batches.entries()) {
      const failures = await Promise.all(
        batch.map(async (candidate) => {
          try {
            await this.createNetwork(
              {
                subnet: candidate.subnet,
                networkView,
                comment: candidate.comment,
                extattrs: candidate.extattrs,
              },
              options.signal
            );
            return null;
          } catch (error) {
            return `Failed to create network ${candidate.subnet}: ${errorMessage(error)}`;
          }
        })
      );

      for (const failure of failures) {
        if (failure === null) {
          result.createdCount++;
        } else {
          result.failedCount++;
          result.errors.push(failure);
        }
      }

      ddiLogger.debug(
        {
          batch: index + 1,
          size: batch.length,
          created: result.createdCount,
          failed: result.failedCount,
        },
        "Finished create batch"
      );

      if (index < batches.length - 1 && batchDelayMs > 0) {
        await sleep(batchDelayMs, options.signal);
      }
    }

    ddiLogger.info(
      {
        networkView,
        total: candidates.length,
        created: result.createdCount,
        failed: result.failedCount,
      },
      "Batch create completed"
    );
    return result;
  }

  // ==========================================================================
  // Extensible attributes
  // ==========================================================================

  async getExtensibleAttributes(
    signal?: AbortSignal
  ): Promise<AttributeDefinition[]> {
    const data = await this.request("GET", "extensibleattributedef", {
      query: { _return_fields: ATTRIBUTE_DEF_RETURN_FIELDS },
      signal,
    });
    return data === null
      ? []
      : decode(WapiAttributeDefListSchema, data, "attribute definition").map(
          toAttributeDefinition
        );
  }

  /**
   * Define a new extensible attribute; resolves with its reference
   *
   * @throws ValidationError when the name is malformed or reserved
   */
  async createExtensibleAttribute(
    input: CreateAttributeInput,
    signal?: AbortSignal
  ): Promise<string> {
    const problem = checkAttributeName(input.name);
    if (problem !== null) {
      throw new ValidationError(problem, { name: input.name });
    }

    const data = await this.request("POST", "extensibleattributedef", {
      body: {
        name: input.name,
        type: input.type ?? "STRING",
        comment: input.comment ?? "",
      },
      signal,
    });
    const ref = extractRef(data, "attribute create");
    ddiLogger.info({ name: input.name, ref }, "Created extensible attribute");
    return ref;
  }

  /**
   * Networks in a view whose attribute `name` equals `value`
   */
  async searchNetworksByAttribute(
    name: string,
    value: string,
    networkView: string,
    signal?: AbortSignal
  ): Promise<TargetNetwork[]> {
    const data = await this.request("GET", "network", {
      query: {
        network_view: networkView,
        [`*${name}`]: value,
        _return_fields: NETWORK_RETURN_FIELDS,
      },
      signal,
    });
    return data === null
      ? []
      : decode(WapiNetworkListSchema, data, "network").map(
          toTargetNetwork
        );
  }
}

/**
 * Run `fn` with a client for `settings`, closing it on every exit path
 */
export async function withDdiClient<T>(
  settings: DdiClientSettings,
  fn: (client: DdiClient) => Promise<T>,
  options?: DdiClientOptions
): Promise<T> {
  const client = new DdiClient(settings, options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
