/**
 * Shared test fixtures: run configuration, fuzz knobs, test cases, a routed
 * fake fetch and a scriptable adapter.
 */

import { buildRunConfig, configSchema, defaultOperationWeights, type FuzzKnobs, type RunConfig } from "@vecdiff/config";
import type { VectorStoreAdapter } from "../../adapters/types.js";
import type { FetchLike } from "../../http/service-client.js";
import { parseJsonLenient } from "../../http/json.js";
import type { DatabaseResult, HealthStatus, ResultData, SearchHit, TestCase } from "../../types/domain.js";

// =============================================================================
// Configuration
// =============================================================================

export function createTestRunConfig(env: Record<string, string> = {}): RunConfig {
  const parsed = configSchema.parse({
    NODE_ENV: "test",
    ENABLED_SERVICES: "",
    MEMORY_SERVICES: "mem-a:strict,mem-b:strict",
    VECTOR_DIMENSION: "4",
    HEALTH_RETRY_DELAY_MS: "0",
    HEALTH_INTERVAL_MS: "0",
    CLEANUP_COLLECTIONS: "false",
    ...env,
  });
  return buildRunConfig(parsed);
}

export function createTestKnobs(overrides: Partial<FuzzKnobs> = {}): FuzzKnobs {
  return {
    operationWeights: defaultOperationWeights(),
    dimension: { min: 4, max: 4 },
    oversizedDimension: { min: 8, max: 16 },
    edgeValueProbability: 0.05,
    wideRangeProbability: 0.1,
    emptyVectorProbability: 0.02,
    oversizedVectorProbability: 0.02,
    malformedIdProbability: 0.05,
    reuseIdProbability: 0.5,
    metadataProbability: 0.5,
    maxMetadataFields: 3,
    specialCharProbability: 0.1,
    malformedCollectionProbability: 0.05,
    curatedEdgeCaseProbability: 0.1,
    maxVectorsPerInsert: 3,
    maxBatchInsert: 10,
    maxQueries: 3,
    k: { min: 1, max: 5 },
    metrics: ["L2", "cosine", "inner_product"],
    collections: ["test_collection"],
    idSpace: 50,
    largeBatchSize: 20,
    ...overrides,
  };
}

// =============================================================================
// Test Cases & Results
// =============================================================================

export function searchCase(id = 1, overrides: { k?: number; query?: number[] } = {}): TestCase {
  return {
    id,
    operation: "search",
    parameters: { collection: "test_collection", query: overrides.query ?? [0.1, 0.2, 0.3, 0.4], k: overrides.k ?? 3, metric: "L2" },
  };
}

export function insertCase(id = 1, vectors: number[][] = [[0.1, 0.2, 0.3, 0.4]], ids?: string[]): TestCase {
  return {
    id,
    operation: "insert",
    parameters: {
      collection: "test_collection",
      vectors,
      ids: ids ?? vectors.map((_, index) => `id_${index + 1}`),
      metadata: vectors.map(() => null),
    },
  };
}

export function deleteCase(id = 1, ids: string[] = ["nonexistent"]): TestCase {
  return { id, operation: "delete", parameters: { collection: "test_collection", ids } };
}

export function hits(...ids: string[]): SearchHit[] {
  return ids.map((id, index) => ({ id, score: index * 0.1 }));
}

export function success(service: string, data: ResultData): DatabaseResult {
  return { service, success: true, data, executionTimeMs: 1 };
}

export function failure(
  service: string,
  kind: "ConnectionError" | "Timeout" | "ProtocolError" | "ServiceError" | "UnsupportedMetric" = "ServiceError",
  message = "rejected"
): DatabaseResult {
  return { service, success: false, error: { kind, message }, executionTimeMs: 1 };
}

// =============================================================================
// Fake fetch
// =============================================================================

export interface RecordedRequest {
  method: string;
  /** Path plus query string */
  path: string;
  headers: Record<string, string>;
  /** Raw request body text */
  text: string | undefined;
  /** Parsed request body (bare NaN/Infinity accepted) */
  body: unknown;
}

export interface FakeResponse {
  status?: number;
  body?: unknown;
  /** Raw body text; wins over body */
  text?: string;
}

export type RouteHandler = (request: RecordedRequest) => FakeResponse | Error;

/**
 * Fetch stub keyed by "METHOD /path?query". Unknown routes answer 404 with
 * an empty body, the way a server without the route does.
 */
export function createFakeFetch(routes: Record<string, RouteHandler | FakeResponse | Error>) {
  const requests: RecordedRequest[] = [];

  const fetchImpl: FetchLike = async (input, init) => {
    const url = new URL(input);
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const text = typeof init.body === "string" ? init.body : undefined;
    const request: RecordedRequest = {
      method: init.method ?? "GET",
      path: `${url.pathname}${url.search}`,
      headers,
      text,
      body: text === undefined ? undefined : parseJsonLenient(text),
    };
    requests.push(request);

    const route = routes[`${request.method} ${request.path}`];
    if (route === undefined) {
      return new Response("", { status: 404 });
    }
    const outcome = typeof route === "function" ? route(request) : route;
    if (outcome instanceof Error) throw outcome;
    return new Response(outcome.text ?? JSON.stringify(outcome.body ?? {}), { status: outcome.status ?? 200 });
  };

  return { fetchImpl, requests };
}

// =============================================================================
// Scriptable adapter
// =============================================================================

export interface StubAdapterOptions {
  name: string;
  reachable?: boolean | (() => boolean);
  /** Result of every search; an Error is thrown instead */
  search?: SearchHit[] | Error | (() => Promise<SearchHit[]>);
  insert?: string[] | Error;
  delete?: number | Error;
}

/** Adapter whose answers are fixed by the test; records the operations it saw */
export function createStubAdapter(options: StubAdapterOptions): VectorStoreAdapter & { calls: string[]; healthChecks: number } {
  const calls: string[] = [];
  let healthChecks = 0;

  const isReachable = () =>
    typeof options.reachable === "function" ? options.reachable() : (options.reachable ?? true);

  const health = (): HealthStatus =>
    isReachable()
      ? { service: options.name, reachable: true, checkedAt: new Date().toISOString() }
      : { service: options.name, reachable: false, error: "connection refused", checkedAt: new Date().toISOString() };

  return {
    name: options.name,
    kind: "memory",
    calls,
    get healthChecks() {
      return healthChecks;
    },
    async connect() {
      calls.push("connect");
    },
    async ensureCollection(name) {
      calls.push(`ensureCollection:${name}`);
    },
    async insert(_collection, _vectors, ids) {
      calls.push("insert");
      if (options.insert instanceof Error) throw options.insert;
      return { ids: options.insert ?? [...ids] };
    },
    async search() {
      calls.push("search");
      if (options.search instanceof Error) throw options.search;
      if (typeof options.search === "function") return options.search();
      return options.search ?? [];
    },
    async delete() {
      calls.push("delete");
      if (options.delete instanceof Error) throw options.delete;
      return options.delete ?? 0;
    },
    async healthCheck() {
      healthChecks++;
      return health();
    },
    async dropCollection(name) {
      calls.push(`dropCollection:${name}`);
    },
    async close() {
      calls.push("close");
    },
  };
}
