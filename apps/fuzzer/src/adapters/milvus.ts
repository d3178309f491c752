import { z } from "zod";
import { ConnectionError, ServiceError } from "../errors.js";
import { ServiceHttpClient, truncate, type ServiceResponse } from "../http/service-client.js";
import { log } from "../logger.js";
import type { HealthStatus, Metadata, Metric, SearchHit, Vector } from "../types/domain.js";
import { probeEndpoints, type ProbeEndpoint } from "./probes.js";
import { bearer, isAlreadyExists, type AdapterOptions } from "./shared.js";
import type { CallContext, InsertOutcome, VectorStoreAdapter } from "./types.js";

// =============================================================================
// Milvus (REST v2, legacy v1)
// =============================================================================
// Milvus answers HTTP 200 for most failures and reports them in the envelope:
// { code, message, data }. Success is code 0 (v2) or 200 (v1).
// The metric goes with every search and the service decides whether it fits
// the collection's index.
// =============================================================================

export type MilvusDialect = "v2" | "v1";

const METRIC_TYPES: Record<Metric, string> = {
  L2: "L2",
  cosine: "COSINE",
  inner_product: "IP",
};

const SUCCESS_CODES = new Set([0, 200]);

const envelopeSchema = z.object({
  code: z.number(),
  message: z.string().optional(),
  data: z.unknown().optional(),
});

const hasSchema = z.object({ has: z.boolean() });

const insertSchema = z.object({
  insertIds: z.array(z.union([z.string(), z.number()])).optional(),
  insertCount: z.number().optional(),
});

const searchSchema = z.array(
  z.object({
    id: z.union([z.string(), z.number()]),
    distance: z.number(),
  }).passthrough()
);

const getSchema = z.array(z.object({ id: z.union([z.string(), z.number()]) }).passthrough());

const PROBES: readonly ProbeEndpoint[] = [
  { path: "/healthz" },
  { path: "/api/v1/health" },
  { path: "/v2/vectordb/collections/list", method: "POST", body: {}, dialect: "v2" },
  { path: "/v1/vector/collections", dialect: "v1" },
];

export class MilvusAdapter implements VectorStoreAdapter {
  readonly name: string;
  readonly kind = "milvus";
  private readonly client: ServiceHttpClient;
  private readonly metric: Metric;
  private readonly probeTimeoutMs: number;
  private dialect: MilvusDialect | null = null;

  constructor(options: AdapterOptions) {
    this.name = options.service.name;
    this.metric = options.metric;
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.client = new ServiceHttpClient({
      service: options.service.name,
      baseUrl: options.service.url,
      timeoutMs: options.service.timeoutMs,
      headers: bearer(options.service.apiKey),
      fetchImpl: options.fetchImpl,
    });
  }

  get detectedDialect(): MilvusDialect | null {
    return this.dialect;
  }

  async connect(ctx?: CallContext): Promise<void> {
    if (this.dialect) return;

    const health = await this.healthCheck(ctx);
    if (!health.reachable) {
      throw new ConnectionError(this.name, `Milvus unreachable: ${health.error ?? "no probe answered"}`);
    }

    // Servers without the v2 REST API answer 404 on its routes
    const response = await this.client.request({
      method: "POST",
      path: "/v2/vectordb/collections/list",
      body: {},
      signal: ctx?.signal,
    });
    this.dialect = response.status === 404 ? "v1" : "v2";
    log.adapter.info({ service: this.name, dialect: this.dialect }, "connected");
  }

  async ensureCollection(name: string, dimension: number, ctx?: CallContext): Promise<void> {
    const dialect = await this.requireDialect(ctx);

    if (dialect === "v2") {
      const has = await this.call("/v2/vectordb/collections/has", { collectionName: name }, "has collection", ctx);
      if (this.client.parse(has, hasSchema, "has collection", has.data ?? {}).has) return;
    }

    const body =
      dialect === "v2"
        ? {
            collectionName: name,
            dimension,
            metricType: METRIC_TYPES[this.metric],
            idType: "VarChar",
            primaryFieldName: "id",
            vectorFieldName: "vector",
            params: { max_length: 65535 },
          }
        : {
            collectionName: name,
            dimension,
            metricType: METRIC_TYPES[this.metric],
            primaryField: "id",
            vectorField: "vector",
          };

    try {
      await this.call(this.path("collections/create", dialect), body, "create collection", ctx);
      log.adapter.info({ service: this.name, collection: name, dimension }, "collection created");
    } catch (error) {
      if (error instanceof ServiceError && isAlreadyExists(error.message)) return;
      throw error;
    }
  }

  async insert(
    collection: string,
    vectors: readonly Vector[],
    ids: readonly string[],
    metadata?: readonly (Metadata | null)[],
    ctx?: CallContext
  ): Promise<InsertOutcome> {
    const dialect = await this.requireDialect(ctx);
    const data = vectors.map((vector, index) => ({
      id: ids[index],
      vector,
      ...(metadata?.[index] && { metadata: metadata[index] }),
    }));

    const path = dialect === "v2" ? "/v2/vectordb/entities/insert" : "/v1/vector/insert";
    const result = await this.call(path, { collectionName: collection, data }, "insert", ctx);
    const parsed = this.client.parse(result, insertSchema, "insert", result.data ?? {});

    return { ids: (parsed.insertIds ?? []).map(String) };
  }

  async search(
    collection: string,
    query: Vector,
    k: number,
    metric: Metric,
    ctx?: CallContext
  ): Promise<SearchHit[]> {
    const dialect = await this.requireDialect(ctx);

    const body =
      dialect === "v2"
        ? {
            collectionName: collection,
            data: [query],
            annsField: "vector",
            limit: k,
            outputFields: ["id"],
            searchParams: { metricType: METRIC_TYPES[metric] },
          }
        : {
            collectionName: collection,
            vector: query,
            limit: k,
            outputFields: ["id"],
            params: { metric_type: METRIC_TYPES[metric] },
          };

    const path = dialect === "v2" ? "/v2/vectordb/entities/search" : "/v1/vector/search";
    const result = await this.call(path, body, "search", ctx);
    const hits = this.client.parse(result, searchSchema, "search", result.data ?? []);

    return hits.map((hit) => ({ id: String(hit.id), score: hit.distance }));
  }

  async delete(collection: string, ids: readonly string[], ctx?: CallContext): Promise<number> {
    const dialect = await this.requireDialect(ctx);

    // Milvus does not report how many rows a delete removed; count first
    const getPath = dialect === "v2" ? "/v2/vectordb/entities/get" : "/v1/vector/get";
    const existing = await this.call(
      getPath,
      { collectionName: collection, id: ids, outputFields: ["id"] },
      "get before delete",
      ctx
    );
    const found = this.client.parse(existing, getSchema, "get before delete", existing.data ?? []);
    const removed = new Set(found.map((row) => String(row.id))).size;

    if (dialect === "v2") {
      await this.call(
        "/v2/vectordb/entities/delete",
        { collectionName: collection, filter: `id in ${JSON.stringify(ids)}` },
        "delete",
        ctx
      );
    } else {
      await this.call("/v1/vector/delete", { collectionName: collection, id: ids }, "delete", ctx);
    }

    return removed;
  }

  async healthCheck(ctx?: CallContext): Promise<HealthStatus> {
    return probeEndpoints(this.client, PROBES, { timeoutMs: this.probeTimeoutMs, ctx });
  }

  async dropCollection(name: string, ctx?: CallContext): Promise<void> {
    const dialect = await this.requireDialect(ctx);
    await this.call(this.path("collections/drop", dialect), { collectionName: name }, "drop collection", ctx);
  }

  async close(): Promise<void> {
    this.dialect = null;
  }

  private async requireDialect(ctx?: CallContext): Promise<MilvusDialect> {
    if (!this.dialect) {
      await this.connect(ctx);
    }
    return this.dialect ?? "v2";
  }

  private path(route: string, dialect: MilvusDialect): string {
    return dialect === "v2" ? `/v2/vectordb/${route}` : `/v1/vector/${route}`;
  }

  /**
   * POST to a Milvus route and unwrap the envelope.
   * Non-2xx or a non-success code is a ServiceError with the body verbatim.
   */
  private async call(
    path: string,
    body: unknown,
    what: string,
    ctx?: CallContext
  ): Promise<ServiceResponse & { data: unknown }> {
    const response = await this.client.expectOk({ method: "POST", path, body, signal: ctx?.signal });
    const envelope = this.client.parse(response, envelopeSchema, what);

    if (!SUCCESS_CODES.has(envelope.code)) {
      throw new ServiceError(
        this.name,
        `${what} failed with code ${envelope.code}: ${envelope.message ?? truncate(response.text)}`,
        { status: response.status, body: response.body }
      );
    }

    return { ...response, data: envelope.data };
  }
}
