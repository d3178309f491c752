import { z } from "zod";
import { ConnectionError, ServiceError, UnsupportedMetricError } from "../errors.js";
import { encodeJson } from "../http/json.js";
import { ServiceHttpClient, truncate } from "../http/service-client.js";
import { log } from "../logger.js";
import type { HealthStatus, Metadata, Metric, SearchHit, Vector } from "../types/domain.js";
import { uuidFromId } from "./id-mapping.js";
import { probeEndpoints, stringField, type ProbeEndpoint } from "./probes.js";
import { bearer, isAlreadyExists, type AdapterOptions } from "./shared.js";
import type { CallContext, InsertOutcome, VectorStoreAdapter } from "./types.js";

// =============================================================================
// Weaviate (GraphQL reads, REST batch writes)
// =============================================================================
// GraphQL has no mutations in Weaviate, so inserts and deletes use the REST
// batch endpoints and only nearVector search goes through /v1/graphql.
// GraphQL failures arrive as HTTP 200 with an `errors` array.
// =============================================================================

const DISTANCES: Record<Metric, string> = {
  L2: "l2-squared",
  cosine: "cosine",
  inner_product: "dot",
};

/** Property holding the caller's id */
export const SOURCE_ID_PROPERTY = "sourceId";

const batchInsertSchema = z.array(
  z.object({
    id: z.string().optional(),
    result: z
      .object({
        errors: z
          .object({ error: z.array(z.object({ message: z.string() })).optional() })
          .nullable()
          .optional(),
      })
      .nullable()
      .optional(),
  }).passthrough()
);

const graphqlSchema = z.object({
  data: z.object({ Get: z.record(z.array(z.record(z.unknown())).nullable()) }).nullable().optional(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).optional(),
});

const additionalSchema = z.object({
  id: z.string().optional(),
  distance: z.number().nullable().optional(),
});

const batchDeleteSchema = z.object({
  results: z.object({
    matches: z.number().optional(),
    successful: z.number(),
    failed: z.number().optional(),
  }),
});

const PROBES: readonly ProbeEndpoint[] = [
  { path: "/v1/.well-known/ready" },
  { path: "/.well-known/ready" },
  { path: "/v1/meta", version: (response) => stringField(response.body, "version") },
];

/** Weaviate class names start with an upper-case letter */
export function toClassName(collection: string): string {
  return collection.charAt(0).toUpperCase() + collection.slice(1);
}

export class WeaviateAdapter implements VectorStoreAdapter {
  readonly name: string;
  readonly kind = "weaviate";
  private readonly client: ServiceHttpClient;
  private readonly metric: Metric;
  private readonly probeTimeoutMs: number;
  private connected = false;

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

  async connect(ctx?: CallContext): Promise<void> {
    if (this.connected) return;

    const health = await this.healthCheck(ctx);
    if (!health.reachable) {
      throw new ConnectionError(this.name, `Weaviate unreachable: ${health.error ?? "no probe answered"}`);
    }
    this.connected = true;
    log.adapter.info({ service: this.name, version: health.version }, "connected");
  }

  async ensureCollection(name: string, _dimension: number, ctx?: CallContext): Promise<void> {
    await this.connect(ctx);
    const className = toClassName(name);

    const existing = await this.client.request({
      path: `/v1/schema/${encodeURIComponent(className)}`,
      signal: ctx?.signal,
    });
    if (existing.ok) return;

    const response = await this.client.request({
      method: "POST",
      path: "/v1/schema",
      body: {
        class: className,
        vectorizer: "none",
        vectorIndexConfig: { distance: DISTANCES[this.metric] },
        properties: [
          { name: SOURCE_ID_PROPERTY, dataType: ["text"] },
          { name: "metadata", dataType: ["text"] },
        ],
      },
      signal: ctx?.signal,
    });

    if (response.ok) {
      log.adapter.info({ service: this.name, className }, "class created");
      return;
    }
    if (isAlreadyExists(response.text)) return;
    throw this.client.serviceError(response, "create class");
  }

  async insert(
    collection: string,
    vectors: readonly Vector[],
    ids: readonly string[],
    metadata?: readonly (Metadata | null)[],
    ctx?: CallContext
  ): Promise<InsertOutcome> {
    await this.connect(ctx);
    const className = toClassName(collection);
    const sourceIds = new Map<string, string>();

    const objects = vectors.map((vector, index) => {
      const id = ids[index] ?? "";
      const uuid = uuidFromId(id);
      const entry = metadata?.[index];
      sourceIds.set(uuid, id);
      return {
        class: className,
        id: uuid,
        vector,
        properties: {
          [SOURCE_ID_PROPERTY]: id,
          ...(entry && { metadata: JSON.stringify(entry) }),
        },
      };
    });

    const response = await this.client.expectOk({
      method: "POST",
      path: "/v1/batch/objects",
      body: { objects },
      signal: ctx?.signal,
    });
    const results = this.client.parse(response, batchInsertSchema, "batch insert");

    const stored = new Set<string>();
    const errors: string[] = [];
    for (const item of results) {
      const messages = item.result?.errors?.error?.map((error) => error.message) ?? [];
      if (messages.length > 0) {
        errors.push(...messages);
      } else if (item.id !== undefined) {
        stored.add(sourceIds.get(item.id) ?? item.id);
      }
    }

    // Batch answers 200 per object; a batch where nothing was stored is a rejection
    if (stored.size === 0 && errors.length > 0) {
      throw new ServiceError(this.name, `batch insert rejected: ${truncate(errors.join("; "))}`, {
        status: response.status,
        body: response.body,
      });
    }

    return { ids: [...stored] };
  }

  async search(
    collection: string,
    query: Vector,
    k: number,
    metric: Metric,
    ctx?: CallContext
  ): Promise<SearchHit[]> {
    await this.connect(ctx);
    if (metric !== this.metric) {
      throw new UnsupportedMetricError(
        this.name,
        `classes use ${DISTANCES[this.metric]}; Weaviate cannot search them with ${metric}`
      );
    }

    const className = toClassName(collection);
    const graphql = `{ Get { ${className}(nearVector: { vector: ${encodeJson(query)} }, limit: ${k}) { ${SOURCE_ID_PROPERTY} _additional { id distance } } } }`;

    const response = await this.client.expectOk({
      method: "POST",
      path: "/v1/graphql",
      body: { query: graphql },
      signal: ctx?.signal,
    });
    const result = this.client.parse(response, graphqlSchema, "graphql search");

    if (result.errors && result.errors.length > 0) {
      throw new ServiceError(
        this.name,
        `graphql search failed: ${truncate(result.errors.map((error) => error.message).join("; "))}`,
        { status: response.status, body: response.body }
      );
    }

    const rows = result.data?.Get[className] ?? [];
    return rows.map((row) => {
      const additional = additionalSchema.safeParse(row._additional);
      const sourceId = row[SOURCE_ID_PROPERTY];
      const fallbackId = additional.success ? additional.data.id : undefined;
      const distance = additional.success ? additional.data.distance : undefined;
      return {
        id: typeof sourceId === "string" ? sourceId : (fallbackId ?? ""),
        score: distance ?? Number.NaN,
      };
    });
  }

  async delete(collection: string, ids: readonly string[], ctx?: CallContext): Promise<number> {
    await this.connect(ctx);

    const response = await this.client.expectOk({
      method: "DELETE",
      path: "/v1/batch/objects",
      body: {
        match: {
          class: toClassName(collection),
          where: {
            path: ["id"],
            operator: "ContainsAny",
            valueTextArray: ids.map((id) => uuidFromId(id)),
          },
        },
        output: "minimal",
        dryRun: false,
      },
      signal: ctx?.signal,
    });

    return this.client.parse(response, batchDeleteSchema, "batch delete").results.successful;
  }

  async healthCheck(ctx?: CallContext): Promise<HealthStatus> {
    const status = await probeEndpoints(this.client, PROBES, { timeoutMs: this.probeTimeoutMs, ctx });
    return status.reachable ? { ...status, dialect: "graphql" } : status;
  }

  async dropCollection(name: string, ctx?: CallContext): Promise<void> {
    await this.client.expectOk({
      method: "DELETE",
      path: `/v1/schema/${encodeURIComponent(toClassName(name))}`,
      signal: ctx?.signal,
    });
  }

  async close(): Promise<void> {
    this.connected = false;
  }
}
