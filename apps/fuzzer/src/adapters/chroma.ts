import { z } from "zod";
import { ConnectionError, UnsupportedMetricError } from "../errors.js";
import { ServiceHttpClient } from "../http/service-client.js";
import { log } from "../logger.js";
import type { HealthStatus, Metadata, Metric, SearchHit, Vector } from "../types/domain.js";
import { probeEndpoints, stringField, type ProbeEndpoint } from "./probes.js";
import type { AdapterOptions } from "./shared.js";
import type { CallContext, InsertOutcome, VectorStoreAdapter } from "./types.js";

// =============================================================================
// Chroma (API v2 with tenant/database scoping, legacy v1)
// =============================================================================
// Collections are addressed by server-assigned id; names are resolved once and
// cached. The distance function is fixed when a collection is created
// ("hnsw:space"), so a search asking for another metric cannot be honoured.
// =============================================================================

export type ChromaDialect = "v2" | "v1";

const SPACES: Record<Metric, string> = {
  L2: "l2",
  cosine: "cosine",
  inner_product: "ip",
};

const collectionSchema = z.object({
  id: z.string(),
  name: z.string(),
  metadata: z.record(z.unknown()).nullable().optional(),
});

const querySchema = z.object({
  ids: z.array(z.array(z.string())),
  distances: z.array(z.array(z.number()).nullable()).nullable().optional(),
});

const getSchema = z.object({ ids: z.array(z.string()) });

const PROBES: readonly ProbeEndpoint[] = [
  { path: "/api/v2/heartbeat", dialect: "v2" },
  { path: "/api/v1/heartbeat", dialect: "v1" },
];

interface CollectionHandle {
  id: string;
  metric: Metric;
}

/** Chroma defaults to l2 when a collection carries no space */
function metricFromSpace(space: unknown): Metric {
  switch (space) {
    case "cosine":
      return "cosine";
    case "ip":
      return "inner_product";
    default:
      return "L2";
  }
}

export class ChromaAdapter implements VectorStoreAdapter {
  readonly name: string;
  readonly kind = "chroma";
  private readonly client: ServiceHttpClient;
  private readonly metric: Metric;
  private readonly probeTimeoutMs: number;
  private readonly tenant: string;
  private readonly database: string;
  private dialect: ChromaDialect | null = null;
  private readonly collections = new Map<string, CollectionHandle>();

  constructor(options: AdapterOptions) {
    this.name = options.service.name;
    this.metric = options.metric;
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.tenant = options.service.tenant ?? "default_tenant";
    this.database = options.service.database ?? "default_database";
    this.client = new ServiceHttpClient({
      service: options.service.name,
      baseUrl: options.service.url,
      timeoutMs: options.service.timeoutMs,
      headers: options.service.apiKey ? { "X-Chroma-Token": options.service.apiKey } : {},
      fetchImpl: options.fetchImpl,
    });
  }

  get detectedDialect(): ChromaDialect | null {
    return this.dialect;
  }

  async connect(ctx?: CallContext): Promise<void> {
    if (this.dialect) return;

    const health = await this.healthCheck(ctx);
    if (!health.reachable) {
      throw new ConnectionError(this.name, `Chroma unreachable: ${health.error ?? "no probe answered"}`);
    }
    this.dialect = health.dialect === "v1" ? "v1" : "v2";
    log.adapter.info({ service: this.name, dialect: this.dialect }, "connected");
  }

  async ensureCollection(name: string, _dimension: number, ctx?: CallContext): Promise<void> {
    const base = await this.collectionsPath(ctx);
    const response = await this.client.expectOk({
      method: "POST",
      path: base,
      body: { name, metadata: { "hnsw:space": SPACES[this.metric] }, get_or_create: true },
      signal: ctx?.signal,
    });
    const collection = this.client.parse(response, collectionSchema, "create collection");
    this.collections.set(name, {
      id: collection.id,
      metric: metricFromSpace(collection.metadata?.["hnsw:space"]),
    });
    log.adapter.info({ service: this.name, collection: name, id: collection.id }, "collection ready");
  }

  async insert(
    collection: string,
    vectors: readonly Vector[],
    ids: readonly string[],
    metadata?: readonly (Metadata | null)[],
    ctx?: CallContext
  ): Promise<InsertOutcome> {
    const handle = await this.resolve(collection, ctx);
    const base = await this.collectionsPath(ctx);
    const withMetadata = metadata?.some((entry) => entry !== null) ?? false;

    await this.client.expectOk({
      method: "POST",
      path: `${base}/${handle.id}/add`,
      body: {
        ids,
        embeddings: vectors,
        ...(withMetadata && { metadatas: metadata }),
      },
      signal: ctx?.signal,
    });

    // Chroma acknowledges the whole batch or rejects it
    return { ids: [...ids] };
  }

  async search(
    collection: string,
    query: Vector,
    k: number,
    metric: Metric,
    ctx?: CallContext
  ): Promise<SearchHit[]> {
    const handle = await this.resolve(collection, ctx);
    if (metric !== handle.metric) {
      throw new UnsupportedMetricError(
        this.name,
        `collection "${collection}" uses ${handle.metric}; Chroma cannot search it with ${metric}`
      );
    }

    const base = await this.collectionsPath(ctx);
    const response = await this.client.expectOk({
      method: "POST",
      path: `${base}/${handle.id}/query`,
      body: { query_embeddings: [query], n_results: k, include: ["distances"] },
      signal: ctx?.signal,
    });
    const result = this.client.parse(response, querySchema, "query");

    const ids = result.ids[0] ?? [];
    const distances = result.distances?.[0] ?? [];
    return ids.map((id, index) => ({ id, score: distances[index] ?? Number.NaN }));
  }

  async delete(collection: string, ids: readonly string[], ctx?: CallContext): Promise<number> {
    const handle = await this.resolve(collection, ctx);
    const base = await this.collectionsPath(ctx);

    // The delete route does not report a count; look the ids up first
    const existing = await this.client.expectOk({
      method: "POST",
      path: `${base}/${handle.id}/get`,
      body: { ids, include: [] },
      signal: ctx?.signal,
    });
    const found = this.client.parse(existing, getSchema, "get before delete");

    await this.client.expectOk({
      method: "POST",
      path: `${base}/${handle.id}/delete`,
      body: { ids },
      signal: ctx?.signal,
    });

    return new Set(found.ids).size;
  }

  async healthCheck(ctx?: CallContext): Promise<HealthStatus> {
    const status = await probeEndpoints(this.client, PROBES, { timeoutMs: this.probeTimeoutMs, ctx });
    if (!status.reachable) return status;

    // Version is a separate route in both dialects
    try {
      const version = await this.client.request({
        path: status.dialect === "v1" ? "/api/v1/version" : "/api/v2/version",
        signal: ctx?.signal,
        timeoutMs: this.probeTimeoutMs,
      });
      const text = typeof version.body === "string" ? version.body : stringField(version.body, "version");
      return version.ok && text ? { ...status, version: text } : status;
    } catch (error) {
      log.adapter.debug({ service: this.name, error: String(error) }, "version lookup failed");
      return status;
    }
  }

  async dropCollection(name: string, ctx?: CallContext): Promise<void> {
    const base = await this.collectionsPath(ctx);
    await this.client.expectOk({
      method: "DELETE",
      path: `${base}/${encodeURIComponent(name)}`,
      signal: ctx?.signal,
    });
    this.collections.delete(name);
  }

  async close(): Promise<void> {
    this.collections.clear();
    this.dialect = null;
  }

  private async collectionsPath(ctx?: CallContext): Promise<string> {
    if (!this.dialect) {
      await this.connect(ctx);
    }
    return this.dialect === "v1"
      ? "/api/v1/collections"
      : `/api/v2/tenants/${encodeURIComponent(this.tenant)}/databases/${encodeURIComponent(this.database)}/collections`;
  }

  /** Unknown names go to the service, which decides whether they exist */
  private async resolve(name: string, ctx?: CallContext): Promise<CollectionHandle> {
    const cached = this.collections.get(name);
    if (cached) return cached;

    const base = await this.collectionsPath(ctx);
    const response = await this.client.expectOk({
      path: `${base}/${encodeURIComponent(name)}`,
      signal: ctx?.signal,
    });
    const collection = this.client.parse(response, collectionSchema, "get collection");
    const handle = { id: collection.id, metric: metricFromSpace(collection.metadata?.["hnsw:space"]) };
    this.collections.set(name, handle);
    return handle;
  }
}
