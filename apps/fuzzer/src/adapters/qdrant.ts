import { z } from "zod";
import { ConnectionError, UnsupportedMetricError } from "../errors.js";
import { ServiceHttpClient, type ServiceResponse } from "../http/service-client.js";
import { log } from "../logger.js";
import type { HealthStatus, Metadata, Metric, SearchHit, Vector } from "../types/domain.js";
import { uuidFromId } from "./id-mapping.js";
import { probeEndpoints, stringField, type ProbeEndpoint } from "./probes.js";
import { isAlreadyExists, type AdapterOptions } from "./shared.js";
import type { CallContext, InsertOutcome, VectorStoreAdapter } from "./types.js";

// =============================================================================
// Qdrant (points/query since 1.10, points/search before)
// =============================================================================
// Point ids must be unsigned integers or UUIDs. Caller ids are mapped to
// name-based UUIDs and the original id travels in the payload.
// =============================================================================

export type QdrantDialect = "query" | "legacy";

/** Payload key holding the caller's id */
export const EXTERNAL_ID_KEY = "external_id";

const DISTANCES: Record<Metric, string> = {
  L2: "Euclid",
  cosine: "Cosine",
  inner_product: "Dot",
};

const pointIdSchema = z.union([z.string(), z.number()]);

const scoredPointSchema = z.object({
  id: pointIdSchema,
  score: z.number(),
  payload: z.record(z.unknown()).nullable().optional(),
});

const queryResultSchema = z.object({
  result: z.object({ points: z.array(scoredPointSchema) }),
});

const searchResultSchema = z.object({ result: z.array(scoredPointSchema) });

const retrieveSchema = z.object({ result: z.array(z.object({ id: pointIdSchema })) });

const PROBES: readonly ProbeEndpoint[] = [
  { path: "/healthz" },
  { path: "/readyz" },
  { path: "/", version: (response) => stringField(response.body, "version") },
  { path: "/collections" },
];

/** True for "1.10.0" and later */
export function supportsQueryApi(version: string | undefined): boolean {
  if (!version) return true;
  const [major = 0, minor = 0] = version.split(".").map((part) => Number.parseInt(part, 10));
  return major > 1 || (major === 1 && minor >= 10);
}

/** Qdrant reports errors as { status: { error } }; a bare 404 means the route is missing */
function isMissingRoute(response: ServiceResponse): boolean {
  if (response.status !== 404) return false;
  const status: unknown =
    typeof response.body === "object" && response.body !== null ? Reflect.get(response.body, "status") : undefined;
  return stringField(status, "error") === undefined;
}

export class QdrantAdapter implements VectorStoreAdapter {
  readonly name: string;
  readonly kind = "qdrant";
  private readonly client: ServiceHttpClient;
  private readonly metric: Metric;
  private readonly probeTimeoutMs: number;
  private dialect: QdrantDialect | null = null;

  constructor(options: AdapterOptions) {
    this.name = options.service.name;
    this.metric = options.metric;
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.client = new ServiceHttpClient({
      service: options.service.name,
      baseUrl: options.service.url,
      timeoutMs: options.service.timeoutMs,
      headers: options.service.apiKey ? { "api-key": options.service.apiKey } : {},
      fetchImpl: options.fetchImpl,
    });
  }

  get detectedDialect(): QdrantDialect | null {
    return this.dialect;
  }

  async connect(ctx?: CallContext): Promise<void> {
    if (this.dialect) return;

    const health = await this.healthCheck(ctx);
    if (!health.reachable) {
      throw new ConnectionError(this.name, `Qdrant unreachable: ${health.error ?? "no probe answered"}`);
    }

    let version = health.version;
    if (version === undefined) {
      const root = await this.client.request({ path: "/", signal: ctx?.signal });
      version = root.ok ? stringField(root.body, "version") : undefined;
    }
    this.dialect = supportsQueryApi(version) ? "query" : "legacy";
    log.adapter.info({ service: this.name, dialect: this.dialect, version }, "connected");
  }

  async ensureCollection(name: string, dimension: number, ctx?: CallContext): Promise<void> {
    await this.ensureConnected(ctx);
    const response = await this.client.request({
      method: "PUT",
      path: `/collections/${encodeURIComponent(name)}`,
      body: { vectors: { size: dimension, distance: DISTANCES[this.metric] } },
      signal: ctx?.signal,
    });

    if (response.ok) {
      log.adapter.info({ service: this.name, collection: name, dimension }, "collection created");
      return;
    }
    if (response.status === 409 || isAlreadyExists(response.text)) return;
    throw this.client.serviceError(response, "create collection");
  }

  async insert(
    collection: string,
    vectors: readonly Vector[],
    ids: readonly string[],
    metadata?: readonly (Metadata | null)[],
    ctx?: CallContext
  ): Promise<InsertOutcome> {
    await this.ensureConnected(ctx);
    const points = vectors.map((vector, index) => {
      const id = ids[index] ?? "";
      const entry = metadata?.[index];
      return {
        id: uuidFromId(id),
        vector,
        payload: { [EXTERNAL_ID_KEY]: id, ...(entry && { metadata: entry }) },
      };
    });

    await this.client.expectOk({
      method: "PUT",
      path: `/collections/${encodeURIComponent(collection)}/points?wait=true`,
      body: { points },
      signal: ctx?.signal,
    });

    // Upsert keeps the last write of an id repeated within one batch
    return { ids: [...new Set(ids)] };
  }

  async search(
    collection: string,
    query: Vector,
    k: number,
    metric: Metric,
    ctx?: CallContext
  ): Promise<SearchHit[]> {
    await this.ensureConnected(ctx);
    if (metric !== this.metric) {
      throw new UnsupportedMetricError(
        this.name,
        `collections use ${DISTANCES[this.metric]}; Qdrant cannot search them with ${metric}`
      );
    }

    const base = `/collections/${encodeURIComponent(collection)}/points`;

    if (this.dialect === "query") {
      const response = await this.client.request({
        method: "POST",
        path: `${base}/query`,
        body: { query, limit: k, with_payload: true },
        signal: ctx?.signal,
      });

      if (!isMissingRoute(response)) {
        if (!response.ok) throw this.client.serviceError(response, "query points");
        const parsed = this.client.parse(response, queryResultSchema, "query points");
        return parsed.result.points.map(toHit);
      }

      log.adapter.warn({ service: this.name }, "points/query missing, falling back to points/search");
      this.dialect = "legacy";
    }

    const response = await this.client.expectOk({
      method: "POST",
      path: `${base}/search`,
      body: { vector: query, limit: k, with_payload: true },
      signal: ctx?.signal,
    });
    return this.client.parse(response, searchResultSchema, "search points").result.map(toHit);
  }

  async delete(collection: string, ids: readonly string[], ctx?: CallContext): Promise<number> {
    await this.ensureConnected(ctx);
    const base = `/collections/${encodeURIComponent(collection)}/points`;
    const pointIds = ids.map((id) => uuidFromId(id));

    const existing = await this.client.expectOk({
      method: "POST",
      path: base,
      body: { ids: pointIds, with_payload: false, with_vector: false },
      signal: ctx?.signal,
    });
    const found = this.client.parse(existing, retrieveSchema, "retrieve before delete");

    await this.client.expectOk({
      method: "POST",
      path: `${base}/delete?wait=true`,
      body: { points: pointIds },
      signal: ctx?.signal,
    });

    return new Set(found.result.map((point) => String(point.id))).size;
  }

  async healthCheck(ctx?: CallContext): Promise<HealthStatus> {
    return probeEndpoints(this.client, PROBES, { timeoutMs: this.probeTimeoutMs, ctx });
  }

  async dropCollection(name: string, ctx?: CallContext): Promise<void> {
    await this.client.expectOk({
      method: "DELETE",
      path: `/collections/${encodeURIComponent(name)}`,
      signal: ctx?.signal,
    });
  }

  async close(): Promise<void> {
    this.dialect = null;
  }

  private async ensureConnected(ctx?: CallContext): Promise<void> {
    if (!this.dialect) {
      await this.connect(ctx);
    }
  }
}

function toHit(point: z.infer<typeof scoredPointSchema>): SearchHit {
  const external = point.payload?.[EXTERNAL_ID_KEY];
  return {
    id: typeof external === "string" ? external : String(point.id),
    score: point.score,
  };
}
