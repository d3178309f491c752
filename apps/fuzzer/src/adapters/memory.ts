import type { MemoryPolicy } from "@vecdiff/config";
import { ServiceError, TimeoutError } from "../errors.js";
import type { HealthStatus, Metadata, Metric, SearchHit, Vector } from "../types/domain.js";
import type { CallContext, InsertOutcome, VectorStoreAdapter } from "./types.js";

// =============================================================================
// In-process reference store
// =============================================================================
// Exact-scan vector store used for dry runs and tests. Two policies give two
// services that disagree on purpose:
//   strict  - rejects non-finite components, dimension mismatches, malformed
//             ids and unknown collections with a ServiceError
//   lenient - stores what it receives (non-finite components become 0) and
//             creates collections on first insert
// =============================================================================

export interface MemoryAdapterConfig {
  name: string;
  policy: MemoryPolicy;
  /** Simulate network delay on every call */
  latencyMs?: number;
}

interface StoredPoint {
  vector: number[];
  metadata: Metadata | null;
}

interface MemoryCollection {
  dimension: number | null;
  points: Map<string, StoredPoint>;
}

const MAX_ID_LENGTH = 512;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;

export function distance(metric: Metric, a: readonly number[], b: readonly number[]): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  let squared = 0;

  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
    squared += (x - y) * (x - y);
  }

  switch (metric) {
    case "L2":
      return Math.sqrt(squared);
    case "cosine":
      return normA === 0 || normB === 0 ? 1 : 1 - dot / Math.sqrt(normA * normB);
    case "inner_product":
      // Larger products rank first; negate so every metric sorts ascending
      return -dot;
  }
}

export class MemoryAdapter implements VectorStoreAdapter {
  readonly name: string;
  readonly kind = "memory";
  readonly policy: MemoryPolicy;
  private readonly latencyMs: number;
  private readonly collections = new Map<string, MemoryCollection>();

  constructor(config: MemoryAdapterConfig) {
    this.name = config.name;
    this.policy = config.policy;
    this.latencyMs = config.latencyMs ?? 0;
  }

  async connect(ctx?: CallContext): Promise<void> {
    await this.simulateLatency(ctx);
  }

  async ensureCollection(name: string, dimension: number, ctx?: CallContext): Promise<void> {
    await this.simulateLatency(ctx);
    if (!this.collections.has(name)) {
      this.collections.set(name, { dimension, points: new Map() });
    }
  }

  async insert(
    collection: string,
    vectors: readonly Vector[],
    ids: readonly string[],
    metadata?: readonly (Metadata | null)[],
    ctx?: CallContext
  ): Promise<InsertOutcome> {
    await this.simulateLatency(ctx);
    const target = this.collectionFor(collection, true);

    if (this.policy === "strict") {
      this.validateInsert(target, vectors, ids);
    }

    const stored = new Set<string>();
    vectors.forEach((vector, index) => {
      const id = ids[index];
      if (id === undefined) return;
      target.dimension ??= vector.length;
      target.points.set(id, {
        vector: vector.map((component) => (Number.isFinite(component) ? component : 0)),
        metadata: metadata?.[index] ?? null,
      });
      stored.add(id);
    });

    return { ids: [...stored] };
  }

  async search(
    collection: string,
    query: Vector,
    k: number,
    metric: Metric,
    ctx?: CallContext
  ): Promise<SearchHit[]> {
    await this.simulateLatency(ctx);
    const target = this.collectionFor(collection, false);

    if (this.policy === "strict") {
      if (k < 1) this.reject(`k must be positive, got ${k}`);
      this.validateVector(target, query, "query");
    }
    if (k < 1) return [];

    const sanitized = query.map((component) => (Number.isFinite(component) ? component : 0));
    return [...target.points.entries()]
      .map(([id, point]) => ({ id, score: distance(metric, sanitized, point.vector) }))
      .sort((a, b) => a.score - b.score || a.id.localeCompare(b.id))
      .slice(0, k)
      .map((hit) => (metric === "inner_product" ? { id: hit.id, score: -hit.score } : hit));
  }

  async delete(collection: string, ids: readonly string[], ctx?: CallContext): Promise<number> {
    await this.simulateLatency(ctx);
    const target = this.collectionFor(collection, false);

    let removed = 0;
    for (const id of new Set(ids)) {
      if (target.points.delete(id)) removed++;
    }
    return removed;
  }

  async healthCheck(ctx?: CallContext): Promise<HealthStatus> {
    await this.simulateLatency(ctx);
    return {
      service: this.name,
      reachable: true,
      dialect: "memory",
      version: this.policy,
      checkedAt: new Date().toISOString(),
    };
  }

  async dropCollection(name: string): Promise<void> {
    this.collections.delete(name);
  }

  async close(): Promise<void> {
    this.collections.clear();
  }

  /** Number of points stored in a collection (0 when absent) */
  size(collection: string): number {
    return this.collections.get(collection)?.points.size ?? 0;
  }

  private collectionFor(name: string, creating: boolean): MemoryCollection {
    const existing = this.collections.get(name);
    if (existing) return existing;

    if (this.policy === "strict") {
      this.reject(`collection "${name}" does not exist`, 404);
    }

    const created: MemoryCollection = { dimension: null, points: new Map() };
    if (creating) {
      this.collections.set(name, created);
    }
    return created;
  }

  private validateInsert(target: MemoryCollection, vectors: readonly Vector[], ids: readonly string[]): void {
    if (vectors.length !== ids.length) {
      this.reject(`got ${vectors.length} vectors and ${ids.length} ids`);
    }

    const seen = new Set<string>();
    for (const id of ids) {
      if (id.length === 0 || id.length > MAX_ID_LENGTH || CONTROL_CHARACTERS.test(id)) {
        this.reject(`malformed id ${JSON.stringify(id.slice(0, 32))}`);
      }
      if (seen.has(id)) {
        this.reject(`duplicate id ${JSON.stringify(id)} in batch`);
      }
      seen.add(id);
    }

    vectors.forEach((vector, index) => this.validateVector(target, vector, `vector ${index}`));
  }

  private validateVector(target: MemoryCollection, vector: Vector, label: string): void {
    if (vector.length === 0) {
      this.reject(`${label} is empty`);
    }
    if (target.dimension !== null && vector.length !== target.dimension) {
      this.reject(`${label} has dimension ${vector.length}, collection expects ${target.dimension}`);
    }
    if (vector.some((component) => !Number.isFinite(component))) {
      this.reject(`${label} contains non-finite components`);
    }
  }

  private reject(message: string, status: number = 400): never {
    throw new ServiceError(this.name, message, { status, body: { error: message } });
  }

  private async simulateLatency(ctx?: CallContext): Promise<void> {
    if (this.latencyMs <= 0) return;

    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        ctx?.signal?.removeEventListener("abort", onAbort);
        resolve();
      }, this.latencyMs);
      const onAbort = () => {
        clearTimeout(timer);
        reject(new TimeoutError(this.name, "aborted by caller"));
      };
      if (ctx?.signal?.aborted) {
        onAbort();
      } else {
        ctx?.signal?.addEventListener("abort", onAbort, { once: true });
      }
    });
  }
}
