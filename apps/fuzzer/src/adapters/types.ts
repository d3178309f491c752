/**
 * Vector store adapter abstraction layer
 * One implementation per service; each owns its own HTTP client and dialect state
 */

import type { ServiceKind } from "@vecdiff/config";
import type { HealthStatus, Metadata, Metric, SearchHit, Vector } from "../types/domain.js";

export interface CallContext {
  /** Aborts the in-flight request (per-service dispatch timeout) */
  signal?: AbortSignal;
}

export interface InsertOutcome {
  /** Ids the service reports as stored */
  ids: string[];
}

export interface VectorStoreAdapter {
  /** Service name for results, logs and metrics */
  readonly name: string;
  readonly kind: ServiceKind;

  /**
   * Detect the API dialect. Idempotent.
   * Fails with ConnectionError when no probe endpoint answers.
   */
  connect(ctx?: CallContext): Promise<void>;

  /** Create the collection if absent; "already exists" is success */
  ensureCollection(name: string, dimension: number, ctx?: CallContext): Promise<void>;

  /** No pre-validation: malformed input goes to the service as generated */
  insert(
    collection: string,
    vectors: readonly Vector[],
    ids: readonly string[],
    metadata?: readonly (Metadata | null)[],
    ctx?: CallContext
  ): Promise<InsertOutcome>;

  /** Ranked hits, length ≤ k */
  search(collection: string, query: Vector, k: number, metric: Metric, ctx?: CallContext): Promise<SearchHit[]>;

  /** Count actually removed; unknown ids count as zero */
  delete(collection: string, ids: readonly string[], ctx?: CallContext): Promise<number>;

  /** Never rejects: unreachable services report reachable=false */
  healthCheck(ctx?: CallContext): Promise<HealthStatus>;

  dropCollection(name: string, ctx?: CallContext): Promise<void>;

  close(): Promise<void>;
}
