/**
 * Enumerations shared by the configuration schema and the fuzzer.
 */

export const OPERATIONS = [
  "insert",
  "batch_insert",
  "search",
  "batch_search",
  "delete",
  "mixed",
] as const;

export type Operation = (typeof OPERATIONS)[number];

export const METRICS = ["L2", "cosine", "inner_product"] as const;

export type Metric = (typeof METRICS)[number];

/** Wire protocol families an adapter can speak */
export const SERVICE_KINDS = ["milvus", "chroma", "qdrant", "weaviate", "memory"] as const;

export type ServiceKind = (typeof SERVICE_KINDS)[number];

/** Remote kinds enabled through ENABLED_SERVICES (memory services are declared separately) */
export const REMOTE_SERVICE_KINDS = ["milvus", "chroma", "qdrant", "weaviate"] as const;

export type RemoteServiceKind = (typeof REMOTE_SERVICE_KINDS)[number];

/**
 * Validation policy of an in-process memory service.
 * strict: rejects non-finite components, dimension mismatches and malformed ids.
 * lenient: stores whatever it receives, coercing non-finite components to 0.
 */
export const MEMORY_POLICIES = ["strict", "lenient"] as const;

export type MemoryPolicy = (typeof MEMORY_POLICIES)[number];

export const HEALTH_MODES = ["default", "strict"] as const;

export type HealthMode = (typeof HEALTH_MODES)[number];

/**
 * What happens to services that are unhealthy at dispatch time.
 * exclude: not invoked and not counted (default).
 * fail: recorded as a failed ConnectionError result without being invoked.
 */
export const UNHEALTHY_POLICIES = ["exclude", "fail"] as const;

export type UnhealthyPolicy = (typeof UNHEALTHY_POLICIES)[number];

export const DEFAULT_SERVICE_URLS: Readonly<Record<RemoteServiceKind, string>> = {
  milvus: "http://localhost:19530",
  chroma: "http://localhost:8000",
  qdrant: "http://localhost:6333",
  weaviate: "http://localhost:8080",
};
