import type { RunConfig, ServiceConfig } from "@vecdiff/config";
import type { FetchLike } from "../http/service-client.js";
import { log } from "../logger.js";
import { ChromaAdapter } from "./chroma.js";
import { MemoryAdapter } from "./memory.js";
import { MilvusAdapter } from "./milvus.js";
import { QdrantAdapter } from "./qdrant.js";
import type { VectorStoreAdapter } from "./types.js";
import { WeaviateAdapter } from "./weaviate.js";

export * from "./types.js";
export { ChromaAdapter } from "./chroma.js";
export { MemoryAdapter } from "./memory.js";
export { MilvusAdapter } from "./milvus.js";
export { QdrantAdapter } from "./qdrant.js";
export { WeaviateAdapter } from "./weaviate.js";

export interface AdapterFactoryOptions {
  fetchImpl?: FetchLike;
}

/**
 * Create the adapter for one configured service
 */
export function createAdapter(
  service: ServiceConfig,
  runConfig: Pick<RunConfig, "metric" | "health">,
  options: AdapterFactoryOptions = {}
): VectorStoreAdapter {
  const adapterOptions = {
    service,
    metric: runConfig.metric,
    probeTimeoutMs: runConfig.health.probeTimeoutMs,
    fetchImpl: options.fetchImpl,
  };

  switch (service.kind) {
    case "milvus":
      return new MilvusAdapter(adapterOptions);
    case "chroma":
      return new ChromaAdapter(adapterOptions);
    case "qdrant":
      return new QdrantAdapter(adapterOptions);
    case "weaviate":
      return new WeaviateAdapter(adapterOptions);
    case "memory":
      return new MemoryAdapter({ name: service.name, policy: service.memoryPolicy ?? "strict" });
  }
}

/**
 * Create one adapter per configured service, in configured order
 */
export function createAdapters(runConfig: RunConfig, options: AdapterFactoryOptions = {}): VectorStoreAdapter[] {
  const adapters = runConfig.services.map((service) => createAdapter(service, runConfig, options));
  log.adapter.info(
    { services: adapters.map((adapter) => `${adapter.name}(${adapter.kind})`) },
    "adapters initialized"
  );
  return adapters;
}
