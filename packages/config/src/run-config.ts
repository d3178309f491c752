import {
  type HealthMode,
  type MemoryPolicy,
  type Metric,
  type Operation,
  type ServiceKind,
  type UnhealthyPolicy,
} from "./constants.js";
import type { Config } from "./index.js";

// =============================================================================
// Run Configuration
// =============================================================================
// The environment is parsed once (configSchema) and turned into a RunConfig.
// A RunConfig is deeply frozen and passed by parameter to every component.
// =============================================================================

export interface IntRange {
  min: number;
  max: number;
}

export interface ServiceConfig {
  /** Unique name used in results, logs and metrics */
  name: string;
  kind: ServiceKind;
  /** Base URL for remote services; "memory://<name>" for in-process ones */
  url: string;
  /** Call timeout for dispatched operations */
  timeoutMs: number;
  /** API key or bearer token, when the service requires one */
  apiKey?: string;
  /** Chroma tenant/database */
  tenant?: string;
  database?: string;
  /** Validation policy for memory services */
  memoryPolicy?: MemoryPolicy;
}

export interface FuzzKnobs {
  operationWeights: Readonly<Record<Operation, number>>;
  dimension: IntRange;
  oversizedDimension: IntRange;
  edgeValueProbability: number;
  wideRangeProbability: number;
  emptyVectorProbability: number;
  oversizedVectorProbability: number;
  malformedIdProbability: number;
  reuseIdProbability: number;
  metadataProbability: number;
  maxMetadataFields: number;
  specialCharProbability: number;
  malformedCollectionProbability: number;
  curatedEdgeCaseProbability: number;
  maxVectorsPerInsert: number;
  maxBatchInsert: number;
  maxQueries: number;
  k: IntRange;
  metrics: readonly Metric[];
  collections: readonly string[];
  idSpace: number;
  largeBatchSize: number;
}

export interface RunConfig {
  services: readonly ServiceConfig[];
  collection: string;
  dimension: number;
  metric: Metric;
  seed?: number;
  fuzz: FuzzKnobs;
  dispatch: {
    timeoutMs: number;
    unhealthyPolicy: UnhealthyPolicy;
  };
  health: {
    mode: HealthMode;
    probeTimeoutMs: number;
    startupAttempts: number;
    retryDelayMs: number;
    intervalMs: number;
  };
  compare: {
    overlapThreshold: number;
    compareTopHit: boolean;
  };
  run: {
    numTests: number;
    batchSize: number;
    cleanup: boolean;
  };
  output: {
    resultsDir: string;
  };
}

/** Command-line overrides applied on top of the environment */
export interface RunOverrides {
  numTests?: number;
  seed?: number;
  services?: readonly string[];
  healthMode?: HealthMode;
  batchSize?: number;
  resultsDir?: string;
  cleanup?: boolean;
}

/** Freeze an object graph in place */
export function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/** Unlisted operations keep weight 1 */
export function defaultOperationWeights(
  overrides: Readonly<Record<string, number>> = {}
): Record<Operation, number> {
  return {
    insert: overrides.insert ?? 1,
    batch_insert: overrides.batch_insert ?? 1,
    search: overrides.search ?? 1,
    batch_search: overrides.batch_search ?? 1,
    delete: overrides.delete ?? 1,
    mixed: overrides.mixed ?? 1,
  };
}

function buildServices(config: Config): ServiceConfig[] {
  const timeoutFor = (name: string) => config.SERVICE_TIMEOUTS[name] ?? config.REQUEST_TIMEOUT_MS;

  const remote: ServiceConfig[] = config.ENABLED_SERVICES.map((kind) => {
    switch (kind) {
      case "milvus":
        return {
          name: kind,
          kind,
          url: config.MILVUS_URL,
          timeoutMs: timeoutFor(kind),
          apiKey: config.MILVUS_TOKEN,
        };
      case "chroma":
        return {
          name: kind,
          kind,
          url: config.CHROMA_URL,
          timeoutMs: timeoutFor(kind),
          tenant: config.CHROMA_TENANT,
          database: config.CHROMA_DATABASE,
        };
      case "qdrant":
        return {
          name: kind,
          kind,
          url: config.QDRANT_URL,
          timeoutMs: timeoutFor(kind),
          apiKey: config.QDRANT_API_KEY,
        };
      case "weaviate":
        return {
          name: kind,
          kind,
          url: config.WEAVIATE_URL,
          timeoutMs: timeoutFor(kind),
          apiKey: config.WEAVIATE_API_KEY,
        };
    }
  });

  const memory: ServiceConfig[] = config.MEMORY_SERVICES.map((spec) => ({
    name: spec.name,
    kind: "memory",
    url: `memory://${spec.name}`,
    timeoutMs: timeoutFor(spec.name),
    memoryPolicy: spec.policy,
  }));

  return [...remote, ...memory];
}

/**
 * Build the immutable run configuration from parsed environment config.
 * Throws on combinations the schema cannot check on its own.
 */
export function buildRunConfig(config: Config, overrides: RunOverrides = {}): RunConfig {
  let services = buildServices(config);

  if (overrides.services && overrides.services.length > 0) {
    const wanted = new Set(overrides.services);
    const unknown = [...wanted].filter((name) => !services.some((service) => service.name === name));
    if (unknown.length > 0) {
      throw new Error(`Unknown services requested: ${unknown.join(", ")}`);
    }
    services = services.filter((service) => wanted.has(service.name));
  }

  const names = services.map((service) => service.name);
  const duplicate = names.find((name, index) => names.indexOf(name) !== index);
  if (duplicate !== undefined) {
    throw new Error(`Duplicate service name: ${duplicate}`);
  }

  const dimension = {
    min: config.FUZZ_MIN_DIMENSION ?? config.VECTOR_DIMENSION,
    max: config.FUZZ_MAX_DIMENSION ?? config.VECTOR_DIMENSION,
  };

  const runConfig: RunConfig = {
    services,
    collection: config.COLLECTION_NAME,
    dimension: config.VECTOR_DIMENSION,
    metric: config.COLLECTION_METRIC,
    seed: overrides.seed ?? config.FUZZ_SEED,
    fuzz: {
      operationWeights: defaultOperationWeights(config.FUZZ_OPERATION_WEIGHTS),
      dimension,
      oversizedDimension: {
        min: config.FUZZ_OVERSIZED_MIN_DIMENSION,
        max: config.FUZZ_OVERSIZED_MAX_DIMENSION,
      },
      edgeValueProbability: config.FUZZ_EDGE_VALUE_PROBABILITY,
      wideRangeProbability: config.FUZZ_WIDE_RANGE_PROBABILITY,
      emptyVectorProbability: config.FUZZ_EMPTY_VECTOR_PROBABILITY,
      oversizedVectorProbability: config.FUZZ_OVERSIZED_VECTOR_PROBABILITY,
      malformedIdProbability: config.FUZZ_MALFORMED_ID_PROBABILITY,
      reuseIdProbability: config.FUZZ_REUSE_ID_PROBABILITY,
      metadataProbability: config.FUZZ_METADATA_PROBABILITY,
      maxMetadataFields: config.FUZZ_MAX_METADATA_FIELDS,
      specialCharProbability: config.FUZZ_SPECIAL_CHAR_PROBABILITY,
      malformedCollectionProbability: config.FUZZ_MALFORMED_COLLECTION_PROBABILITY,
      curatedEdgeCaseProbability: config.FUZZ_CURATED_EDGE_CASE_PROBABILITY,
      maxVectorsPerInsert: config.FUZZ_MAX_VECTORS_PER_INSERT,
      maxBatchInsert: config.FUZZ_MAX_BATCH_INSERT,
      maxQueries: config.FUZZ_MAX_QUERIES,
      k: { min: config.FUZZ_MIN_K, max: config.FUZZ_MAX_K },
      metrics: config.FUZZ_METRICS,
      collections: [config.COLLECTION_NAME, ...config.EXTRA_COLLECTIONS],
      idSpace: config.FUZZ_ID_SPACE,
      largeBatchSize: config.FUZZ_LARGE_BATCH_SIZE,
    },
    dispatch: {
      timeoutMs: config.REQUEST_TIMEOUT_MS,
      unhealthyPolicy: config.UNHEALTHY_POLICY,
    },
    health: {
      mode: overrides.healthMode ?? config.HEALTH_MODE,
      probeTimeoutMs: config.HEALTH_PROBE_TIMEOUT_MS,
      startupAttempts: config.HEALTH_STARTUP_ATTEMPTS,
      retryDelayMs: config.HEALTH_RETRY_DELAY_MS,
      intervalMs: config.HEALTH_INTERVAL_MS,
    },
    compare: {
      overlapThreshold: config.OVERLAP_THRESHOLD,
      compareTopHit: config.COMPARE_TOP_HIT,
    },
    run: {
      numTests: overrides.numTests ?? config.NUM_TESTS,
      batchSize: overrides.batchSize ?? config.BATCH_SIZE,
      cleanup: overrides.cleanup ?? config.CLEANUP_COLLECTIONS,
    },
    output: {
      resultsDir: overrides.resultsDir ?? config.RESULTS_DIR,
    },
  };

  return deepFreeze(runConfig);
}
