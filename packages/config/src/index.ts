import { z } from "zod";
import {
  HEALTH_MODES,
  MEMORY_POLICIES,
  METRICS,
  OPERATIONS,
  REMOTE_SERVICE_KINDS,
  UNHEALTHY_POLICIES,
  DEFAULT_SERVICE_URLS,
  type MemoryPolicy,
} from "./constants.js";

export * from "./constants.js";
export * from "./run-config.js";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

const probability = z.coerce.number().min(0).max(1);

/** Comma-separated list, blanks dropped */
function csv(fallback: string) {
  return z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );
}

/** "key=value,key=value" with non-negative numeric values */
const numberMap = z
  .string()
  .default("")
  .transform((value, ctx) => {
    const entries: Record<string, number> = {};
    const pairs = value
      .split(",")
      .map((pair) => pair.trim())
      .filter((pair) => pair.length > 0);

    for (const pair of pairs) {
      const separator = pair.indexOf("=");
      const key = separator > 0 ? pair.slice(0, separator).trim() : "";
      const amount = separator > 0 ? Number(pair.slice(separator + 1)) : Number.NaN;

      if (key.length === 0 || !Number.isFinite(amount) || amount < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid entry "${pair}"` });
        return z.NEVER;
      }
      entries[key] = amount;
    }

    return entries;
  });

const operationWeights = numberMap.superRefine((weights, ctx) => {
  for (const key of Object.keys(weights)) {
    if (!OPERATIONS.some((operation) => operation === key)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown operation "${key}"` });
    }
  }
});

export interface MemoryServiceSpec {
  name: string;
  policy: MemoryPolicy;
}

/** "name:policy,name:policy" */
const memoryServices = csv("").transform((items, ctx) => {
  const specs: MemoryServiceSpec[] = [];
  for (const item of items) {
    const [name = "", policy = "strict"] = item.split(":").map((part) => part.trim());
    const parsed = z.enum(MEMORY_POLICIES).safeParse(policy);
    if (name.length === 0 || !parsed.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid memory service "${item}"` });
      return z.NEVER;
    }
    specs.push({ name, policy: parsed.data });
  }
  return specs;
});

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),

  // ===========================================================================
  // Services under test
  // ===========================================================================
  ENABLED_SERVICES: csv(REMOTE_SERVICE_KINDS.join(",")).pipe(z.array(z.enum(REMOTE_SERVICE_KINDS))),
  MILVUS_URL: z.string().url().default(DEFAULT_SERVICE_URLS.milvus),
  MILVUS_TOKEN: z.string().optional(),
  CHROMA_URL: z.string().url().default(DEFAULT_SERVICE_URLS.chroma),
  CHROMA_TENANT: z.string().default("default_tenant"),
  CHROMA_DATABASE: z.string().default("default_database"),
  QDRANT_URL: z.string().url().default(DEFAULT_SERVICE_URLS.qdrant),
  QDRANT_API_KEY: z.string().optional(),
  WEAVIATE_URL: z.string().url().default(DEFAULT_SERVICE_URLS.weaviate),
  WEAVIATE_API_KEY: z.string().optional(),
  /** In-process reference services, e.g. "mem-strict:strict,mem-lenient:lenient" */
  MEMORY_SERVICES: memoryServices,

  // ===========================================================================
  // Collection
  // ===========================================================================
  COLLECTION_NAME: z.string().min(1).default("test_collection"),
  /** Additional collections the generator may target */
  EXTRA_COLLECTIONS: csv(""),
  VECTOR_DIMENSION: z.coerce.number().int().min(1).default(128),
  /** Metric collections are created with (fixed per collection on most services) */
  COLLECTION_METRIC: z.enum(METRICS).default("L2"),

  // ===========================================================================
  // Dispatch
  // ===========================================================================
  REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  /** Per-service overrides, e.g. "weaviate=60000" */
  SERVICE_TIMEOUTS: numberMap,
  UNHEALTHY_POLICY: z.enum(UNHEALTHY_POLICIES).default("exclude"),

  // ===========================================================================
  // Health Monitor
  // ===========================================================================
  HEALTH_MODE: z.enum(HEALTH_MODES).default("default"),
  HEALTH_PROBE_TIMEOUT_MS: z.coerce.number().int().min(1).default(3000),
  HEALTH_STARTUP_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  HEALTH_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  /** Periodic re-probe of services that were healthy at start (0 = never) */
  HEALTH_INTERVAL_MS: z.coerce.number().int().min(0).default(60000),

  // ===========================================================================
  // Comparator
  // ===========================================================================
  OVERLAP_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  COMPARE_TOP_HIT: stringBoolean.default(true),

  // ===========================================================================
  // Run
  // ===========================================================================
  NUM_TESTS: z.coerce.number().int().min(0).default(50),
  BATCH_SIZE: z.coerce.number().int().min(1).default(10),
  RESULTS_DIR: z.string().default("results"),
  CLEANUP_COLLECTIONS: stringBoolean.default(true),

  // ===========================================================================
  // Fuzz Generator
  // ===========================================================================
  FUZZ_SEED: z.coerce.number().int().optional(),
  /** e.g. "insert=3,search=3,delete=1"; unlisted operations keep weight 1 */
  FUZZ_OPERATION_WEIGHTS: operationWeights,
  FUZZ_MIN_DIMENSION: z.coerce.number().int().min(0).optional(),
  FUZZ_MAX_DIMENSION: z.coerce.number().int().min(0).optional(),
  FUZZ_OVERSIZED_MIN_DIMENSION: z.coerce.number().int().min(1).default(256),
  FUZZ_OVERSIZED_MAX_DIMENSION: z.coerce.number().int().min(1).default(4096),
  FUZZ_EDGE_VALUE_PROBABILITY: probability.default(0.01),
  FUZZ_WIDE_RANGE_PROBABILITY: probability.default(0.1),
  FUZZ_EMPTY_VECTOR_PROBABILITY: probability.default(0.02),
  FUZZ_OVERSIZED_VECTOR_PROBABILITY: probability.default(0.02),
  FUZZ_MALFORMED_ID_PROBABILITY: probability.default(0.05),
  FUZZ_REUSE_ID_PROBABILITY: probability.default(0.5),
  FUZZ_METADATA_PROBABILITY: probability.default(0.7),
  FUZZ_MAX_METADATA_FIELDS: z.coerce.number().int().min(0).default(10),
  FUZZ_SPECIAL_CHAR_PROBABILITY: probability.default(0.05),
  FUZZ_MALFORMED_COLLECTION_PROBABILITY: probability.default(0.05),
  FUZZ_CURATED_EDGE_CASE_PROBABILITY: probability.default(0.1),
  FUZZ_MAX_VECTORS_PER_INSERT: z.coerce.number().int().min(1).default(5),
  FUZZ_MAX_BATCH_INSERT: z.coerce.number().int().min(2).default(100),
  FUZZ_MAX_QUERIES: z.coerce.number().int().min(1).default(10),
  FUZZ_MIN_K: z.coerce.number().int().min(0).default(1),
  FUZZ_MAX_K: z.coerce.number().int().min(0).default(20),
  FUZZ_METRICS: csv(METRICS.join(",")).pipe(z.array(z.enum(METRICS)).min(1)),
  FUZZ_ID_SPACE: z.coerce.number().int().min(1).default(1000),
  FUZZ_LARGE_BATCH_SIZE: z.coerce.number().int().min(1).default(1000),
});

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(1);
  }

  cachedConfig = result.data;
  return result.data;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}
