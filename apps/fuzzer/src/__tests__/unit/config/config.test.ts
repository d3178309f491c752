import { describe, it, expect, afterEach } from "vitest";
import { buildRunConfig, configSchema, loadConfig, resetConfig } from "@vecdiff/config";

describe("configSchema defaults", () => {
  it("should enable all four remote services by default", () => {
    const config = configSchema.parse({});
    expect(config.ENABLED_SERVICES).toEqual(["milvus", "chroma", "qdrant", "weaviate"]);
  });

  it("should default the service URLs to local ports", () => {
    const config = configSchema.parse({});
    expect(config.MILVUS_URL).toBe("http://localhost:19530");
    expect(config.CHROMA_URL).toBe("http://localhost:8000");
    expect(config.QDRANT_URL).toBe("http://localhost:6333");
    expect(config.WEAVIATE_URL).toBe("http://localhost:8080");
  });

  it("should default the overlap threshold to 0.5 and keep top-hit comparison on", () => {
    const config = configSchema.parse({});
    expect(config.OVERLAP_THRESHOLD).toBe(0.5);
    expect(config.COMPARE_TOP_HIT).toBe(true);
  });

  it("should default the unhealthy policy to exclude", () => {
    expect(configSchema.parse({}).UNHEALTHY_POLICY).toBe("exclude");
  });

  it("should parse string booleans literally", () => {
    expect(configSchema.parse({ COMPARE_TOP_HIT: "false" }).COMPARE_TOP_HIT).toBe(false);
    expect(configSchema.parse({ CLEANUP_COLLECTIONS: "TRUE" }).CLEANUP_COLLECTIONS).toBe(true);
  });

  it("should reject unknown services", () => {
    expect(() => configSchema.parse({ ENABLED_SERVICES: "milvus,pinecone" })).toThrow();
  });

  it("should reject probabilities outside [0, 1]", () => {
    expect(() => configSchema.parse({ FUZZ_EDGE_VALUE_PROBABILITY: "1.5" })).toThrow();
    expect(() => configSchema.parse({ FUZZ_MALFORMED_ID_PROBABILITY: "-0.1" })).toThrow();
  });

  describe("SERVICE_TIMEOUTS", () => {
    it("should parse name=ms pairs", () => {
      const config = configSchema.parse({ SERVICE_TIMEOUTS: "weaviate=60000, milvus=5000" });
      expect(config.SERVICE_TIMEOUTS).toEqual({ weaviate: 60000, milvus: 5000 });
    });

    it("should reject malformed entries", () => {
      expect(() => configSchema.parse({ SERVICE_TIMEOUTS: "weaviate" })).toThrow();
      expect(() => configSchema.parse({ SERVICE_TIMEOUTS: "weaviate=-1" })).toThrow();
    });
  });

  describe("FUZZ_OPERATION_WEIGHTS", () => {
    it("should accept known operations", () => {
      const config = configSchema.parse({ FUZZ_OPERATION_WEIGHTS: "insert=3,mixed=0" });
      expect(config.FUZZ_OPERATION_WEIGHTS).toEqual({ insert: 3, mixed: 0 });
    });

    it("should reject unknown operations", () => {
      expect(() => configSchema.parse({ FUZZ_OPERATION_WEIGHTS: "upsert=1" })).toThrow();
    });
  });

  describe("MEMORY_SERVICES", () => {
    it("should parse name:policy entries with strict as the default policy", () => {
      const config = configSchema.parse({ MEMORY_SERVICES: "ref:lenient,check" });
      expect(config.MEMORY_SERVICES).toEqual([
        { name: "ref", policy: "lenient" },
        { name: "check", policy: "strict" },
      ]);
    });

    it("should reject unknown policies", () => {
      expect(() => configSchema.parse({ MEMORY_SERVICES: "ref:sloppy" })).toThrow();
    });
  });
});

describe("buildRunConfig", () => {
  it("should list remote services before memory services", () => {
    const config = configSchema.parse({ ENABLED_SERVICES: "qdrant", MEMORY_SERVICES: "ref:lenient" });
    const runConfig = buildRunConfig(config);

    expect(runConfig.services.map((service) => service.name)).toEqual(["qdrant", "ref"]);
    expect(runConfig.services[1]).toMatchObject({ kind: "memory", url: "memory://ref", memoryPolicy: "lenient" });
  });

  it("should apply per-service timeouts over the default", () => {
    const config = configSchema.parse({
      ENABLED_SERVICES: "milvus,chroma",
      REQUEST_TIMEOUT_MS: "1000",
      SERVICE_TIMEOUTS: "chroma=250",
    });
    const runConfig = buildRunConfig(config);

    expect(runConfig.services.map((service) => service.timeoutMs)).toEqual([1000, 250]);
  });

  it("should default the fuzz dimension range to the vector dimension", () => {
    const runConfig = buildRunConfig(configSchema.parse({ VECTOR_DIMENSION: "16" }));
    expect(runConfig.fuzz.dimension).toEqual({ min: 16, max: 16 });
  });

  it("should put the main collection first", () => {
    const runConfig = buildRunConfig(
      configSchema.parse({ COLLECTION_NAME: "main", EXTRA_COLLECTIONS: "second, third" })
    );
    expect(runConfig.fuzz.collections).toEqual(["main", "second", "third"]);
  });

  it("should apply command-line overrides", () => {
    const runConfig = buildRunConfig(configSchema.parse({ NUM_TESTS: "50" }), {
      numTests: 7,
      seed: 42,
      services: ["chroma"],
      healthMode: "strict",
      cleanup: false,
    });

    expect(runConfig.run.numTests).toBe(7);
    expect(runConfig.seed).toBe(42);
    expect(runConfig.services.map((service) => service.name)).toEqual(["chroma"]);
    expect(runConfig.health.mode).toBe("strict");
    expect(runConfig.run.cleanup).toBe(false);
  });

  it("should throw for services that are not configured", () => {
    expect(() => buildRunConfig(configSchema.parse({ ENABLED_SERVICES: "milvus" }), { services: ["qdrant"] })).toThrow(
      "Unknown services requested: qdrant"
    );
  });

  it("should throw for duplicate service names", () => {
    const config = configSchema.parse({ ENABLED_SERVICES: "milvus", MEMORY_SERVICES: "milvus:strict" });
    expect(() => buildRunConfig(config)).toThrow("Duplicate service name: milvus");
  });

  it("should freeze the result deeply", () => {
    const runConfig = buildRunConfig(configSchema.parse({}));

    expect(Object.isFrozen(runConfig)).toBe(true);
    expect(Object.isFrozen(runConfig.fuzz.operationWeights)).toBe(true);
    expect(Object.isFrozen(runConfig.services[0])).toBe(true);
  });
});

describe("loadConfig", () => {
  afterEach(() => {
    resetConfig();
  });

  it("should cache the first parse until reset", () => {
    resetConfig();
    const first = loadConfig({ VECTOR_DIMENSION: "8" });
    expect(first.VECTOR_DIMENSION).toBe(8);
    expect(loadConfig({ VECTOR_DIMENSION: "16" })).toBe(first);

    resetConfig();
    expect(loadConfig({ VECTOR_DIMENSION: "16" }).VECTOR_DIMENSION).toBe(16);
  });
});
