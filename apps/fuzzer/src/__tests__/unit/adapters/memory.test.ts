import { describe, it, expect } from "vitest";
import { distance, MemoryAdapter } from "../../../adapters/memory.js";
import { ServiceError } from "../../../errors.js";

const COLLECTION = "test_collection";

async function strictAdapter() {
  const adapter = new MemoryAdapter({ name: "mem-strict", policy: "strict" });
  await adapter.ensureCollection(COLLECTION, 2);
  return adapter;
}

describe("distance", () => {
  it("should compute euclidean distance for L2", () => {
    expect(distance("L2", [0, 0], [3, 4])).toBe(5);
  });

  it("should compute 1 - cosine similarity", () => {
    expect(distance("cosine", [1, 0], [1, 0])).toBe(0);
    expect(distance("cosine", [1, 0], [0, 1])).toBe(1);
    expect(distance("cosine", [0, 0], [1, 1])).toBe(1);
  });

  it("should negate the inner product so smaller ranks first", () => {
    expect(distance("inner_product", [1, 2], [3, 4])).toBe(-11);
  });
});

describe("MemoryAdapter", () => {
  describe("strict policy", () => {
    it("should store and find vectors", async () => {
      const adapter = await strictAdapter();
      const outcome = await adapter.insert(COLLECTION, [[0, 0], [1, 1], [5, 5]], ["a", "b", "c"]);

      expect(outcome.ids).toEqual(["a", "b", "c"]);
      const found = await adapter.search(COLLECTION, [0.9, 0.9], 2, "L2");
      expect(found.map((hit) => hit.id)).toEqual(["b", "a"]);
    });

    it("should report inner product scores as the dot product", async () => {
      const adapter = await strictAdapter();
      await adapter.insert(COLLECTION, [[1, 0], [2, 0]], ["small", "large"]);

      const found = await adapter.search(COLLECTION, [1, 0], 2, "inner_product");
      expect(found).toEqual([
        { id: "large", score: 2 },
        { id: "small", score: 1 },
      ]);
    });

    it("should break score ties by id", async () => {
      const adapter = await strictAdapter();
      await adapter.insert(COLLECTION, [[1, 0], [1, 0]], ["b", "a"]);

      const found = await adapter.search(COLLECTION, [1, 0], 2, "L2");
      expect(found.map((hit) => hit.id)).toEqual(["a", "b"]);
    });

    it("should reject non-finite components with a ServiceError", async () => {
      const adapter = await strictAdapter();

      const error = await adapter.insert(COLLECTION, [[1, Number.NaN]], ["a"]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServiceError);
      expect(error).toMatchObject({ status: 400, body: { error: "vector 0 contains non-finite components" } });
    });

    it("should reject dimension mismatches", async () => {
      const adapter = await strictAdapter();
      await expect(adapter.insert(COLLECTION, [[1, 2, 3]], ["a"])).rejects.toThrow(
        "vector 0 has dimension 3, collection expects 2"
      );
    });

    it("should reject empty vectors", async () => {
      const adapter = await strictAdapter();
      await expect(adapter.search(COLLECTION, [], 1, "L2")).rejects.toThrow("query is empty");
    });

    it("should reject malformed and duplicate ids", async () => {
      const adapter = await strictAdapter();
      await expect(adapter.insert(COLLECTION, [[1, 1]], [""])).rejects.toThrow("malformed id");
      await expect(adapter.insert(COLLECTION, [[1, 1]], ["id\u0000"])).rejects.toThrow("malformed id");
      await expect(adapter.insert(COLLECTION, [[1, 1]], ["x".repeat(600)])).rejects.toThrow("malformed id");
      await expect(adapter.insert(COLLECTION, [[1, 1], [2, 2]], ["a", "a"])).rejects.toThrow('duplicate id "a" in batch');
    });

    it("should reject mismatched vector and id counts", async () => {
      const adapter = await strictAdapter();
      await expect(adapter.insert(COLLECTION, [[1, 1], [2, 2]], ["a"])).rejects.toThrow("got 2 vectors and 1 ids");
    });

    it("should answer 404 for unknown collections", async () => {
      const adapter = await strictAdapter();
      await expect(adapter.search("nonexistent_1", [1, 1], 1, "L2")).rejects.toMatchObject({ status: 404 });
    });

    it("should reject k below 1", async () => {
      const adapter = await strictAdapter();
      await expect(adapter.search(COLLECTION, [1, 1], 0, "L2")).rejects.toThrow("k must be positive, got 0");
    });
  });

  describe("lenient policy", () => {
    it("should store non-finite components as 0", async () => {
      const adapter = new MemoryAdapter({ name: "mem-lenient", policy: "lenient" });

      const outcome = await adapter.insert(COLLECTION, [[Number.NaN, Number.POSITIVE_INFINITY]], ["a"]);

      expect(outcome.ids).toEqual(["a"]);
      const found = await adapter.search(COLLECTION, [0, 0], 1, "L2");
      expect(found).toEqual([{ id: "a", score: 0 }]);
    });

    it("should keep the last write of an id repeated within a batch", async () => {
      const adapter = new MemoryAdapter({ name: "mem-lenient", policy: "lenient" });

      const outcome = await adapter.insert(COLLECTION, [[1, 0], [2, 0], [3, 0]], ["a", "b", "a"]);

      expect(outcome.ids).toEqual(["a", "b"]);
      expect(adapter.size(COLLECTION)).toBe(2);
      expect(await adapter.search(COLLECTION, [3, 0], 1, "L2")).toEqual([{ id: "a", score: 0 }]);
    });

    it("should create collections on first insert", async () => {
      const adapter = new MemoryAdapter({ name: "mem-lenient", policy: "lenient" });
      await adapter.insert("fresh", [[1]], ["a"]);
      expect(adapter.size("fresh")).toBe(1);
    });

    it("should return no hits for k below 1 or an unknown collection", async () => {
      const adapter = new MemoryAdapter({ name: "mem-lenient", policy: "lenient" });
      expect(await adapter.search("nowhere", [1], 0, "L2")).toEqual([]);
      expect(await adapter.search("nowhere", [1], 3, "L2")).toEqual([]);
    });
  });

  describe("delete", () => {
    it("should count removed ids once and be idempotent", async () => {
      const adapter = await strictAdapter();
      await adapter.insert(COLLECTION, [[0, 0], [1, 1]], ["a", "b"]);

      expect(await adapter.delete(COLLECTION, ["a", "a", "missing"])).toBe(1);
      expect(await adapter.delete(COLLECTION, ["a"])).toBe(0);
      expect(adapter.size(COLLECTION)).toBe(1);
    });
  });

  describe("latency", () => {
    it("should give up when the caller aborts", async () => {
      const adapter = new MemoryAdapter({ name: "mem-slow", policy: "lenient", latencyMs: 1000 });
      const controller = new AbortController();

      const pending = adapter.search(COLLECTION, [1], 1, "L2", { signal: controller.signal });
      controller.abort();

      await expect(pending).rejects.toMatchObject({ kind: "Timeout" });
    });
  });

  it("should always report itself reachable", async () => {
    const adapter = new MemoryAdapter({ name: "mem-a", policy: "strict" });
    await expect(adapter.healthCheck()).resolves.toMatchObject({
      service: "mem-a",
      reachable: true,
      dialect: "memory",
      version: "strict",
    });
  });
});
