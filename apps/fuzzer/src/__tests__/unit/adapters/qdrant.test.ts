import { describe, it, expect } from "vitest";
import type { ServiceConfig } from "@vecdiff/config";
import { uuidFromId } from "../../../adapters/id-mapping.js";
import { QdrantAdapter, supportsQueryApi } from "../../../adapters/qdrant.js";
import { UnsupportedMetricError } from "../../../errors.js";
import { createFakeFetch, type FakeResponse, type RouteHandler } from "../../helpers/fixtures.js";

const service: ServiceConfig = {
  name: "qdrant",
  kind: "qdrant",
  url: "http://qdrant.local:6333",
  timeoutMs: 1000,
  apiKey: "test-key",
};

const POINTS = "/collections/test_collection/points";

function createAdapter(routes: Record<string, RouteHandler | FakeResponse> = {}, version = "1.12.1") {
  const fake = createFakeFetch({
    "GET /healthz": { text: "healthz check passed" },
    "GET /": { body: { title: "qdrant - vector search engine", version } },
    ...routes,
  });
  const adapter = new QdrantAdapter({ service, metric: "L2", probeTimeoutMs: 500, fetchImpl: fake.fetchImpl });
  return { adapter, requests: fake.requests };
}

describe("supportsQueryApi", () => {
  it("should accept 1.10 and later", () => {
    expect(supportsQueryApi("1.10.0")).toBe(true);
    expect(supportsQueryApi("1.12.1")).toBe(true);
    expect(supportsQueryApi("2.0.0")).toBe(true);
  });

  it("should reject earlier versions", () => {
    expect(supportsQueryApi("1.9.7")).toBe(false);
    expect(supportsQueryApi("0.11.0")).toBe(false);
  });

  it("should assume the current API when the version is unknown", () => {
    expect(supportsQueryApi(undefined)).toBe(true);
  });
});

describe("QdrantAdapter", () => {
  describe("connect", () => {
    it("should pick the query API on current servers", async () => {
      const { adapter, requests } = createAdapter();
      await adapter.connect();

      expect(adapter.detectedDialect).toBe("query");
      expect(requests[0]?.headers["api-key"]).toBe("test-key");
    });

    it("should pick the legacy search API on older servers", async () => {
      const { adapter } = createAdapter({}, "1.7.4");
      await adapter.connect();
      expect(adapter.detectedDialect).toBe("legacy");
    });
  });

  describe("ensureCollection", () => {
    it("should create the collection with the configured distance", async () => {
      const { adapter, requests } = createAdapter({ "PUT /collections/test_collection": { body: { result: true } } });

      await adapter.ensureCollection("test_collection", 4);

      const create = requests.find((request) => request.method === "PUT");
      expect(create?.body).toEqual({ vectors: { size: 4, distance: "Euclid" } });
    });

    it("should accept a collection that already exists", async () => {
      const { adapter } = createAdapter({
        "PUT /collections/test_collection": {
          status: 409,
          body: { status: { error: "Wrong input: Collection `test_collection` already exists!" } },
        },
      });

      await expect(adapter.ensureCollection("test_collection", 4)).resolves.toBeUndefined();
    });
  });

  describe("insert", () => {
    it("should store points under UUIDs with the caller id in the payload", async () => {
      const { adapter, requests } = createAdapter({ [`PUT ${POINTS}?wait=true`]: { body: { result: { status: "completed" } } } });

      const outcome = await adapter.insert("test_collection", [[0.5, 0.5]], ["id_1"], [{ color: "red" }]);

      expect(outcome.ids).toEqual(["id_1"]);
      const upsert = requests.find((request) => request.path === `${POINTS}?wait=true`);
      expect(upsert?.body).toEqual({
        points: [
          {
            id: "b6d2e92c-8c81-586e-8459-e21c51e097a9",
            vector: [0.5, 0.5],
            payload: { external_id: "id_1", metadata: { color: "red" } },
          },
        ],
      });
    });

    it("should count an id repeated within a batch once", async () => {
      const { adapter, requests } = createAdapter({ [`PUT ${POINTS}?wait=true`]: { body: { result: { status: "completed" } } } });

      const outcome = await adapter.insert("test_collection", [[1], [2], [3]], ["a", "b", "a"]);

      expect(outcome.ids).toEqual(["a", "b"]);
      const upsert = requests.find((request) => request.path === `${POINTS}?wait=true`);
      expect(upsert?.body).toEqual({
        points: [
          { id: uuidFromId("a"), vector: [1], payload: { external_id: "a" } },
          { id: uuidFromId("b"), vector: [2], payload: { external_id: "b" } },
          { id: uuidFromId("a"), vector: [3], payload: { external_id: "a" } },
        ],
      });
    });
  });

  describe("search", () => {
    it("should use points/query and map ids back", async () => {
      const { adapter } = createAdapter({
        [`POST ${POINTS}/query`]: {
          body: { result: { points: [{ id: uuidFromId("id_1"), score: 0.25, payload: { external_id: "id_1" } }] } },
        },
      });

      await expect(adapter.search("test_collection", [0.5, 0.5], 3, "L2")).resolves.toEqual([
        { id: "id_1", score: 0.25 },
      ]);
    });

    it("should fall back to points/search when the query route is missing", async () => {
      const { adapter, requests } = createAdapter({
        [`POST ${POINTS}/search`]: {
          body: { result: [{ id: uuidFromId("id_2"), score: 0.5, payload: { external_id: "id_2" } }] },
        },
      });

      const found = await adapter.search("test_collection", [0.5, 0.5], 3, "L2");

      expect(found).toEqual([{ id: "id_2", score: 0.5 }]);
      expect(adapter.detectedDialect).toBe("legacy");
      expect(requests.filter((request) => request.path === `${POINTS}/search`)).toHaveLength(1);
    });

    it("should treat a collection-level 404 as a service error, not a missing route", async () => {
      const { adapter } = createAdapter({
        "POST /collections/nonexistent_3/points/query": {
          status: 404,
          body: { status: { error: "Not found: Collection `nonexistent_3` doesn't exist!" } },
        },
      });

      await expect(adapter.search("nonexistent_3", [0.5], 3, "L2")).rejects.toMatchObject({
        kind: "ServiceError",
        status: 404,
      });
      expect(adapter.detectedDialect).toBe("query");
    });

    it("should refuse a metric other than the collection's", async () => {
      const { adapter } = createAdapter();
      await expect(adapter.search("test_collection", [0.5], 3, "inner_product")).rejects.toBeInstanceOf(
        UnsupportedMetricError
      );
    });
  });

  describe("delete", () => {
    it("should count the points that exist before deleting", async () => {
      const { adapter, requests } = createAdapter({
        [`POST ${POINTS}`]: { body: { result: [{ id: uuidFromId("a") }] } },
        [`POST ${POINTS}/delete?wait=true`]: { body: { result: { status: "completed" } } },
      });

      await expect(adapter.delete("test_collection", ["a", "missing"])).resolves.toBe(1);
      const deletion = requests.find((request) => request.path === `${POINTS}/delete?wait=true`);
      expect(deletion?.body).toEqual({ points: [uuidFromId("a"), uuidFromId("missing")] });
    });
  });
});
