import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createAdapters } from "../../../adapters/index.js";
import { MemoryAdapter } from "../../../adapters/memory.js";
import type { CallContext } from "../../../adapters/types.js";
import { InstantDelayProvider } from "../../../domain/utils/delay.js";
import { FuzzConfigError } from "../../../errors.js";
import { ResultWriter } from "../../../results/report-writer.js";
import { FuzzRunner, type ResultSink } from "../../../run/fuzz-runner.js";
import type { HealthStatus, TestResult } from "../../../types/domain.js";
import { createStubAdapter, createTestRunConfig } from "../../helpers/fixtures.js";

function collector(): ResultSink & { results: TestResult[] } {
  const results: TestResult[] = [];
  return {
    results,
    add(result) {
      results.push(result);
    },
  };
}

/** Memory service whose first health probe fails */
class RecoveringMemoryAdapter extends MemoryAdapter {
  probes = 0;

  async healthCheck(ctx?: CallContext): Promise<HealthStatus> {
    this.probes++;
    if (this.probes === 1) {
      return { service: this.name, reachable: false, error: "connection refused", checkedAt: new Date().toISOString() };
    }
    return super.healthCheck(ctx);
  }
}

describe("FuzzRunner", () => {
  it("should run every case against every service in generation order", async () => {
    const runConfig = createTestRunConfig({ NUM_TESTS: "12", BATCH_SIZE: "5", FUZZ_SEED: "123" });
    const sink = collector();
    const runner = new FuzzRunner({ runConfig, adapters: createAdapters(runConfig), sinks: [sink] });

    const summary = await runner.run();

    expect(runner.seed).toBe(123);
    expect(summary).toMatchObject({
      status: "completed",
      seed: 123,
      services: ["mem-a", "mem-b"],
      testsRequested: 12,
      testsExecuted: 12,
    });
    expect(sink.results.map((result) => result.testCase.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    expect(sink.results.every((result) => result.results.length === 2)).toBe(true);
    expect(summary.statistics.totalTests).toBe(12);
  });

  it("should replay the same cases for the same seed", async () => {
    const replay = async () => {
      const runConfig = createTestRunConfig({ NUM_TESTS: "15", FUZZ_SEED: "99" });
      const sink = collector();
      await new FuzzRunner({ runConfig, adapters: createAdapters(runConfig), sinks: [sink] }).run();
      return sink.results.map((result) => result.testCase);
    };

    expect(await replay()).toEqual(await replay());
  });

  it("should detect strict and lenient services disagreeing on curated edge cases", async () => {
    const runConfig = createTestRunConfig({
      MEMORY_SERVICES: "strict:strict,lenient:lenient",
      NUM_TESTS: "40",
      FUZZ_SEED: "7",
      FUZZ_CURATED_EDGE_CASE_PROBABILITY: "1",
      FUZZ_LARGE_BATCH_SIZE: "10",
    });

    const summary = await new FuzzRunner({ runConfig, adapters: createAdapters(runConfig) }).run();

    expect(summary.statistics.inconsistenciesBySeverity["error-divergent"]).toBeGreaterThan(0);
    expect(summary.statistics.inconsistentTests).toBeGreaterThan(0);
    expect(summary.statistics.topInconsistencies[0]?.severity).toBe("error-divergent");
  });

  it("should abort without dispatching when no service is reachable", async () => {
    const runConfig = createTestRunConfig({ NUM_TESTS: "5", CLEANUP_COLLECTIONS: "true" });
    const down = [
      createStubAdapter({ name: "mem-a", reachable: false }),
      createStubAdapter({ name: "mem-b", reachable: false }),
    ];
    const sink = collector();

    const summary = await new FuzzRunner({
      runConfig,
      adapters: down,
      sinks: [sink],
      delay: new InstantDelayProvider(),
    }).run();

    expect(summary.status).toBe("aborted_no_services");
    expect(summary.testsExecuted).toBe(0);
    expect(summary.health["mem-a"]?.reachable).toBe(false);
    expect(sink.results).toEqual([]);
    expect(down[0]?.calls).toEqual(["close"]);
  });

  it("should exclude a service unhealthy at start and still complete", async () => {
    const runConfig = createTestRunConfig({ NUM_TESTS: "3", CLEANUP_COLLECTIONS: "true" });
    const up = createStubAdapter({ name: "mem-a" });
    const down = createStubAdapter({ name: "mem-b", reachable: false });
    const sink = collector();

    const summary = await new FuzzRunner({
      runConfig,
      adapters: [up, down],
      sinks: [sink],
      delay: new InstantDelayProvider(),
    }).run();

    expect(summary.status).toBe("completed");
    expect(sink.results.map((result) => result.excluded)).toEqual([["mem-b"], ["mem-b"], ["mem-b"]]);
    expect(summary.statistics.services.find((stats) => stats.service === "mem-b")).toMatchObject({
      total: 0,
      failed: 0,
      excluded: 3,
    });
    expect(up.calls[0]).toBe("connect");
    expect(up.calls[1]).toBe("ensureCollection:test_collection");
    expect(up.calls.slice(-2)).toEqual(["dropCollection:test_collection", "close"]);
    expect(down.calls).toEqual(["close"]);
  });

  it("should create collections on a service that recovers after startup before dispatching to it", async () => {
    const runConfig = createTestRunConfig({
      NUM_TESTS: "1",
      FUZZ_SEED: "5",
      HEALTH_MODE: "strict",
      HEALTH_STARTUP_ATTEMPTS: "1",
      FUZZ_OPERATION_WEIGHTS: "insert=1,batch_insert=0,search=0,batch_search=0,delete=0,mixed=0",
      FUZZ_EDGE_VALUE_PROBABILITY: "0",
      FUZZ_EMPTY_VECTOR_PROBABILITY: "0",
      FUZZ_OVERSIZED_VECTOR_PROBABILITY: "0",
      FUZZ_MALFORMED_ID_PROBABILITY: "0",
      FUZZ_MALFORMED_COLLECTION_PROBABILITY: "0",
      FUZZ_CURATED_EDGE_CASE_PROBABILITY: "0",
    });
    const steady = new MemoryAdapter({ name: "mem-a", policy: "strict" });
    const recovering = new RecoveringMemoryAdapter({ name: "mem-b", policy: "strict" });
    const sink = collector();

    await new FuzzRunner({
      runConfig,
      adapters: [steady, recovering],
      sinks: [sink],
      delay: new InstantDelayProvider(),
    }).run();

    expect(recovering.probes).toBe(2);
    const [result] = sink.results;
    expect(result?.testCase.operation).toBe("insert");
    expect(result?.excluded).toEqual([]);
    expect(result?.results.map((entry) => entry.success)).toEqual([true, true]);
    expect(result?.inconsistencies).toEqual([]);
  });

  it("should reject invalid generator knobs before probing any service", () => {
    const runConfig = createTestRunConfig({ FUZZ_MIN_K: "5", FUZZ_MAX_K: "1" });
    const adapter = createStubAdapter({ name: "mem-a" });

    expect(() => new FuzzRunner({ runConfig, adapters: [adapter] })).toThrow(FuzzConfigError);
    expect(adapter.healthChecks).toBe(0);
  });

  describe("with a result writer", () => {
    let dir: string | undefined;

    afterEach(async () => {
      if (dir) await rm(dir, { recursive: true, force: true });
      dir = undefined;
    });

    it("should persist results, summary, report and metrics", async () => {
      dir = await mkdtemp(join(tmpdir(), "vecdiff-runner-"));
      const runConfig = createTestRunConfig({ NUM_TESTS: "4", FUZZ_SEED: "1" });
      const writer = new ResultWriter({ resultsDir: dir, runId: "run-test" });

      const runner = new FuzzRunner({ runConfig, adapters: createAdapters(runConfig), writer });
      await runner.run();

      expect(runner.runId).toBe("run-test");
      const lines = (await readFile(join(dir, "run-test", "results.jsonl"), "utf8")).trimEnd().split("\n");
      expect(lines).toHaveLength(4);
      expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({ schemaVersion: 1, testCase: { id: 1 } });

      const summary: unknown = JSON.parse(await readFile(join(dir, "run-test", "summary.json"), "utf8"));
      expect(summary).toMatchObject({ runId: "run-test", status: "completed", seed: 1, testsExecuted: 4 });

      const report = await readFile(join(dir, "run-test", "report.txt"), "utf8");
      expect(report.split("\n")[0]).toBe("Vector store differential fuzz report: run-test");

      const metrics = await readFile(join(dir, "run-test", "metrics.prom"), "utf8");
      expect(metrics).toContain("vecdiff_test_cases_total");
    });
  });
});
