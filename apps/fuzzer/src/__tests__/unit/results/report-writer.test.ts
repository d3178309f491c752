import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { compareResults } from "../../../domain/compare/comparator.js";
import { ResultAggregator } from "../../../results/aggregator.js";
import type { RunSummary } from "../../../results/report-schema.js";
import { generateRunId, renderReport, ResultWriter } from "../../../results/report-writer.js";
import { RESULT_SCHEMA_VERSION, type TestResult } from "../../../types/domain.js";
import { failure, hits, searchCase, success } from "../../helpers/fixtures.js";

function createTestResult(): TestResult {
  const testCase = searchCase(1, { query: [Number.NaN, 0.2, 0.3, 0.4] });
  const results = [success("mem-a", { kind: "search", hits: hits("a") }), failure("mem-b", "ServiceError", "bad vector")];
  return {
    schemaVersion: RESULT_SCHEMA_VERSION,
    testCase,
    results,
    excluded: [],
    inconsistencies: compareResults(testCase, results),
    startedAt: "2026-01-01T00:00:00.000Z",
  };
}

function createSummary(): RunSummary {
  const aggregator = new ResultAggregator(["mem-a", "mem-b"]);
  aggregator.add(createTestResult());
  return {
    schemaVersion: 1,
    runId: "run-1",
    status: "completed",
    seed: 42,
    startedAt: "2026-01-01T00:00:00.000Z",
    completedAt: "2026-01-01T00:00:01.500Z",
    durationMs: 1500,
    services: ["mem-a", "mem-b"],
    testsRequested: 1,
    testsExecuted: 1,
    statistics: aggregator.statistics(),
    health: {
      "mem-a": { service: "mem-a", reachable: true, checkedAt: "2026-01-01T00:00:00.000Z" },
      "mem-b": { service: "mem-b", reachable: true, checkedAt: "2026-01-01T00:00:00.000Z" },
    },
  };
}

describe("generateRunId", () => {
  it("should embed the UTC date and minute", () => {
    expect(generateRunId(new Date("2026-03-04T05:06:07Z"))).toMatch(/^run-2026-03-04-0506-[a-z0-9]*$/);
  });
});

describe("renderReport", () => {
  it("should render the run in plain text", () => {
    expect(renderReport(createSummary()).split("\n")).toEqual([
      "Vector store differential fuzz report: run-1",
      "=".repeat(60),
      "Status: completed",
      "Seed: 42",
      "Started: 2026-01-01T00:00:00.000Z",
      "Duration: 1.50s",
      "Tests: 1/1",
      "Inconsistent tests: 1",
      "Consistency rate: 0.0%",
      "",
      "Services:",
      "- mem-a (healthy): 1/1 succeeded (100.0%), 0 excluded",
      "- mem-b (healthy): 0/1 succeeded (0.0%), 0 excluded",
      "",
      "Operations:",
      "- search: 1 tests, 1 inconsistent (0.0% consistency)",
      "",
      "Inconsistencies by severity:",
      "- error-divergent: 1",
      "- divergent: 0",
      "- informational: 0",
      "",
      "Top inconsistencies:",
      "1. [error-divergent] test 1 success: mem-a succeeded; mem-b failed",
      "",
    ]);
  });
});

describe("ResultWriter", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("should append one JSON line per result with non-finite numbers as strings", async () => {
    dir = await mkdtemp(join(tmpdir(), "vecdiff-writer-"));
    const writer = new ResultWriter({ resultsDir: dir, runId: "run-1" });

    await writer.add(createTestResult());
    await writer.add(createTestResult());

    const lines = (await readFile(writer.resultsPath, "utf8")).split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe("");
    const record: unknown = JSON.parse(lines[0] ?? "");
    expect(record).toMatchObject({ testCase: { parameters: { query: ["NaN", 0.2, 0.3, 0.4] } } });
  });

  it("should start with an empty results file", async () => {
    dir = await mkdtemp(join(tmpdir(), "vecdiff-writer-"));
    const writer = new ResultWriter({ resultsDir: dir, runId: "run-2" });

    await writer.open();

    expect(writer.dir).toBe(join(dir, "run-2"));
    expect(await readFile(writer.resultsPath, "utf8")).toBe("");
  });

  it("should write the summary, report and metrics when the run finishes", async () => {
    dir = await mkdtemp(join(tmpdir(), "vecdiff-writer-"));
    const writer = new ResultWriter({ resultsDir: dir, runId: "run-1" });
    const summary = createSummary();

    await writer.finish(summary, "# HELP vecdiff_test_cases_total test\n");

    const written = await readFile(join(writer.dir, "summary.json"), "utf8");
    expect(written.startsWith('{\n  "schemaVersion": 1,\n  "runId": "run-1",')).toBe(true);
    expect(JSON.parse(written)).toMatchObject({ status: "completed", testsExecuted: 1 });
    expect(await readFile(join(writer.dir, "report.txt"), "utf8")).toBe(renderReport(summary));
    expect(await readFile(join(writer.dir, "metrics.prom"), "utf8")).toBe("# HELP vecdiff_test_cases_total test\n");
  });
});
