import type { RunConfig } from "@vecdiff/config";
import type { VectorStoreAdapter } from "../adapters/types.js";
import { Dispatcher } from "../dispatch/dispatcher.js";
import { compareResults } from "../domain/compare/comparator.js";
import { FuzzGenerator } from "../domain/fuzz/generator.js";
import type { Clock, DelayProvider } from "../domain/utils/delay.js";
import { drawSeed } from "../domain/utils/random.js";
import { HealthMonitor } from "../health/health-monitor.js";
import { createTimer, log, logFailure, logSuccess, logWarning, withTraceAsync } from "../logger.js";
import { inconsistenciesTotal, register, testCasesTotal } from "../metrics.js";
import { ResultAggregator } from "../results/aggregator.js";
import type { RunStatus, RunSummary } from "../results/report-schema.js";
import type { ResultWriter } from "../results/report-writer.js";
import { generateRunId } from "../results/report-writer.js";
import { RESULT_SCHEMA_VERSION, type HealthSnapshot, type TestCase, type TestResult } from "../types/domain.js";

// =============================================================================
// Fuzz Runner
// =============================================================================
// One run: probe services, create collections, then generate and dispatch
// test cases in batches. The health snapshot is taken once per batch. Cases
// run one after another so results reach the sinks in generation order.
// =============================================================================

/** Receives every TestResult in generation order */
export interface ResultSink {
  add(result: TestResult): void | Promise<void>;
}

export interface FuzzRunnerOptions {
  runConfig: RunConfig;
  adapters: readonly VectorStoreAdapter[];
  /** Persists results; omitted in tests that only inspect the summary */
  writer?: ResultWriter;
  sinks?: readonly ResultSink[];
  delay?: DelayProvider;
  clock?: Clock;
}

export class FuzzRunner {
  readonly runId: string;
  readonly seed: number;
  private readonly runConfig: RunConfig;
  private readonly adapters: readonly VectorStoreAdapter[];
  private readonly writer?: ResultWriter;
  private readonly sinks: readonly ResultSink[];
  private readonly generator: FuzzGenerator;
  private readonly monitor: HealthMonitor;
  private readonly dispatcher: Dispatcher;
  private readonly aggregator: ResultAggregator;
  /** Services whose collections exist */
  private readonly prepared = new Set<string>();

  constructor(options: FuzzRunnerOptions) {
    const { runConfig, adapters } = options;
    this.runConfig = runConfig;
    this.adapters = adapters;
    this.writer = options.writer;
    this.sinks = options.sinks ?? [];
    this.runId = options.writer?.runId ?? generateRunId();
    this.seed = runConfig.seed ?? drawSeed();

    // Throws FuzzConfigError before anything touches a service
    this.generator = new FuzzGenerator(runConfig.fuzz, this.seed);

    this.monitor = new HealthMonitor(adapters, {
      ...runConfig.health,
      delay: options.delay,
      clock: options.clock,
    });

    this.dispatcher = new Dispatcher(adapters, {
      timeoutMs: runConfig.dispatch.timeoutMs,
      serviceTimeouts: Object.fromEntries(runConfig.services.map((service) => [service.name, service.timeoutMs])),
      unhealthyPolicy: runConfig.dispatch.unhealthyPolicy,
      onConnectionError: (service) => this.monitor.markSuspect(service),
    });

    this.aggregator = new ResultAggregator(adapters.map((adapter) => adapter.name));
  }

  async run(): Promise<RunSummary> {
    const startedAt = new Date();
    const timer = createTimer();
    const { numTests, batchSize } = this.runConfig.run;

    log.run.info(
      { runId: this.runId, seed: this.seed, tests: numTests, services: this.adapters.map((adapter) => adapter.name) },
      "run starting"
    );

    let executed = 0;
    let status: RunStatus = "completed";

    try {
      const initial = await this.monitor.initialize();

      if (initial.healthy.length === 0) {
        status = "aborted_no_services";
        logWarning("run", "no reachable services, aborting", { unhealthy: initial.unhealthy });
      } else {
        while (executed < numTests) {
          const snapshot = await this.monitor.snapshotForBatch();
          await this.prepareCollections(snapshot);
          this.dispatcher.beginBatch();

          const size = Math.min(batchSize, numTests - executed);
          for (let i = 0; i < size; i++) {
            const testCase = this.generator.next();
            const result = await withTraceAsync(() => this.runCase(testCase, snapshot));
            await this.emit(result);
            executed++;
          }

          log.run.debug({ executed, total: numTests, healthy: snapshot.healthy }, "batch complete");
        }
      }
    } finally {
      if (status === "completed" && this.runConfig.run.cleanup) {
        await this.cleanup();
      }
      await this.closeAll();
    }

    const summary = this.buildSummary(status, startedAt, executed);

    if (this.writer) {
      await this.writer.finish(summary, await register.metrics());
    }

    logSuccess("run", "run finished", {
      runId: this.runId,
      status,
      executed,
      inconsistent: summary.statistics.inconsistentTests,
      duration: timer(),
    });

    return summary;
  }

  private async runCase(testCase: TestCase, snapshot: HealthSnapshot): Promise<TestResult> {
    const startedAt = new Date().toISOString();
    testCasesTotal.inc({ operation: testCase.operation, edge_case: testCase.edgeCase ?? "none" });

    const { results, excluded } = await this.dispatcher.dispatch(testCase, snapshot);
    const inconsistencies = compareResults(testCase, results, excluded, this.runConfig.compare);

    for (const item of inconsistencies) {
      inconsistenciesTotal.inc({ kind: item.kind, category: item.category });
    }
    if (inconsistencies.some((item) => item.kind !== "informational")) {
      log.compare.info(
        { testId: testCase.id, operation: testCase.operation, categories: inconsistencies.map((item) => item.category) },
        "inconsistency found"
      );
    }

    return {
      schemaVersion: RESULT_SCHEMA_VERSION,
      testCase,
      results,
      excluded,
      inconsistencies,
      startedAt,
    };
  }

  private async emit(result: TestResult): Promise<void> {
    this.aggregator.add(result);
    if (this.writer) await this.writer.add(result);
    for (const sink of this.sinks) {
      await sink.add(result);
    }
  }

  /**
   * Connects and creates collections on healthy services not prepared yet,
   * including those that recover after startup. Failures surface in the
   * batch's dispatch and are retried once the service probes healthy again.
   */
  private async prepareCollections(snapshot: HealthSnapshot): Promise<void> {
    const pending = this.adapters.filter(
      (adapter) => snapshot.healthy.includes(adapter.name) && !this.prepared.has(adapter.name)
    );
    const { dimension, fuzz } = this.runConfig;

    await Promise.all(
      pending.map(async (adapter) => {
        try {
          await adapter.connect();
          for (const collection of fuzz.collections) {
            await adapter.ensureCollection(collection, dimension);
          }
          this.prepared.add(adapter.name);
        } catch (error) {
          logFailure("run", "collection setup failed", error, { service: adapter.name });
          this.monitor.markSuspect(adapter.name);
        }
      })
    );
  }

  private async cleanup(): Promise<void> {
    const reachable = this.monitor.current()?.healthy ?? [];
    const targets = this.adapters.filter((adapter) => reachable.includes(adapter.name));

    await Promise.all(
      targets.map(async (adapter) => {
        for (const collection of this.runConfig.fuzz.collections) {
          try {
            await adapter.dropCollection(collection);
          } catch (error) {
            logWarning("run", "cleanup failed", {
              service: adapter.name,
              collection,
              error: error instanceof Error ? error.message : String(error),
            });
          }
        }
      })
    );
  }

  private async closeAll(): Promise<void> {
    const outcomes = await Promise.allSettled(this.adapters.map((adapter) => adapter.close()));
    outcomes.forEach((outcome, index) => {
      if (outcome.status === "rejected") {
        logWarning("run", "close failed", { service: this.adapters[index]?.name, error: String(outcome.reason) });
      }
    });
  }

  private buildSummary(status: RunStatus, startedAt: Date, executed: number): RunSummary {
    const completedAt = new Date();
    return {
      schemaVersion: 1,
      runId: this.runId,
      status,
      seed: this.seed,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
      services: this.adapters.map((adapter) => adapter.name),
      testsRequested: this.runConfig.run.numTests,
      testsExecuted: executed,
      statistics: this.aggregator.statistics(),
      health: this.monitor.finalStatuses(),
    };
  }
}
