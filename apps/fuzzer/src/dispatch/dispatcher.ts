import type { UnhealthyPolicy } from "@vecdiff/config";
import type { VectorStoreAdapter } from "../adapters/types.js";
import { isAdapterError, TimeoutError, toErrorRecord } from "../errors.js";
import { log, logFailure } from "../logger.js";
import { adapterErrorsTotal, serviceCallDuration, serviceCallsTotal } from "../metrics.js";
import type { AdapterErrorRecord, DatabaseResult, HealthSnapshot, TestCase } from "../types/domain.js";
import { executeTestCase, StepFailure } from "./execute.js";

// =============================================================================
// Differential Dispatcher
// =============================================================================
// Fans one test case out to every usable service concurrently and waits for
// all of them to settle. Each call has its own AbortController and timeout;
// a slow or failing service never affects another service's result.
// =============================================================================

export interface DispatcherOptions {
  /** Default per-call timeout (ms) */
  timeoutMs: number;
  /** Per-service overrides (ms) */
  serviceTimeouts?: Readonly<Record<string, number>>;
  unhealthyPolicy: UnhealthyPolicy;
  /** Told about transport failures so the next snapshot re-probes the service */
  onConnectionError?: (service: string) => void;
}

export interface DispatchOutcome {
  /** One per invoked (or policy-failed) service, in configured order */
  results: DatabaseResult[];
  /** Services not invoked because they were unhealthy */
  excluded: string[];
}

function elapsedMs(start: bigint): number {
  return Number(process.hrtime.bigint() - start) / 1_000_000;
}

function describeFailure(error: unknown): AdapterErrorRecord {
  if (error instanceof StepFailure) {
    return { ...toErrorRecord(error.cause), step: error.step };
  }
  return toErrorRecord(error);
}

export class Dispatcher {
  private readonly adapters: readonly VectorStoreAdapter[];
  private readonly options: DispatcherOptions;
  /** Services that hit a ConnectionError in the current batch */
  private readonly batchExcluded = new Set<string>();

  constructor(adapters: readonly VectorStoreAdapter[], options: DispatcherOptions) {
    this.adapters = adapters;
    this.options = options;
  }

  /** Start a new batch: batch-local exclusions are forgotten */
  beginBatch(): void {
    this.batchExcluded.clear();
  }

  async dispatch(testCase: TestCase, snapshot: HealthSnapshot): Promise<DispatchOutcome> {
    const excluded: string[] = [];
    const slots: Promise<DatabaseResult>[] = [];
    const slotServices: string[] = [];
    const invoked = new Set<string>();
    const usable = new Set(snapshot.healthy);

    for (const adapter of this.adapters) {
      if (usable.has(adapter.name) && !this.batchExcluded.has(adapter.name)) {
        slots.push(this.invoke(adapter, testCase));
        slotServices.push(adapter.name);
        invoked.add(adapter.name);
        continue;
      }

      serviceCallsTotal.inc({ service: adapter.name, outcome: "excluded" });
      if (this.options.unhealthyPolicy === "fail") {
        const notInvoked: DatabaseResult = {
          service: adapter.name,
          success: false,
          error: { kind: "ConnectionError", message: "service unhealthy at dispatch time; not invoked" },
          executionTimeMs: 0,
        };
        slots.push(Promise.resolve(notInvoked));
        slotServices.push(adapter.name);
      } else {
        excluded.push(adapter.name);
      }
    }

    const settled = await Promise.allSettled(slots);
    const results = settled.map((outcome, index): DatabaseResult => {
      if (outcome.status === "fulfilled") return outcome.value;
      // invoke() converts every adapter failure; reaching here means a bug outside the adapter
      logFailure("dispatch", "invocation rejected", outcome.reason, { testId: testCase.id, index });
      return {
        service: slotServices[index] ?? "unknown",
        success: false,
        error: toErrorRecord(outcome.reason),
        executionTimeMs: 0,
      };
    });

    for (const result of results) {
      if (!result.success && result.error.kind === "ConnectionError" && invoked.has(result.service)) {
        this.batchExcluded.add(result.service);
        this.options.onConnectionError?.(result.service);
        log.dispatch.warn({ service: result.service, testId: testCase.id }, "excluded for rest of batch");
      }
    }

    return { results, excluded };
  }

  private timeoutFor(service: string): number {
    return this.options.serviceTimeouts?.[service] ?? this.options.timeoutMs;
  }

  /** Never rejects: every failure becomes a failed DatabaseResult */
  private async invoke(adapter: VectorStoreAdapter, testCase: TestCase): Promise<DatabaseResult> {
    const timeoutMs = this.timeoutFor(adapter.name);
    const controller = new AbortController();
    const start = process.hrtime.bigint();
    let timer: NodeJS.Timeout | undefined;

    // Adapters that ignore the signal still lose the race against the deadline
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(adapter.name, `${testCase.operation} timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      const data = await Promise.race([
        executeTestCase(adapter, testCase, { signal: controller.signal }),
        deadline,
      ]);
      const executionTimeMs = elapsedMs(start);

      serviceCallsTotal.inc({ service: adapter.name, outcome: "success" });
      serviceCallDuration.observe({ service: adapter.name, operation: testCase.operation }, executionTimeMs / 1000);

      return { service: adapter.name, success: true, data, executionTimeMs };
    } catch (error) {
      const executionTimeMs = elapsedMs(start);
      const record = describeFailure(error);
      const cause = error instanceof StepFailure ? error.cause : error;

      serviceCallsTotal.inc({ service: adapter.name, outcome: "failure" });
      serviceCallDuration.observe({ service: adapter.name, operation: testCase.operation }, executionTimeMs / 1000);
      adapterErrorsTotal.inc({ service: adapter.name, kind: record.kind });

      if (isAdapterError(cause)) {
        log.dispatch.debug(
          { service: adapter.name, testId: testCase.id, kind: record.kind, status: record.status, step: record.step },
          "service call failed"
        );
      } else {
        logFailure("dispatch", "adapter threw unexpectedly", cause, { service: adapter.name, testId: testCase.id });
      }

      return {
        service: adapter.name,
        success: false,
        error: record,
        executionTimeMs,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
