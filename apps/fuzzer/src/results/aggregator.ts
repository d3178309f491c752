import type { Operation } from "@vecdiff/config";
import {
  type AdapterErrorKind,
  type Inconsistency,
  type InconsistencyCategory,
  type Severity,
  type TestResult,
} from "../types/domain.js";
import { sortBySeverity } from "../domain/compare/comparator.js";

// =============================================================================
// Result Aggregator
// =============================================================================
// Run-level statistics over TestResults. A test counts as inconsistent when it
// carries at least one non-informational Inconsistency. Services excluded as
// unhealthy are counted as excluded, never as failed.
// =============================================================================

export interface ServiceStats {
  service: string;
  /** Test cases the service took part in (invoked or policy-failed) */
  total: number;
  succeeded: number;
  failed: number;
  /** Test cases where the service was not invoked */
  excluded: number;
  /** succeeded / total, 0 when total is 0 */
  successRate: number;
  errorsByKind: Record<AdapterErrorKind, number>;
  avgExecutionMs: number;
}

export interface OperationStats {
  total: number;
  inconsistent: number;
  /** (total - inconsistent) / total, 1 when total is 0 */
  consistencyRate: number;
}

export interface RunStatistics {
  totalTests: number;
  consistentTests: number;
  inconsistentTests: number;
  consistencyRate: number;
  inconsistenciesBySeverity: Record<Severity, number>;
  inconsistenciesByCategory: Partial<Record<InconsistencyCategory, number>>;
  services: ServiceStats[];
  operations: Record<Operation, OperationStats>;
  edgeCases: Record<string, number>;
  /** Most severe first, capped */
  topInconsistencies: Array<Inconsistency & { testId: number }>;
}

const TOP_INCONSISTENCIES = 10;

function ratio(part: number, whole: number, empty: number): number {
  return whole === 0 ? empty : part / whole;
}

function emptyErrorCounts(): Record<AdapterErrorKind, number> {
  return {
    ConnectionError: 0,
    Timeout: 0,
    ProtocolError: 0,
    ServiceError: 0,
    UnsupportedMetric: 0,
  };
}

interface ServiceAccumulator {
  total: number;
  succeeded: number;
  failed: number;
  excluded: number;
  errorsByKind: Record<AdapterErrorKind, number>;
  executionMs: number;
}

export class ResultAggregator {
  private readonly serviceOrder: string[];
  private readonly perService = new Map<string, ServiceAccumulator>();
  private readonly perOperation = new Map<Operation, { total: number; inconsistent: number }>();
  private readonly bySeverity: Record<Severity, number> = {
    "error-divergent": 0,
    divergent: 0,
    informational: 0,
  };
  private readonly byCategory: Partial<Record<InconsistencyCategory, number>> = {};
  private readonly edgeCases: Record<string, number> = {};
  /** Bounded to the reported top entries */
  private notable: Array<Inconsistency & { testId: number }> = [];
  private totalTests = 0;
  private inconsistentTests = 0;

  constructor(services: readonly string[] = []) {
    this.serviceOrder = [...services];
    for (const service of services) this.accumulatorFor(service);
  }

  add(result: TestResult): void {
    this.totalTests++;
    const operation = result.testCase.operation;

    for (const outcome of result.results) {
      const stats = this.accumulatorFor(outcome.service);
      stats.total++;
      stats.executionMs += outcome.executionTimeMs;
      if (outcome.success) {
        stats.succeeded++;
      } else {
        stats.failed++;
        stats.errorsByKind[outcome.error.kind]++;
      }
    }
    for (const service of result.excluded) {
      this.accumulatorFor(service).excluded++;
    }

    const inconsistent = result.inconsistencies.some((item) => item.kind !== "informational");
    if (inconsistent) this.inconsistentTests++;

    const opStats = this.perOperation.get(operation) ?? { total: 0, inconsistent: 0 };
    opStats.total++;
    if (inconsistent) opStats.inconsistent++;
    this.perOperation.set(operation, opStats);

    if (result.testCase.edgeCase !== undefined) {
      this.edgeCases[result.testCase.edgeCase] = (this.edgeCases[result.testCase.edgeCase] ?? 0) + 1;
    }

    for (const item of result.inconsistencies) {
      this.bySeverity[item.severity]++;
      this.byCategory[item.category] = (this.byCategory[item.category] ?? 0) + 1;
      if (item.kind !== "informational") {
        this.notable.push({ ...item, testId: result.testCase.id });
      }
    }
    // Stable sort keeps earlier entries first among equal severities
    if (this.notable.length > TOP_INCONSISTENCIES) {
      this.notable = sortBySeverity(this.notable).slice(0, TOP_INCONSISTENCIES);
    }
  }

  statistics(): RunStatistics {
    const services = this.serviceOrder.map((service): ServiceStats => {
      const stats = this.accumulatorFor(service);
      return {
        service,
        total: stats.total,
        succeeded: stats.succeeded,
        failed: stats.failed,
        excluded: stats.excluded,
        successRate: ratio(stats.succeeded, stats.total, 0),
        errorsByKind: { ...stats.errorsByKind },
        avgExecutionMs: ratio(stats.executionMs, stats.total, 0),
      };
    });

    const operations: Record<Operation, OperationStats> = {
      insert: this.operationStats("insert"),
      batch_insert: this.operationStats("batch_insert"),
      search: this.operationStats("search"),
      batch_search: this.operationStats("batch_search"),
      delete: this.operationStats("delete"),
      mixed: this.operationStats("mixed"),
    };

    return {
      totalTests: this.totalTests,
      consistentTests: this.totalTests - this.inconsistentTests,
      inconsistentTests: this.inconsistentTests,
      consistencyRate: ratio(this.totalTests - this.inconsistentTests, this.totalTests, 1),
      inconsistenciesBySeverity: { ...this.bySeverity },
      inconsistenciesByCategory: { ...this.byCategory },
      services,
      operations,
      edgeCases: { ...this.edgeCases },
      topInconsistencies: sortBySeverity(this.notable).slice(0, TOP_INCONSISTENCIES),
    };
  }

  private operationStats(operation: Operation): OperationStats {
    const stats = this.perOperation.get(operation) ?? { total: 0, inconsistent: 0 };
    return {
      total: stats.total,
      inconsistent: stats.inconsistent,
      consistencyRate: ratio(stats.total - stats.inconsistent, stats.total, 1),
    };
  }

  private accumulatorFor(service: string): ServiceAccumulator {
    let stats = this.perService.get(service);
    if (!stats) {
      stats = { total: 0, succeeded: 0, failed: 0, excluded: 0, errorsByKind: emptyErrorCounts(), executionMs: 0 };
      this.perService.set(service, stats);
      if (!this.serviceOrder.includes(service)) this.serviceOrder.push(service);
    }
    return stats;
  }
}
