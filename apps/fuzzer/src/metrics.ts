import promClient from "prom-client";

// Initialize Prometheus default metrics (CPU, memory, etc.)
// Guard against multiple registrations (e.g., in test environments)
if (!promClient.register.getSingleMetric("vecdiff_process_cpu_user_seconds_total")) {
  promClient.collectDefaultMetrics({
    prefix: "vecdiff_",
    gcDurationBuckets: [0.001, 0.01, 0.1, 1, 2, 5],
  });
}

export const register = promClient.register;

// ============================================
// Generation Metrics
// ============================================

/**
 * Counter: Test cases executed
 * Labels: operation, edge_case (curated edge case name or "none")
 */
export const testCasesTotal = new promClient.Counter({
  name: "vecdiff_test_cases_total",
  help: "Total number of test cases dispatched",
  labelNames: ["operation", "edge_case"],
});

// ============================================
// Service Call Metrics
// ============================================

/**
 * Histogram: Duration of one test case against one service
 * Labels: service, operation
 */
export const serviceCallDuration = new promClient.Histogram({
  name: "vecdiff_service_call_duration_seconds",
  help: "Duration of a test case against one service",
  labelNames: ["service", "operation"],
  buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 30], // 1ms to 30s
});

/**
 * Counter: Service calls by outcome
 * Labels: service, outcome (success/failure/excluded)
 */
export const serviceCallsTotal = new promClient.Counter({
  name: "vecdiff_service_calls_total",
  help: "Total number of service calls by outcome",
  labelNames: ["service", "outcome"],
});

/**
 * Counter: Adapter errors by kind
 * Labels: service, kind (ConnectionError/Timeout/ProtocolError/ServiceError/UnsupportedMetric)
 */
export const adapterErrorsTotal = new promClient.Counter({
  name: "vecdiff_adapter_errors_total",
  help: "Total number of adapter errors by kind",
  labelNames: ["service", "kind"],
});

// ============================================
// Comparison Metrics
// ============================================

/**
 * Counter: Inconsistencies found
 * Labels: kind (error-divergent/divergent/informational), category
 */
export const inconsistenciesTotal = new promClient.Counter({
  name: "vecdiff_inconsistencies_total",
  help: "Total number of inconsistencies detected",
  labelNames: ["kind", "category"],
});

// ============================================
// Health Metrics
// ============================================

/**
 * Gauge: 1 when the service was healthy in the latest snapshot
 */
export const serviceHealthy = new promClient.Gauge({
  name: "vecdiff_service_healthy",
  help: "Whether the service was healthy in the latest health snapshot",
  labelNames: ["service"],
});

/**
 * Counter: Health probes by result
 * Labels: service, result (reachable/unreachable)
 */
export const healthProbesTotal = new promClient.Counter({
  name: "vecdiff_health_probes_total",
  help: "Total number of health probes",
  labelNames: ["service", "result"],
});
