import pino from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";
import { config } from "./config.js";

const isDev = config.NODE_ENV === "development";

// =============================================================================
// Trace Context (Correlation IDs)
// =============================================================================
// Every generated test case runs inside its own trace, so the adapter calls,
// comparisons and health events it causes share one traceId.
//
// Usage:
//   await withTraceAsync(async () => {
//     log.dispatch.debug({ testId }, "dispatching"); // traceId added automatically
//     await dispatcher.dispatch(testCase, snapshot); // nested logs get same traceId
//   });
// =============================================================================

interface TraceContext {
  traceId: string;
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Generate a short, unique trace ID (12 chars, base64url)
 */
export function generateTraceId(): string {
  return randomBytes(9).toString("base64url").slice(0, 12);
}

/**
 * Run a function with a trace context. All logs within will include the traceId.
 */
export async function withTraceAsync<T>(
  fn: () => Promise<T>,
  traceId?: string
): Promise<T> {
  const ctx: TraceContext = { traceId: traceId ?? generateTraceId() };
  return traceStorage.run(ctx, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================
//
// SUCCESS (short, info level):
//   log.run.info({ runId, tests: 50 }, "completed")
//
// FAILURE (detailed, error level):
//   log.adapter.error({ service, kind, status, body }, "protocol error")
//
// DEBUG (verbose):
//   log.compare.debug({ testId, overlap }, "search compared")
//
// =============================================================================

const baseConfig: pino.LoggerOptions = {
  level: config.LOG_LEVEL,

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  // Mixin adds traceId to every log entry automatically
  mixin() {
    const traceId = traceStorage.getStore()?.traceId;
    return traceId ? { traceId } : {};
  },
};

export const logger = isDev
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // Test case generation
  fuzz: logger.child({ component: "fuzz" }),

  // Fan-out of a test case to services
  dispatch: logger.child({ component: "dispatch" }),

  // Cross-service comparison
  compare: logger.child({ component: "compare" }),

  // Health probes and snapshots
  health: logger.child({ component: "health" }),

  // Wire-level adapter events
  adapter: logger.child({ component: "adapter" }),

  // Run lifecycle
  run: logger.child({ component: "run" }),

  // Result files
  report: logger.child({ component: "report" }),

  system: logger.child({ component: "system" }),
};

export type LogComponent = keyof typeof log;

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Log a successful operation with minimal context
 */
export function logSuccess(
  component: LogComponent,
  event: string,
  context: Record<string, unknown>
): void {
  log[component].info(context, event);
}

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: LogComponent,
  event: string,
  error: unknown,
  context: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Log a warning for unexpected but non-critical issues
 */
export function logWarning(
  component: LogComponent,
  event: string,
  context: Record<string, unknown>
): void {
  log[component].warn(context, event);
}

/**
 * Create a timer for measuring operation duration
 */
export function createTimer(): () => string {
  const start = process.hrtime.bigint();
  return () => {
    const end = process.hrtime.bigint();
    const ms = Number(end - start) / 1_000_000;
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    return `${(ms / 1000).toFixed(2)}s`;
  };
}

export default log;
