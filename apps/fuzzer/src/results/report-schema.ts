/**
 * Run Summary Schema
 *
 * Written to summary.json at the end of every run, including aborted ones,
 * so historical runs can be compared without re-reading results.jsonl.
 */

import type { RunStatistics } from "./aggregator.js";
import type { HealthStatus } from "../types/domain.js";

export type RunStatus = "completed" | "aborted_no_services";

export interface RunSummary {
  /** Schema version for forward compatibility */
  schemaVersion: 1;

  runId: string;

  status: RunStatus;

  /** Generator seed; replays the same test cases */
  seed: number;

  /** ISO timestamps */
  startedAt: string;
  completedAt: string;
  durationMs: number;

  /** Configured services, in dispatch order */
  services: string[];

  testsRequested: number;
  testsExecuted: number;

  statistics: RunStatistics;

  /** Last known health per service */
  health: Record<string, HealthStatus>;
}

/** File names inside <resultsDir>/<runId>/ */
export const RESULT_FILES = {
  results: "results.jsonl",
  summary: "summary.json",
  report: "report.txt",
  metrics: "metrics.prom",
} as const;
