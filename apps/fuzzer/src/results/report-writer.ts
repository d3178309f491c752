/**
 * Result Writer
 *
 * Persists one run under <resultsDir>/<runId>/: TestResult records as JSON
 * Lines while the run progresses, then the summary, a plain-text report and
 * the Prometheus registry once it ends.
 */

import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { encodeRecord } from "../http/json.js";
import { log } from "../logger.js";
import type { TestResult } from "../types/domain.js";
import { RESULT_FILES, type RunSummary } from "./report-schema.js";

export interface ResultWriterOptions {
  resultsDir: string;
  runId?: string;
}

export function generateRunId(now: Date = new Date()): string {
  const [date = "", rest = ""] = now.toISOString().split("T");
  const time = rest.slice(0, 5).replace(":", "");
  const random = Math.random().toString(36).slice(2, 6);
  return `run-${date}-${time}-${random}`;
}

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

/**
 * Plain-text run report
 */
export function renderReport(summary: RunSummary): string {
  const stats = summary.statistics;
  const lines: string[] = [];

  lines.push(`Vector store differential fuzz report: ${summary.runId}`);
  lines.push("=".repeat(60));
  lines.push(`Status: ${summary.status}`);
  lines.push(`Seed: ${summary.seed}`);
  lines.push(`Started: ${summary.startedAt}`);
  lines.push(`Duration: ${(summary.durationMs / 1000).toFixed(2)}s`);
  lines.push(`Tests: ${summary.testsExecuted}/${summary.testsRequested}`);
  lines.push(`Inconsistent tests: ${stats.inconsistentTests}`);
  lines.push(`Consistency rate: ${percent(stats.consistencyRate)}`);

  lines.push("");
  lines.push("Services:");
  for (const service of stats.services) {
    const health = summary.health[service.service];
    const state = health?.reachable ? "healthy" : "unhealthy";
    lines.push(
      `- ${service.service} (${state}): ${service.succeeded}/${service.total} succeeded (${percent(service.successRate)}), ${service.excluded} excluded`
    );
  }

  lines.push("");
  lines.push("Operations:");
  for (const [operation, opStats] of Object.entries(stats.operations)) {
    if (opStats.total === 0) continue;
    lines.push(
      `- ${operation}: ${opStats.total} tests, ${opStats.inconsistent} inconsistent (${percent(opStats.consistencyRate)} consistency)`
    );
  }

  lines.push("");
  lines.push("Inconsistencies by severity:");
  for (const [severity, count] of Object.entries(stats.inconsistenciesBySeverity)) {
    lines.push(`- ${severity}: ${count}`);
  }

  if (stats.topInconsistencies.length > 0) {
    lines.push("");
    lines.push("Top inconsistencies:");
    stats.topInconsistencies.forEach((item, index) => {
      const step = item.step !== undefined ? ` step ${item.step}` : "";
      lines.push(`${index + 1}. [${item.severity}] test ${item.testId}${step} ${item.category}: ${item.description}`);
    });
  }

  return `${lines.join("\n")}\n`;
}

export class ResultWriter {
  readonly runId: string;
  readonly dir: string;
  private opened = false;
  private written = 0;

  constructor(options: ResultWriterOptions) {
    this.runId = options.runId ?? generateRunId();
    this.dir = join(options.resultsDir, this.runId);
  }

  get resultsPath(): string {
    return join(this.dir, RESULT_FILES.results);
  }

  async open(): Promise<void> {
    if (this.opened) return;
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.resultsPath, "");
    this.opened = true;
    log.report.debug({ dir: this.dir }, "results directory ready");
  }

  /** Append one record; callers await each write so lines keep generation order */
  async add(result: TestResult): Promise<void> {
    await this.open();
    await appendFile(this.resultsPath, `${encodeRecord(result)}\n`);
    this.written++;
  }

  async finish(summary: RunSummary, metricsText: string): Promise<void> {
    await this.open();
    await Promise.all([
      writeFile(join(this.dir, RESULT_FILES.summary), `${encodeRecord(summary, 2)}\n`),
      writeFile(join(this.dir, RESULT_FILES.report), renderReport(summary)),
      writeFile(join(this.dir, RESULT_FILES.metrics), metricsText),
    ]);
    log.report.info({ dir: this.dir, records: this.written }, "results written");
  }
}
