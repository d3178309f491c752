import type { HealthMode } from "@vecdiff/config";
import type { VectorStoreAdapter } from "../adapters/types.js";
import { calculateProbeBackoff } from "../domain/utils/backoff.js";
import { systemClock, TimeoutDelayProvider, type Clock, type DelayProvider } from "../domain/utils/delay.js";
import { log } from "../logger.js";
import { healthProbesTotal, serviceHealthy } from "../metrics.js";
import type { HealthSnapshot, HealthStatus } from "../types/domain.js";

// =============================================================================
// Health Monitor
// =============================================================================
// Produces the immutable snapshot the dispatcher uses for one batch.
//   default - services unhealthy at start stay excluded for the run; others
//             are re-probed at batch boundaries when a dispatch reported a
//             transport failure, when they were unhealthy in the last
//             snapshot, or when the periodic interval is due
//   strict  - every service is re-probed before every batch
// =============================================================================

export interface HealthMonitorOptions {
  mode: HealthMode;
  probeTimeoutMs: number;
  startupAttempts: number;
  retryDelayMs: number;
  /** Periodic re-probe of services healthy at start (0 = never) */
  intervalMs: number;
  delay?: DelayProvider;
  clock?: Clock;
}

export class HealthMonitor {
  private readonly adapters: readonly VectorStoreAdapter[];
  private readonly options: HealthMonitorOptions;
  private readonly delay: DelayProvider;
  private readonly clock: Clock;
  private readonly statuses = new Map<string, HealthStatus>();
  private readonly lastProbedAt = new Map<string, number>();
  private readonly unhealthyAtStart = new Set<string>();
  private readonly suspects = new Set<string>();
  private initialized = false;
  private latest: HealthSnapshot | null = null;

  constructor(adapters: readonly VectorStoreAdapter[], options: HealthMonitorOptions) {
    this.adapters = adapters;
    this.options = options;
    this.delay = options.delay ?? new TimeoutDelayProvider();
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Startup probing: up to startupAttempts per service, with exponential
   * backoff between attempts. All services are probed concurrently.
   */
  async initialize(): Promise<HealthSnapshot> {
    await Promise.all(
      this.adapters.map(async (adapter) => {
        let status = await this.probe(adapter);
        for (let attempt = 1; !status.reachable && attempt < this.options.startupAttempts; attempt++) {
          const wait = calculateProbeBackoff(attempt - 1, this.options.retryDelayMs);
          log.health.debug({ service: adapter.name, attempt, delayMs: wait }, "retrying probe");
          await this.delay.delay(wait);
          status = await this.probe(adapter);
        }
        if (!status.reachable) {
          this.unhealthyAtStart.add(adapter.name);
          log.health.warn({ service: adapter.name, error: status.error }, "unhealthy at start");
        }
      })
    );

    this.initialized = true;
    return this.buildSnapshot();
  }

  /**
   * Snapshot for the next batch. Never changes once returned.
   */
  async snapshotForBatch(): Promise<HealthSnapshot> {
    if (!this.initialized) {
      return this.initialize();
    }

    const now = this.clock();
    const due = this.adapters.filter((adapter) => this.shouldReprobe(adapter.name, now));
    await Promise.all(due.map((adapter) => this.probe(adapter)));
    this.suspects.clear();

    return this.buildSnapshot();
  }

  /** Record a transport failure seen during dispatch */
  markSuspect(service: string): void {
    this.suspects.add(service);
  }

  /** Latest snapshot, or null before initialize() */
  current(): HealthSnapshot | null {
    return this.latest;
  }

  /** Last known status per service */
  finalStatuses(): Record<string, HealthStatus> {
    return Object.fromEntries(this.statuses);
  }

  private shouldReprobe(service: string, now: number): boolean {
    if (this.options.mode === "strict") return true;
    if (this.unhealthyAtStart.has(service)) return false;
    if (this.suspects.has(service)) return true;
    if (this.statuses.get(service)?.reachable === false) return true;

    const last = this.lastProbedAt.get(service) ?? 0;
    return this.options.intervalMs > 0 && now - last >= this.options.intervalMs;
  }

  private async probe(adapter: VectorStoreAdapter): Promise<HealthStatus> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.probeTimeoutMs);

    let status: HealthStatus;
    try {
      status = await adapter.healthCheck({ signal: controller.signal });
    } catch (error) {
      status = {
        service: adapter.name,
        reachable: false,
        error: error instanceof Error ? error.message : String(error),
        checkedAt: new Date().toISOString(),
      };
    } finally {
      clearTimeout(timer);
    }

    const previous = this.statuses.get(adapter.name);
    if (previous && previous.reachable !== status.reachable) {
      log.health.info({ service: adapter.name, reachable: status.reachable, error: status.error }, "health changed");
    }

    this.statuses.set(adapter.name, status);
    this.lastProbedAt.set(adapter.name, this.clock());
    healthProbesTotal.inc({ service: adapter.name, result: status.reachable ? "reachable" : "unreachable" });
    return status;
  }

  private buildSnapshot(): HealthSnapshot {
    const healthy: string[] = [];
    const unhealthy: string[] = [];
    const statuses: Record<string, HealthStatus> = {};

    for (const adapter of this.adapters) {
      const status = this.statuses.get(adapter.name);
      const usable =
        status?.reachable === true && (this.options.mode === "strict" || !this.unhealthyAtStart.has(adapter.name));
      (usable ? healthy : unhealthy).push(adapter.name);
      if (status) statuses[adapter.name] = { ...status };
      serviceHealthy.set({ service: adapter.name }, usable ? 1 : 0);
    }

    const snapshot: HealthSnapshot = Object.freeze({
      takenAt: new Date().toISOString(),
      healthy: Object.freeze(healthy),
      unhealthy: Object.freeze(unhealthy),
      statuses: Object.freeze(statuses),
    });

    log.health.debug({ healthy, unhealthy }, "snapshot");
    this.latest = snapshot;
    return snapshot;
  }
}
