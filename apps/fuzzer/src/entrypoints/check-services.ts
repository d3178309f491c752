/**
 * One-shot connectivity check: probe every configured service once and
 * print what answered. Exit code 0 when all services are reachable.
 */

import type { VectorStoreAdapter } from "../adapters/types.js";
import type { HealthStatus } from "../types/domain.js";
import { colors, initRuntime, log } from "./shared.js";

export async function probeAll(
  adapters: readonly VectorStoreAdapter[],
  timeoutMs: number
): Promise<HealthStatus[]> {
  return Promise.all(
    adapters.map(async (adapter) => {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      try {
        return await adapter.healthCheck({ signal: controller.signal });
      } finally {
        clearTimeout(timer);
      }
    })
  );
}

export function formatStatus(status: HealthStatus): string {
  if (status.reachable) {
    const details = [
      status.version !== undefined ? `version ${status.version}` : undefined,
      status.dialect !== undefined ? `dialect ${status.dialect}` : undefined,
      status.endpoint !== undefined ? `via ${status.endpoint}` : undefined,
    ].filter((part) => part !== undefined);
    return `${colors.green}✓${colors.reset} ${status.service}${details.length > 0 ? ` (${details.join(", ")})` : ""}`;
  }
  return `${colors.red}✗${colors.reset} ${status.service}: ${status.error ?? "unreachable"}`;
}

export async function checkServices(services?: string[]): Promise<number> {
  const { runConfig, adapters } = initRuntime({ services });

  console.log(`${colors.bold}Checking ${adapters.length} service(s)${colors.reset}\n`);
  const statuses = await probeAll(adapters, runConfig.health.probeTimeoutMs);

  for (const status of statuses) {
    console.log(`  ${formatStatus(status)}`);
  }

  const healthy = statuses.filter((status) => status.reachable).length;
  console.log(`\n${healthy}/${statuses.length} services reachable`);
  log.health.debug({ statuses }, "check complete");

  await Promise.all(adapters.map((adapter) => adapter.close()));
  return healthy === statuses.length ? 0 : 1;
}
