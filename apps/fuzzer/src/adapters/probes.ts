import type { HttpMethod, ServiceHttpClient, ServiceResponse } from "../http/service-client.js";
import type { CallContext } from "./types.js";
import type { HealthStatus } from "../types/domain.js";

// =============================================================================
// Ranked Health Probes
// =============================================================================
// Each service lists the endpoints that prove it is up, best first. The first
// endpoint that answers acceptably wins and may reveal the API dialect and
// server version.
// =============================================================================

export interface ProbeEndpoint {
  path: string;
  method?: HttpMethod;
  body?: unknown;
  /** Dialect this endpoint implies, when it implies one */
  dialect?: string;
  /** Default: any 2xx */
  accept?: (response: ServiceResponse) => boolean;
  version?: (response: ServiceResponse) => string | undefined;
}

export interface ProbeOptions {
  timeoutMs: number;
  ctx?: CallContext;
}

/**
 * Probe endpoints in order. Never rejects.
 */
export async function probeEndpoints(
  client: ServiceHttpClient,
  endpoints: readonly ProbeEndpoint[],
  options: ProbeOptions
): Promise<HealthStatus> {
  const failures: string[] = [];

  for (const endpoint of endpoints) {
    try {
      const response = await client.request({
        method: endpoint.method ?? "GET",
        path: endpoint.path,
        body: endpoint.body,
        signal: options.ctx?.signal,
        timeoutMs: options.timeoutMs,
      });

      const accepted = endpoint.accept ? endpoint.accept(response) : response.ok;
      if (accepted) {
        return {
          service: client.service,
          reachable: true,
          endpoint: endpoint.path,
          ...(endpoint.dialect !== undefined && { dialect: endpoint.dialect }),
          ...(endpoint.version && { version: endpoint.version(response) }),
          checkedAt: new Date().toISOString(),
        };
      }
      failures.push(`${endpoint.path}: HTTP ${response.status}`);
    } catch (error) {
      failures.push(`${endpoint.path}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  return {
    service: client.service,
    reachable: false,
    error: failures.join("; ") || "no probe endpoints",
    checkedAt: new Date().toISOString(),
  };
}

/** Read a string field from an unknown JSON object */
export function stringField(body: unknown, key: string): string | undefined {
  if (typeof body === "object" && body !== null && key in body) {
    const value: unknown = Reflect.get(body, key);
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
}
