import type { Metric, ServiceConfig } from "@vecdiff/config";
import type { FetchLike } from "../http/service-client.js";

/** Construction options every remote adapter receives */
export interface AdapterOptions {
  service: ServiceConfig;
  /** Metric collections are created with */
  metric: Metric;
  probeTimeoutMs: number;
  fetchImpl?: FetchLike;
}

export function bearer(token: string | undefined): Record<string, string> {
  return token ? { Authorization: `Bearer ${token}` } : {};
}

export function isAlreadyExists(text: string): boolean {
  return /already exists?/i.test(text);
}
