import type { AdapterErrorKind, AdapterErrorRecord } from "./types/domain.js";

// =============================================================================
// Adapter Errors
// =============================================================================
// Every failure an adapter reports is one of these. The dispatcher turns them
// into AdapterErrorRecords on failed results; nothing thrown by an adapter
// escapes a dispatch.
// =============================================================================

export interface AdapterErrorOptions {
  status?: number;
  /** Native error payload, kept verbatim */
  body?: unknown;
  cause?: unknown;
}

export abstract class AdapterError extends Error {
  abstract readonly kind: AdapterErrorKind;
  readonly service: string;
  readonly status?: number;
  readonly body?: unknown;

  constructor(service: string, message: string, options: AdapterErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.service = service;
    this.status = options.status;
    this.body = options.body;
  }

  toRecord(): AdapterErrorRecord {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.status !== undefined && { status: this.status }),
      ...(this.body !== undefined && { body: this.body }),
    };
  }
}

/** Transport failure: refused, reset, DNS, auth rejected at connect */
export class ConnectionError extends AdapterError {
  readonly kind = "ConnectionError";
  override name = "ConnectionError";
}

export class TimeoutError extends AdapterError {
  readonly kind = "Timeout";
  override name = "TimeoutError";
}

/** The service answered with something the adapter cannot interpret */
export class ProtocolError extends AdapterError {
  readonly kind = "ProtocolError";
  override name = "ProtocolError";
}

/** The service rejected the request; body holds its native error */
export class ServiceError extends AdapterError {
  readonly kind = "ServiceError";
  override name = "ServiceError";
}

/** The collection was created with another metric and the service cannot switch per query */
export class UnsupportedMetricError extends AdapterError {
  readonly kind = "UnsupportedMetric";
  override name = "UnsupportedMetricError";
}

export function isAdapterError(error: unknown): error is AdapterError {
  return error instanceof AdapterError;
}

/**
 * Normalize anything thrown during an adapter call into a record.
 * Unknown throwables become ProtocolError records.
 */
export function toErrorRecord(error: unknown): AdapterErrorRecord {
  if (isAdapterError(error)) {
    return error.toRecord();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { kind: "ProtocolError", message: `Unexpected adapter failure: ${message}` };
}

// =============================================================================
// Fatal Errors
// =============================================================================

/** Invalid generator knobs; the only fatal error during a run */
export class FuzzConfigError extends Error {
  override name = "FuzzConfigError";
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid fuzz configuration: ${problems.join("; ")}`);
    this.problems = problems;
  }
}
