import type { z } from "zod";
import { ConnectionError, ProtocolError, ServiceError, TimeoutError } from "../errors.js";
import { log } from "../logger.js";
import { encodeJson, parseJsonLenient } from "./json.js";

// =============================================================================
// Service HTTP Client
// =============================================================================
// One client per adapter. Single attempt per call: a fuzzer must see exactly
// what the service did with one request, so there are no retries here.
// - Request timeout with AbortController, combined with the caller's signal
// - Transport failures classified as ConnectionError / TimeoutError
// - Any HTTP status is returned; adapters decide what is a ServiceError
// =============================================================================

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export interface ServiceClientOptions {
  /** Service name used in errors and logs */
  service: string;
  baseUrl: string;
  /** Default request timeout (ms) */
  timeoutMs: number;
  /** Custom headers added to all requests */
  headers?: Record<string, string>;
  fetchImpl?: FetchLike;
}

export interface ServiceRequest {
  method?: HttpMethod;
  path: string;
  /** Encoded with encodeJson unless already a string */
  body?: unknown;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface ServiceResponse {
  ok: boolean;
  status: number;
  /** Parsed JSON, or the raw text when the body is not JSON */
  body: unknown;
  text: string;
  latencyMs: number;
}

/** Raw payloads in logs and error messages are cut to this length */
const MAX_LOGGED_BODY = 500;

export function truncate(text: string, max: number = MAX_LOGGED_BODY): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

export class ServiceHttpClient {
  readonly service: string;
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;

  constructor(options: ServiceClientOptions) {
    this.service = options.service;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.headers = {
      "User-Agent": "vecdiff/0.1",
      "Content-Type": "application/json",
      Accept: "application/json",
      ...options.headers,
    };
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Execute a single HTTP request. Resolves for every HTTP status;
   * rejects with ConnectionError or TimeoutError when no response arrives.
   */
  async request(request: ServiceRequest): Promise<ServiceResponse> {
    const start = process.hrtime.bigint();
    const url = `${this.baseUrl}${request.path}`;
    const timeout = request.timeoutMs ?? this.timeoutMs;

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);

    const onCallerAbort = () => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    } else {
      request.signal?.addEventListener("abort", onCallerAbort, { once: true });
    }

    try {
      const response = await this.fetchImpl(url, {
        method: request.method ?? "GET",
        headers: this.headers,
        body:
          request.body === undefined
            ? undefined
            : typeof request.body === "string"
              ? request.body
              : encodeJson(request.body),
        signal: controller.signal,
      });

      const text = await response.text();
      const latencyMs = Number(process.hrtime.bigint() - start) / 1_000_000;

      log.adapter.trace(
        { service: this.service, method: request.method ?? "GET", path: request.path, status: response.status },
        "response"
      );

      return {
        ok: response.ok,
        status: response.status,
        body: parseBody(text),
        text,
        latencyMs,
      };
    } catch (error) {
      if (controller.signal.aborted) {
        const reason = timedOut ? `timed out after ${timeout}ms` : "aborted by caller";
        throw new TimeoutError(this.service, `${request.method ?? "GET"} ${request.path} ${reason}`, {
          cause: error,
        });
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectionError(this.service, `${request.method ?? "GET"} ${url} failed: ${message}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      request.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  /**
   * Request and require a 2xx answer; anything else is a ServiceError
   * carrying the native body verbatim.
   */
  async expectOk(request: ServiceRequest): Promise<ServiceResponse> {
    const response = await this.request(request);
    if (!response.ok) {
      throw this.serviceError(response, `${request.method ?? "GET"} ${request.path}`);
    }
    return response;
  }

  serviceError(response: ServiceResponse, what: string): ServiceError {
    return new ServiceError(this.service, `${what} returned HTTP ${response.status}: ${truncate(response.text)}`, {
      status: response.status,
      body: response.body,
    });
  }

  /**
   * Validate a response body against the shape an operation expects.
   * A mismatch means the adapter cannot interpret the answer: ProtocolError.
   * `value` defaults to the whole body; pass a part of it to check an envelope's payload.
   */
  parse<T>(
    response: ServiceResponse,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    what: string,
    value: unknown = response.body
  ): T {
    const result = schema.safeParse(value);
    if (!result.success) {
      log.adapter.error(
        { service: this.service, what, status: response.status, body: truncate(response.text) },
        "unexpected response shape"
      );
      throw new ProtocolError(this.service, `${what}: unexpected response shape (${result.error.issues[0]?.message ?? "invalid"})`, {
        status: response.status,
        body: response.body,
      });
    }
    return result.data;
  }
}

function parseBody(text: string): unknown {
  if (text.length === 0) return null;
  try {
    return parseJsonLenient(text);
  } catch {
    return text;
  }
}
