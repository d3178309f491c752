import type { Metric, Operation } from "@vecdiff/config";

// =============================================================================
// Test Cases
// =============================================================================

/** May hold NaN, ±Infinity, be empty or oversized; never filtered before dispatch */
export type Vector = readonly number[];

export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | readonly MetadataValue[]
  | { readonly [key: string]: MetadataValue };

export type Metadata = { readonly [key: string]: MetadataValue };

export interface InsertParameters {
  collection: string;
  vectors: readonly Vector[];
  ids: readonly string[];
  /** One entry per vector, null when the vector carries none */
  metadata: readonly (Metadata | null)[];
}

export interface SearchParameters {
  collection: string;
  query: Vector;
  k: number;
  metric: Metric;
}

export interface BatchSearchParameters {
  collection: string;
  queries: readonly Vector[];
  k: number;
  metric: Metric;
}

export interface DeleteParameters {
  collection: string;
  ids: readonly string[];
}

export type MixedStep =
  | { operation: "insert"; parameters: InsertParameters }
  | { operation: "search"; parameters: SearchParameters }
  | { operation: "delete"; parameters: DeleteParameters };

export interface MixedParameters {
  collection: string;
  steps: readonly MixedStep[];
}

export const EDGE_CASES = [
  "empty_vector",
  "oversized_vector",
  "nan_query",
  "inf_query",
  "large_batch",
  "empty_metadata",
  "malformed_ids",
  "nonexistent_collection",
] as const;

export type EdgeCaseName = (typeof EDGE_CASES)[number];

export type TestCaseBody =
  | { operation: "insert"; parameters: InsertParameters }
  | { operation: "batch_insert"; parameters: InsertParameters }
  | { operation: "search"; parameters: SearchParameters }
  | { operation: "batch_search"; parameters: BatchSearchParameters }
  | { operation: "delete"; parameters: DeleteParameters }
  | { operation: "mixed"; parameters: MixedParameters };

export type TestCase = TestCaseBody & {
  /** Positive, assigned monotonically from 1 */
  id: number;
  /** Curated edge case that produced this case */
  edgeCase?: EdgeCaseName;
};

// =============================================================================
// Results
// =============================================================================

export interface SearchHit {
  id: string;
  score: number;
}

export interface InsertData {
  kind: "insert";
  /** Ids the service reports as stored */
  ids: string[];
}

export interface SearchData {
  kind: "search";
  hits: SearchHit[];
}

export interface BatchSearchData {
  kind: "batch_search";
  queries: SearchHit[][];
}

export interface DeleteData {
  kind: "delete";
  removed: number;
}

export type StepData = InsertData | SearchData | DeleteData;

export interface MixedData {
  kind: "mixed";
  steps: StepData[];
}

export type ResultData = InsertData | SearchData | BatchSearchData | DeleteData | MixedData;

export const ADAPTER_ERROR_KINDS = [
  "ConnectionError",
  "Timeout",
  "ProtocolError",
  "ServiceError",
  "UnsupportedMetric",
] as const;

export type AdapterErrorKind = (typeof ADAPTER_ERROR_KINDS)[number];

export interface AdapterErrorRecord {
  kind: AdapterErrorKind;
  message: string;
  status?: number;
  /** Native error payload, verbatim */
  body?: unknown;
  /** Index of the failing step of a mixed sequence */
  step?: number;
}

interface DatabaseResultBase {
  service: string;
  /** Float milliseconds from a nanosecond clock; diagnostics only */
  executionTimeMs: number;
}

export type DatabaseResult =
  | (DatabaseResultBase & { success: true; data: ResultData })
  | (DatabaseResultBase & { success: false; error: AdapterErrorRecord });

// =============================================================================
// Inconsistencies
// =============================================================================

export const SEVERITIES = ["error-divergent", "divergent", "informational"] as const;

export type Severity = (typeof SEVERITIES)[number];

export type InconsistencyCategory =
  | "success"
  | "search-overlap"
  | "search-top-hit"
  | "batch-search-length"
  | "insert-count"
  | "delete-count"
  | "excluded-service";

export interface Inconsistency {
  kind: Severity;
  severity: Severity;
  category: InconsistencyCategory;
  servicesInvolved: string[];
  description: string;
  details?: Record<string, unknown>;
  /** Mixed step the inconsistency was found in */
  step?: number;
}

export const RESULT_SCHEMA_VERSION = 1;

export interface TestResult {
  schemaVersion: typeof RESULT_SCHEMA_VERSION;
  testCase: TestCase;
  results: DatabaseResult[];
  /** Services not invoked because they were unhealthy at dispatch time */
  excluded: string[];
  inconsistencies: Inconsistency[];
  startedAt: string;
}

// =============================================================================
// Health
// =============================================================================

export interface HealthStatus {
  service: string;
  reachable: boolean;
  version?: string;
  dialect?: string;
  /** Endpoint that answered */
  endpoint?: string;
  error?: string;
  checkedAt: string;
}

export interface HealthSnapshot {
  takenAt: string;
  /** Service names in configured order */
  healthy: readonly string[];
  unhealthy: readonly string[];
  statuses: Readonly<Record<string, HealthStatus>>;
}

export type { Metric, Operation };
