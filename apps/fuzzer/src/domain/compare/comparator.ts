import type {
  DatabaseResult,
  Inconsistency,
  ResultData,
  SearchHit,
  Severity,
  StepData,
  TestCase,
} from "../../types/domain.js";
import { jaccardOverlap, pairs } from "./overlap.js";

// =============================================================================
// Comparator
// =============================================================================
// Derives inconsistencies from one test case's result set only. Scores and
// timings are never compared: services use different distance definitions.
// =============================================================================

export interface CompareOptions {
  /** Search pairs overlapping less than this are divergent */
  overlapThreshold: number;
  /** Also flag pairs whose first hit differs */
  compareTopHit: boolean;
}

export const DEFAULT_COMPARE_OPTIONS: CompareOptions = {
  overlapThreshold: 0.5,
  compareTopHit: true,
};

type Failure = Extract<DatabaseResult, { success: false }>;

interface Success<T> {
  service: string;
  data: T;
}

function divergent(
  category: Inconsistency["category"],
  servicesInvolved: string[],
  description: string,
  details?: Record<string, unknown>
): Inconsistency {
  return {
    kind: "divergent",
    severity: "divergent",
    category,
    servicesInvolved,
    description,
    ...(details && { details }),
  };
}

function compareSearchPair(
  left: Success<SearchHit[]>,
  right: Success<SearchHit[]>,
  options: CompareOptions,
  queryIndex?: number
): Inconsistency | null {
  const leftIds = left.data.map((hit) => hit.id);
  const rightIds = right.data.map((hit) => hit.id);
  const overlap = jaccardOverlap(leftIds, rightIds);
  const services = [left.service, right.service];
  const where = queryIndex === undefined ? "" : ` for query ${queryIndex}`;
  const base = queryIndex === undefined ? {} : { queryIndex };

  if (overlap < options.overlapThreshold) {
    return divergent(
      "search-overlap",
      services,
      `${left.service} and ${right.service} returned overlapping results ${overlap.toFixed(2)} < ${options.overlapThreshold}${where}`,
      { ...base, overlap, [left.service]: leftIds, [right.service]: rightIds }
    );
  }

  if (options.compareTopHit && leftIds[0] !== rightIds[0]) {
    return divergent(
      "search-top-hit",
      services,
      `${left.service} ranks ${leftIds[0] ?? "nothing"} first, ${right.service} ranks ${rightIds[0] ?? "nothing"} first${where}`,
      { ...base, overlap, topHits: { [left.service]: leftIds[0] ?? null, [right.service]: rightIds[0] ?? null } }
    );
  }

  return null;
}

function compareSearches(successes: Success<SearchHit[]>[], options: CompareOptions, queryIndex?: number): Inconsistency[] {
  return pairs(successes)
    .map(([left, right]) => compareSearchPair(left, right, options, queryIndex))
    .filter((item): item is Inconsistency => item !== null);
}

function compareCounts(
  successes: Success<number>[],
  category: "insert-count" | "delete-count",
  noun: string
): Inconsistency[] {
  const counts = new Set(successes.map((success) => success.data));
  if (counts.size <= 1) return [];

  const summary = Object.fromEntries(successes.map((success) => [success.service, success.data]));
  return [
    divergent(
      category,
      successes.map((success) => success.service),
      `${noun} differ: ${successes.map((success) => `${success.service}=${success.data}`).join(", ")}`,
      { counts: summary }
    ),
  ];
}

function compareBatchSearch(successes: Success<SearchHit[][]>[], options: CompareOptions): Inconsistency[] {
  const lengths = new Set(successes.map((success) => success.data.length));
  if (lengths.size > 1) {
    return [
      divergent(
        "batch-search-length",
        successes.map((success) => success.service),
        `query result counts differ: ${successes.map((success) => `${success.service}=${success.data.length}`).join(", ")}`,
        { lengths: Object.fromEntries(successes.map((success) => [success.service, success.data.length])) }
      ),
    ];
  }

  const queryCount = successes[0]?.data.length ?? 0;
  const found: Inconsistency[] = [];
  for (let index = 0; index < queryCount; index++) {
    const perQuery = successes.map((success) => ({ service: success.service, data: success.data[index] ?? [] }));
    found.push(...compareSearches(perQuery, options, index));
  }
  return found;
}

/** Compare the successful data of one (sub-)operation */
function compareData(successes: Success<ResultData | StepData>[], options: CompareOptions): Inconsistency[] {
  const inserts: Success<number>[] = [];
  const deletes: Success<number>[] = [];
  const searches: Success<SearchHit[]>[] = [];
  const batches: Success<SearchHit[][]>[] = [];

  for (const { service, data } of successes) {
    switch (data.kind) {
      case "insert":
        inserts.push({ service, data: data.ids.length });
        break;
      case "delete":
        deletes.push({ service, data: data.removed });
        break;
      case "search":
        searches.push({ service, data: data.hits });
        break;
      case "batch_search":
        batches.push({ service, data: data.queries });
        break;
      case "mixed":
        break;
    }
  }

  return [
    ...compareCounts(inserts, "insert-count", "stored id counts"),
    ...compareCounts(deletes, "delete-count", "removed counts"),
    ...compareSearches(searches, options),
    ...(batches.length > 1 ? compareBatchSearch(batches, options) : []),
  ];
}

function compareMixed(successes: Success<ResultData>[], stepCount: number, options: CompareOptions): Inconsistency[] {
  const found: Inconsistency[] = [];
  for (let step = 0; step < stepCount; step++) {
    const perStep: Success<StepData>[] = [];
    for (const success of successes) {
      const data = success.data.kind === "mixed" ? success.data.steps[step] : undefined;
      if (data) perStep.push({ service: success.service, data });
    }
    if (perStep.length > 1) {
      found.push(...compareData(perStep, options).map((inconsistency) => ({ ...inconsistency, step })));
    }
  }
  return found;
}

/**
 * Classify disagreement across one test case's results.
 * Fewer than two results never yield an inconsistency.
 */
export function compareResults(
  testCase: TestCase,
  results: readonly DatabaseResult[],
  excluded: readonly string[] = [],
  options: CompareOptions = DEFAULT_COMPARE_OPTIONS
): Inconsistency[] {
  if (results.length < 2) return [];

  const inconsistencies: Inconsistency[] = [];
  const successes: Success<ResultData>[] = [];
  const failures: Failure[] = [];
  for (const result of results) {
    if (result.success) {
      successes.push({ service: result.service, data: result.data });
    } else {
      failures.push(result);
    }
  }

  if (successes.length > 0 && failures.length > 0) {
    inconsistencies.push({
      kind: "error-divergent",
      severity: "error-divergent",
      category: "success",
      servicesInvolved: [...successes.map((success) => success.service), ...failures.map((failure) => failure.service)],
      description: `${successes.map((success) => success.service).join(", ")} succeeded; ${failures
        .map((failure) => failure.service)
        .join(", ")} failed`,
      details: {
        succeeded: successes.map((success) => success.service),
        failed: failures.map((failure) => ({
          service: failure.service,
          kind: failure.error.kind,
          message: failure.error.message,
          ...(failure.error.step !== undefined && { step: failure.error.step }),
        })),
      },
    });
  }

  if (successes.length > 1) {
    inconsistencies.push(
      ...(testCase.operation === "mixed"
        ? compareMixed(successes, testCase.parameters.steps.length, options)
        : compareData(successes, options))
    );
  }

  if (excluded.length === 1) {
    inconsistencies.push({
      kind: "informational",
      severity: "informational",
      category: "excluded-service",
      servicesInvolved: [...excluded],
      description: `${excluded[0]} was unhealthy and not invoked`,
    });
  }

  return inconsistencies;
}

const SEVERITY_RANK: Record<Severity, number> = {
  "error-divergent": 0,
  divergent: 1,
  informational: 2,
};

/** Most severe first; stable within a severity */
export function sortBySeverity<T extends Inconsistency>(inconsistencies: readonly T[]): T[] {
  return [...inconsistencies].sort((a, b) => SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity]);
}
