import { OPERATIONS, type FuzzKnobs } from "@vecdiff/config";
import { FuzzConfigError } from "../../errors.js";

const PROBABILITY_KNOBS = [
  "edgeValueProbability",
  "wideRangeProbability",
  "emptyVectorProbability",
  "oversizedVectorProbability",
  "malformedIdProbability",
  "reuseIdProbability",
  "metadataProbability",
  "specialCharProbability",
  "malformedCollectionProbability",
  "curatedEdgeCaseProbability",
] as const satisfies readonly (keyof FuzzKnobs)[];

/**
 * Check generator knobs. Throws FuzzConfigError listing every problem.
 */
export function validateKnobs(knobs: FuzzKnobs): void {
  const problems: string[] = [];

  const weights = OPERATIONS.map((operation) => knobs.operationWeights[operation]);
  if (weights.some((weight) => !Number.isFinite(weight) || weight < 0)) {
    problems.push("operation weights must be finite and non-negative");
  } else if (weights.every((weight) => weight === 0)) {
    problems.push("at least one operation weight must be positive");
  }

  for (const name of PROBABILITY_KNOBS) {
    const value = knobs[name];
    if (!(value >= 0 && value <= 1)) {
      problems.push(`${name} must be within [0, 1], got ${value}`);
    }
  }

  const ranges = [
    ["dimension", knobs.dimension],
    ["oversizedDimension", knobs.oversizedDimension],
    ["k", knobs.k],
  ] as const;
  for (const [name, range] of ranges) {
    if (!Number.isInteger(range.min) || !Number.isInteger(range.max) || range.min < 0) {
      problems.push(`${name} bounds must be non-negative integers`);
    } else if (range.min > range.max) {
      problems.push(`${name} min ${range.min} exceeds max ${range.max}`);
    }
  }

  const counts = [
    ["maxVectorsPerInsert", knobs.maxVectorsPerInsert, 1],
    ["maxBatchInsert", knobs.maxBatchInsert, 2],
    ["maxQueries", knobs.maxQueries, 1],
    ["idSpace", knobs.idSpace, 1],
    ["largeBatchSize", knobs.largeBatchSize, 1],
    ["maxMetadataFields", knobs.maxMetadataFields, 0],
  ] as const;
  for (const [name, value, minimum] of counts) {
    if (!Number.isInteger(value) || value < minimum) {
      problems.push(`${name} must be an integer ≥ ${minimum}, got ${value}`);
    }
  }

  if (knobs.metrics.length === 0) {
    problems.push("at least one metric is required");
  }
  if (knobs.collections.length === 0) {
    problems.push("at least one collection is required");
  }

  if (problems.length > 0) {
    throw new FuzzConfigError(problems);
  }
}
