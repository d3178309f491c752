import { describe, it, expect } from "vitest";
import { defaultOperationWeights } from "@vecdiff/config";
import { validateKnobs } from "../../../domain/fuzz/knobs.js";
import { FuzzGenerator } from "../../../domain/fuzz/generator.js";
import { FuzzConfigError } from "../../../errors.js";
import { createTestKnobs } from "../../helpers/fixtures.js";

const NO_OPERATIONS = defaultOperationWeights({
  insert: 0,
  batch_insert: 0,
  search: 0,
  batch_search: 0,
  delete: 0,
  mixed: 0,
});

describe("validateKnobs", () => {
  it("should accept the test defaults", () => {
    expect(() => validateKnobs(createTestKnobs())).not.toThrow();
  });

  it("should list every problem at once", () => {
    const knobs = createTestKnobs({
      operationWeights: NO_OPERATIONS,
      edgeValueProbability: 1.5,
      k: { min: 5, max: 1 },
    });

    try {
      validateKnobs(knobs);
      expect.unreachable("validateKnobs should throw");
    } catch (error) {
      expect(error).toBeInstanceOf(FuzzConfigError);
      if (error instanceof FuzzConfigError) {
        expect(error.problems).toEqual([
          "at least one operation weight must be positive",
          "edgeValueProbability must be within [0, 1], got 1.5",
          "k min 5 exceeds max 1",
        ]);
      }
    }
  });

  it("should reject negative weights", () => {
    const knobs = createTestKnobs({ operationWeights: defaultOperationWeights({ search: -1 }) });
    expect(() => validateKnobs(knobs)).toThrow("operation weights must be finite and non-negative");
  });

  it("should reject an empty collection list", () => {
    expect(() => validateKnobs(createTestKnobs({ collections: [] }))).toThrow("at least one collection is required");
  });

  it("should reject a batch insert smaller than two", () => {
    expect(() => validateKnobs(createTestKnobs({ maxBatchInsert: 1 }))).toThrow(
      "maxBatchInsert must be an integer ≥ 2, got 1"
    );
  });

  it("should fail generator construction before any case is drawn", () => {
    expect(() => new FuzzGenerator(createTestKnobs({ metrics: [] }), 1)).toThrow(FuzzConfigError);
  });
});
