import type { CallContext, VectorStoreAdapter } from "../adapters/types.js";
import type { MixedStep, ResultData, SearchHit, StepData, TestCase } from "../types/domain.js";

/** A mixed sequence stopped at `step`; `cause` is what the adapter threw */
export class StepFailure extends Error {
  override name = "StepFailure";
  readonly step: number;

  constructor(step: number, cause: unknown) {
    super(`step ${step} failed`, { cause });
    this.step = step;
  }
}

async function executeStep(adapter: VectorStoreAdapter, step: MixedStep, ctx: CallContext): Promise<StepData> {
  switch (step.operation) {
    case "insert": {
      const { collection, vectors, ids, metadata } = step.parameters;
      const outcome = await adapter.insert(collection, vectors, ids, metadata, ctx);
      return { kind: "insert", ids: outcome.ids };
    }
    case "search": {
      const { collection, query, k, metric } = step.parameters;
      return { kind: "search", hits: await adapter.search(collection, query, k, metric, ctx) };
    }
    case "delete": {
      const { collection, ids } = step.parameters;
      return { kind: "delete", removed: await adapter.delete(collection, ids, ctx) };
    }
  }
}

/**
 * Run one test case on one adapter and normalize the outcome.
 * batch_search queries and mixed steps run sequentially; a mixed sequence
 * stops at the first failing step.
 */
export async function executeTestCase(
  adapter: VectorStoreAdapter,
  testCase: TestCase,
  ctx: CallContext
): Promise<ResultData> {
  switch (testCase.operation) {
    case "insert":
    case "batch_insert":
    case "search":
    case "delete":
      return executeStep(adapter, toStep(testCase), ctx);

    case "batch_search": {
      const { collection, queries, k, metric } = testCase.parameters;
      const results: SearchHit[][] = [];
      for (const query of queries) {
        results.push(await adapter.search(collection, query, k, metric, ctx));
      }
      return { kind: "batch_search", queries: results };
    }

    case "mixed": {
      const steps: StepData[] = [];
      for (const [index, step] of testCase.parameters.steps.entries()) {
        try {
          steps.push(await executeStep(adapter, step, ctx));
        } catch (error) {
          throw new StepFailure(index, error);
        }
      }
      return { kind: "mixed", steps };
    }
  }
}

function toStep(testCase: Extract<TestCase, { operation: "insert" | "batch_insert" | "search" | "delete" }>): MixedStep {
  switch (testCase.operation) {
    case "insert":
    case "batch_insert":
      return { operation: "insert", parameters: testCase.parameters };
    case "search":
      return { operation: "search", parameters: testCase.parameters };
    case "delete":
      return { operation: "delete", parameters: testCase.parameters };
  }
}
