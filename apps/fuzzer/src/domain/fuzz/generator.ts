import { deepFreeze, OPERATIONS, type FuzzKnobs, type Operation } from "@vecdiff/config";
import type { RandomGenerator } from "pure-rand";
import {
  EDGE_CASES,
  type DeleteParameters,
  type InsertParameters,
  type Metadata,
  type MixedStep,
  type SearchParameters,
  type TestCase,
  type TestCaseBody,
} from "../../types/domain.js";
import { drawSeed, Random } from "../utils/random.js";
import { buildEdgeCase } from "./edge-cases.js";
import { validateKnobs } from "./knobs.js";
import {
  drawCollection,
  drawDeleteIds,
  drawId,
  drawInRange,
  drawMetadata,
  drawVector,
  type DrawContext,
} from "./values.js";

// =============================================================================
// Fuzz Generator
// =============================================================================
// generateTestCase is a pure function of (knobs, state): the same state always
// yields the same case and the same successor state. FuzzGenerator threads the
// state through a run.
// =============================================================================

/** Ids remembered for reuse by deletes and duplicates */
export const RECENT_ID_WINDOW = 256;

export interface GeneratorState {
  rng: RandomGenerator;
  /** Id of the next TestCase */
  nextTestId: number;
  /** Counter behind fresh `id_<n>` vector ids */
  nextVectorId: number;
  recentIds: readonly string[];
}

export interface Generated {
  testCase: TestCase;
  state: GeneratorState;
}

export function initialState(seed: number): GeneratorState {
  return {
    rng: Random.fromSeed(seed).generator(),
    nextTestId: 1,
    nextVectorId: 1,
    recentIds: [],
  };
}

function drawInsert(ctx: DrawContext, count: number, collection: string): InsertParameters {
  const vectors: number[][] = [];
  const ids: string[] = [];
  const metadata: (Metadata | null)[] = [];
  for (let i = 0; i < count; i++) {
    vectors.push(drawVector(ctx));
    ids.push(drawId(ctx));
    metadata.push(drawMetadata(ctx));
  }
  return { collection, vectors, ids, metadata };
}

function drawSearch(ctx: DrawContext, collection: string, query: number[] = drawVector(ctx)): SearchParameters {
  return {
    collection,
    query,
    k: drawInRange(ctx, ctx.knobs.k),
    metric: ctx.random.pick(ctx.knobs.metrics),
  };
}

function drawDelete(ctx: DrawContext, collection: string): DeleteParameters {
  return { collection, ids: drawDeleteIds(ctx, ctx.random.int(1, 5)) };
}

/**
 * 2-5 steps against one collection. The first step inserts; later searches
 * may query with an inserted vector and later deletes target inserted ids.
 */
function drawMixed(ctx: DrawContext): TestCaseBody {
  const collection = drawCollection(ctx);
  const stepCount = ctx.random.int(2, 5);
  const steps: MixedStep[] = [];
  const inserted: { ids: string[]; vectors: number[][] } = { ids: [], vectors: [] };

  for (let i = 0; i < stepCount; i++) {
    const kind = i === 0 ? "insert" : ctx.random.pick(["insert", "search", "delete"] as const);

    switch (kind) {
      case "insert": {
        const parameters = drawInsert(ctx, ctx.random.int(1, ctx.knobs.maxVectorsPerInsert), collection);
        inserted.ids.push(...parameters.ids);
        inserted.vectors.push(...parameters.vectors.map((vector) => [...vector]));
        steps.push({ operation: "insert", parameters });
        break;
      }
      case "search": {
        const reuse = inserted.vectors.length > 0 && ctx.random.chance(0.5);
        const query = reuse ? [...ctx.random.pick(inserted.vectors)] : drawVector(ctx);
        steps.push({ operation: "search", parameters: drawSearch(ctx, collection, query) });
        break;
      }
      case "delete": {
        const count = ctx.random.int(1, Math.max(1, inserted.ids.length));
        const ids: string[] = [];
        for (let j = 0; j < count; j++) {
          ids.push(inserted.ids.length > 0 ? ctx.random.pick(inserted.ids) : drawDeleteIds(ctx, 1)[0] ?? "");
        }
        steps.push({ operation: "delete", parameters: { collection, ids } });
        break;
      }
    }
  }

  return { operation: "mixed", parameters: { collection, steps } };
}

function drawBody(ctx: DrawContext, operation: Operation): TestCaseBody {
  const { knobs, random } = ctx;
  switch (operation) {
    case "insert":
      return { operation, parameters: drawInsert(ctx, random.int(1, knobs.maxVectorsPerInsert), drawCollection(ctx)) };
    case "batch_insert":
      return { operation, parameters: drawInsert(ctx, random.int(2, knobs.maxBatchInsert), drawCollection(ctx)) };
    case "search":
      return { operation, parameters: drawSearch(ctx, drawCollection(ctx)) };
    case "batch_search": {
      const collection = drawCollection(ctx);
      const queries: number[][] = [];
      const count = random.int(1, knobs.maxQueries);
      for (let i = 0; i < count; i++) queries.push(drawVector(ctx));
      return {
        operation,
        parameters: {
          collection,
          queries,
          k: drawInRange(ctx, knobs.k),
          metric: random.pick(knobs.metrics),
        },
      };
    }
    case "delete":
      return { operation, parameters: drawDelete(ctx, drawCollection(ctx)) };
    case "mixed":
      return drawMixed(ctx);
  }
}

function insertedIds(body: TestCaseBody): readonly string[] {
  switch (body.operation) {
    case "insert":
    case "batch_insert":
      return body.parameters.ids;
    case "mixed":
      return body.parameters.steps.flatMap((step) => (step.operation === "insert" ? step.parameters.ids : []));
    default:
      return [];
  }
}

/**
 * Generate one test case from an explicit state. Pure: the input state is not
 * modified. Throws FuzzConfigError for invalid knobs.
 */
export function generateTestCase(knobs: FuzzKnobs, state: GeneratorState): Generated {
  validateKnobs(knobs);

  const random = new Random(state.rng.clone());
  const ctx: DrawContext = {
    random,
    knobs,
    nextVectorId: state.nextVectorId,
    recentIds: [...state.recentIds],
    drawnIds: [],
  };

  let edgeCase: TestCase["edgeCase"];
  let body: TestCaseBody;
  if (random.chance(knobs.curatedEdgeCaseProbability)) {
    edgeCase = random.pick(EDGE_CASES);
    body = buildEdgeCase(ctx, edgeCase);
  } else {
    const operation = random.weighted(OPERATIONS, (item) => knobs.operationWeights[item]);
    body = drawBody(ctx, operation);
  }

  const testCase: TestCase = deepFreeze({
    ...body,
    id: state.nextTestId,
    ...(edgeCase !== undefined && { edgeCase }),
  });

  const recentIds = [...ctx.recentIds, ...insertedIds(body)].slice(-RECENT_ID_WINDOW);

  return {
    testCase,
    state: {
      rng: random.generator(),
      nextTestId: state.nextTestId + 1,
      nextVectorId: ctx.nextVectorId,
      recentIds,
    },
  };
}

/**
 * Stateful wrapper used by the runner.
 */
export class FuzzGenerator {
  readonly seed: number;
  private readonly knobs: FuzzKnobs;
  private state: GeneratorState;

  constructor(knobs: FuzzKnobs, seed: number = drawSeed()) {
    validateKnobs(knobs);
    this.knobs = knobs;
    this.seed = seed;
    this.state = initialState(seed);
  }

  next(): TestCase {
    const { testCase, state } = generateTestCase(this.knobs, this.state);
    this.state = state;
    return testCase;
  }

  /** Generate `count` cases in order */
  batch(count: number): TestCase[] {
    const cases: TestCase[] = [];
    for (let i = 0; i < count; i++) cases.push(this.next());
    return cases;
  }
}
