import type { EdgeCaseName, Metadata, TestCaseBody } from "../../types/domain.js";
import {
  drawInRange,
  drawVector,
  freshId,
  malformedId,
  type DrawContext,
} from "./values.js";

// =============================================================================
// Curated edge cases
// =============================================================================
// Hand-picked inputs emitted with their own probability, independent of the
// per-value distributions, so every run exercises them.
// =============================================================================

function insertOf(
  ctx: DrawContext,
  vectors: number[][],
  ids: string[],
  options: { operation?: "insert" | "batch_insert"; metadata?: Metadata } = {}
): TestCaseBody {
  ctx.drawnIds.push(...ids);
  return {
    operation: options.operation ?? "insert",
    parameters: {
      collection: ctx.random.pick(ctx.knobs.collections),
      vectors,
      ids,
      metadata: vectors.map(() => options.metadata ?? null),
    },
  };
}

function searchOf(ctx: DrawContext, query: number[], collection?: string): TestCaseBody {
  return {
    operation: "search",
    parameters: {
      collection: collection ?? ctx.random.pick(ctx.knobs.collections),
      query,
      k: drawInRange(ctx, ctx.knobs.k),
      metric: ctx.random.pick(ctx.knobs.metrics),
    },
  };
}

function normalVector(ctx: DrawContext): number[] {
  return drawVector(ctx, drawInRange(ctx, ctx.knobs.dimension));
}

export function buildEdgeCase(ctx: DrawContext, name: EdgeCaseName): TestCaseBody {
  switch (name) {
    case "empty_vector":
      return insertOf(ctx, [[]], [freshId(ctx)]);

    case "oversized_vector":
      return insertOf(ctx, [drawVector(ctx, ctx.knobs.oversizedDimension.max)], [freshId(ctx)]);

    case "nan_query": {
      const query = normalVector(ctx);
      query[ctx.random.int(0, Math.max(0, query.length - 1))] = Number.NaN;
      return searchOf(ctx, query);
    }

    case "inf_query": {
      const query = normalVector(ctx);
      query[ctx.random.int(0, Math.max(0, query.length - 1))] = ctx.random.chance(0.5)
        ? Number.POSITIVE_INFINITY
        : Number.NEGATIVE_INFINITY;
      return searchOf(ctx, query);
    }

    case "large_batch": {
      const vectors: number[][] = [];
      const ids: string[] = [];
      for (let i = 0; i < ctx.knobs.largeBatchSize; i++) {
        vectors.push(normalVector(ctx));
        ids.push(freshId(ctx));
      }
      return insertOf(ctx, vectors, ids, { operation: "batch_insert" });
    }

    case "empty_metadata":
      return insertOf(ctx, [normalVector(ctx)], [freshId(ctx)], { metadata: {} });

    case "malformed_ids": {
      const first = freshId(ctx);
      const ids = [malformedId(ctx, "empty"), malformedId(ctx, "control"), first, first];
      return insertOf(ctx, ids.map(() => normalVector(ctx)), ids);
    }

    case "nonexistent_collection":
      return searchOf(ctx, normalVector(ctx), `nonexistent_${ctx.random.int(0, 99_999)}`);
  }
}
