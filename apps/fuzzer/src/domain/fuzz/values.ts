import type { FuzzKnobs, IntRange } from "@vecdiff/config";
import type { Metadata, MetadataValue } from "../../types/domain.js";
import type { Random } from "../utils/random.js";

export const EDGE_VALUES: readonly number[] = [0.0, Number.NaN, Number.POSITIVE_INFINITY, Number.NEGATIVE_INFINITY];

export const SPECIAL_CHARACTERS: readonly string[] = [
  "\u0000",
  "\n",
  "\t",
  "\"",
  "'",
  "\\",
  "<script>",
  "' OR 1=1 --",
  "{}",
  "%s",
  "😀",
  "‮",
  "ñ",
  "中文",
];

const WORDS: readonly string[] = ["alpha", "beta", "gamma", "delta", "vector", "payload", "tag", "label"];

/** Length of an oversized id */
export const EXCESSIVE_ID_LENGTH = 2048;

export type MalformedIdKind = "empty" | "excessive" | "control" | "duplicate";

const MALFORMED_ID_KINDS: readonly MalformedIdKind[] = ["empty", "excessive", "control", "duplicate"];

/**
 * Mutable cursor over generator state while one test case is built.
 * Fresh ids are numbered from the state's counter; inserted ids are
 * remembered so later deletes and mixed steps can reuse them.
 */
export interface DrawContext {
  random: Random;
  knobs: FuzzKnobs;
  nextVectorId: number;
  recentIds: string[];
  /** Ids drawn for this test case so far */
  drawnIds: string[];
}

export function drawInRange(ctx: DrawContext, range: IntRange): number {
  return ctx.random.int(range.min, range.max);
}

/** Empty, oversized or configured-dimension length */
export function drawVectorLength(ctx: DrawContext): number {
  const { random, knobs } = ctx;
  if (random.chance(knobs.emptyVectorProbability)) return 0;
  if (random.chance(knobs.oversizedVectorProbability)) return drawInRange(ctx, knobs.oversizedDimension);
  return drawInRange(ctx, knobs.dimension);
}

export function drawVector(ctx: DrawContext, length: number = drawVectorLength(ctx)): number[] {
  const { random, knobs } = ctx;
  const bound = random.chance(knobs.wideRangeProbability) ? 10 : 1;
  const vector: number[] = [];
  for (let i = 0; i < length; i++) {
    vector.push(random.chance(knobs.edgeValueProbability) ? random.pick(EDGE_VALUES) : random.uniform(-bound, bound));
  }
  return vector;
}

export function freshId(ctx: DrawContext): string {
  const id = `id_${ctx.nextVectorId}`;
  ctx.nextVectorId++;
  return id;
}

export function malformedId(ctx: DrawContext, kind: MalformedIdKind = ctx.random.pick(MALFORMED_ID_KINDS)): string {
  switch (kind) {
    case "empty":
      return "";
    case "excessive":
      return "x".repeat(EXCESSIVE_ID_LENGTH);
    case "control":
      return `id\u0000\n\u0007_${ctx.nextVectorId}`;
    case "duplicate": {
      const pool = [...ctx.drawnIds, ...ctx.recentIds];
      return pool.length > 0 ? ctx.random.pick(pool) : freshId(ctx);
    }
  }
}

export function drawId(ctx: DrawContext): string {
  const id = ctx.random.chance(ctx.knobs.malformedIdProbability) ? malformedId(ctx) : freshId(ctx);
  ctx.drawnIds.push(id);
  return id;
}

/** Ids for a delete: recent ids with reuseIdProbability, otherwise anywhere in the id space */
export function drawDeleteIds(ctx: DrawContext, count: number): string[] {
  const ids: string[] = [];
  for (let i = 0; i < count; i++) {
    if (ctx.recentIds.length > 0 && ctx.random.chance(ctx.knobs.reuseIdProbability)) {
      ids.push(ctx.random.pick(ctx.recentIds));
    } else {
      ids.push(`id_${ctx.random.int(1, ctx.knobs.idSpace)}`);
    }
  }
  return ids;
}

function drawString(ctx: DrawContext): string {
  const word = ctx.random.pick(WORDS);
  if (ctx.random.chance(ctx.knobs.specialCharProbability)) {
    return `${word}${ctx.random.pick(SPECIAL_CHARACTERS)}${ctx.random.int(0, 999)}`;
  }
  return `${word}_${ctx.random.int(0, 999)}`;
}

function drawMetadataValue(ctx: DrawContext): MetadataValue {
  switch (ctx.random.int(0, 4)) {
    case 0:
      return drawString(ctx);
    case 1:
      return Math.round(ctx.random.uniform(-1000, 1000) * 100) / 100;
    case 2:
      return ctx.random.chance(0.5);
    case 3: {
      const length = ctx.random.int(1, 3);
      const list: number[] = [];
      for (let i = 0; i < length; i++) list.push(ctx.random.int(0, 100));
      return list;
    }
    default:
      return { nested: drawString(ctx), depth: ctx.random.int(1, 3) };
  }
}

/** Null when the vector carries no metadata */
export function drawMetadata(ctx: DrawContext): Metadata | null {
  const { random, knobs } = ctx;
  if (knobs.maxMetadataFields === 0 || !random.chance(knobs.metadataProbability)) return null;

  const fields = random.int(1, knobs.maxMetadataFields);
  const metadata: Record<string, MetadataValue> = {};
  for (let i = 0; i < fields; i++) {
    metadata[`field_${i}`] = drawMetadataValue(ctx);
  }
  return metadata;
}

export function malformedCollectionNames(ctx: DrawContext): readonly string[] {
  return ["", "has spaces", "sym!@#$%^&*()", "1leading_digit", `nonexistent_${ctx.random.int(0, 99_999)}`];
}

export function drawCollection(ctx: DrawContext): string {
  if (ctx.random.chance(ctx.knobs.malformedCollectionProbability)) {
    return ctx.random.pick(malformedCollectionNames(ctx));
  }
  return ctx.random.pick(ctx.knobs.collections);
}
