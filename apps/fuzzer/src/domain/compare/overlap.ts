/**
 * Jaccard overlap |A∩B| / |A∪B| of two id lists, compared as sets.
 * Two empty lists overlap fully (1.0).
 */
export function jaccardOverlap(a: readonly string[], b: readonly string[]): number {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size === 0 && right.size === 0) return 1;

  let shared = 0;
  for (const id of left) {
    if (right.has(id)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

/** Every unordered pair, in list order */
export function pairs<T>(items: readonly T[]): [T, T][] {
  const result: [T, T][] = [];
  for (let i = 0; i < items.length; i++) {
    for (let j = i + 1; j < items.length; j++) {
      const left = items[i];
      const right = items[j];
      if (left !== undefined && right !== undefined) result.push([left, right]);
    }
  }
  return result;
}
