import type { PartialScores, ScoreVector, Taxonomy } from './types';

/**
 * Read one category's score, treating missing, non-finite and negative values as 0.
 */
export function scoreOf(scores: PartialScores | undefined, categoryId: string): number {
  const value = scores?.[categoryId];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    return 0;
  }
  return value;
}

export function zeroScores(taxonomy: Taxonomy): ScoreVector {
  const scores: Record<string, number> = {};
  for (const id of taxonomy.categoryIds) {
    scores[id] = 0;
  }
  return Object.freeze(scores);
}

/**
 * Build a ScoreVector from a complete set of values computed per category.
 */
export function buildScores(taxonomy: Taxonomy, compute: (categoryId: string, index: number) => number): ScoreVector {
  const scores: Record<string, number> = {};
  taxonomy.categoryIds.forEach((id, index) => {
    const value = compute(id, index);
    scores[id] = Number.isFinite(value) && value > 0 ? value : 0;
  });
  return Object.freeze(scores);
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim().length > 0) return Number(value);
  return NaN;
}

/**
 * Turn untrusted per-category values (e.g. parsed model output) into a ScoreVector.
 * Unknown keys are dropped; missing, non-numeric, NaN and negative values become 0.
 */
export function sanitizeScores(
  taxonomy: Taxonomy,
  raw: unknown,
  options: { clampToUnit?: boolean } = {}
): ScoreVector {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return zeroScores(taxonomy);
  }
  const entries = new Map<string, unknown>(Object.entries(raw));
  return buildScores(taxonomy, (id) => {
    const value = toNumber(entries.get(id));
    return options.clampToUnit ? Math.min(value, 1) : value;
  });
}

/**
 * Largest value in the vector (0 for an empty vector).
 */
export function maxScore(scores: ScoreVector): number {
  let max = 0;
  for (const value of Object.values(scores)) {
    if (value > max) max = value;
  }
  return max;
}

/**
 * Categories sorted by descending score; equal scores keep taxonomy order.
 */
export function rankScores(taxonomy: Taxonomy, scores: PartialScores): Array<[string, number]> {
  return taxonomy.categoryIds
    .map((id): [string, number] => [id, scoreOf(scores, id)])
    .sort((a, b) => b[1] - a[1]);
}
