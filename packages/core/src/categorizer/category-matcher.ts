import type { ScoreVector, Taxonomy } from '../taxonomy/types';
import { buildScores } from '../taxonomy/score-vector';

const EXACT_MATCH_SCORE = 1.0;
const PARTIAL_MATCH_SCORE = 0.5;

/**
 * Score keywords against taxonomy phrases by lexical overlap.
 *
 * Every keyword is compared with every phrase of every category: an exact match adds 1.0,
 * containment in either direction adds 0.5. Scores are then divided by the largest one,
 * so the best category lands on 1 and an all-miss input stays all zero.
 */
export class CategoryMatcher {
  constructor(private readonly taxonomy: Taxonomy) {}

  scoreByKeywords(keywords: readonly string[]): ScoreVector {
    const raw = new Map<string, number>();

    for (const category of this.taxonomy.categories) {
      let score = 0;
      for (const keyword of keywords) {
        const needle = keyword.trim().toLowerCase();
        if (needle.length === 0) continue;
        for (const phrase of category.phrases) {
          score += matchScore(needle, phrase);
        }
      }
      raw.set(category.id, score);
    }

    let max = 0;
    for (const value of raw.values()) {
      if (value > max) max = value;
    }
    const divisor = max > 0 ? max : 1;

    return buildScores(this.taxonomy, (id) => (raw.get(id) ?? 0) / divisor);
  }
}

/**
 * Overlap between one normalized keyword and one taxonomy phrase.
 */
export function matchScore(keyword: string, phrase: string): number {
  if (keyword === phrase) return EXACT_MATCH_SCORE;
  if (phrase.includes(keyword) || keyword.includes(phrase)) return PARTIAL_MATCH_SCORE;
  return 0;
}
