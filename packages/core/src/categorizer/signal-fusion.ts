import {
  DEFAULT_CATEGORY_THRESHOLD,
  KEYWORD_SIGNAL_WEIGHT,
  MODEL_SIGNAL_WEIGHT,
  SIMILARITY_SIGNAL_WEIGHT,
  UNCATEGORIZED,
} from '../constants';
import type { PartialScores, ScoreVector, Taxonomy } from '../taxonomy/types';
import { buildScores, scoreOf } from '../taxonomy/score-vector';
import type { CategorizationResult, SignalWeights } from './types';

export const DEFAULT_SIGNAL_WEIGHTS: Readonly<SignalWeights> = Object.freeze({
  model: MODEL_SIGNAL_WEIGHT,
  keyword: KEYWORD_SIGNAL_WEIGHT,
  similarity: SIMILARITY_SIGNAL_WEIGHT,
});

export interface SignalFusionOptions {
  weights?: SignalWeights;
  threshold?: number;
}

/**
 * SignalFusion
 *
 * Weighted sum of the model, keyword and similarity signals per category. A category
 * missing from a signal contributes 0. The primary category is the first category in
 * taxonomy order holding the maximum, unless that maximum is below the threshold.
 */
export class SignalFusion {
  private readonly weights: Readonly<SignalWeights>;
  private readonly threshold: number;

  constructor(
    private readonly taxonomy: Taxonomy,
    options: SignalFusionOptions = {}
  ) {
    this.weights = options.weights ?? DEFAULT_SIGNAL_WEIGHTS;
    this.threshold = options.threshold ?? DEFAULT_CATEGORY_THRESHOLD;
  }

  combine(
    modelScores: PartialScores | undefined,
    keywordScores: PartialScores | undefined,
    similarityScores: PartialScores | undefined
  ): CategorizationResult {
    const scores = buildScores(
      this.taxonomy,
      (id) =>
        this.weights.model * scoreOf(modelScores, id) +
        this.weights.keyword * scoreOf(keywordScores, id) +
        this.weights.similarity * scoreOf(similarityScores, id)
    );

    return Object.freeze({
      primaryCategory: this.primaryCategory(scores),
      scores,
    });
  }

  primaryCategory(scores: ScoreVector): string {
    let best: string | null = null;
    let bestScore = -Infinity;
    for (const id of this.taxonomy.categoryIds) {
      const score = scoreOf(scores, id);
      if (score > bestScore) {
        best = id;
        bestScore = score;
      }
    }

    if (best === null || bestScore < this.threshold) {
      return UNCATEGORIZED;
    }
    return best;
  }
}
