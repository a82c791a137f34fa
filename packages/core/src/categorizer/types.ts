import type { ScoreVector } from '../taxonomy/types';

export interface CategorizationResult {
  /** A taxonomy category id, or "uncategorized". */
  readonly primaryCategory: string;
  readonly scores: ScoreVector;
}

export interface SignalWeights {
  model: number;
  keyword: number;
  similarity: number;
}

/**
 * The fused result together with the signals that produced it.
 */
export interface CategorizationBreakdown extends CategorizationResult {
  readonly signals: {
    readonly model: ScoreVector;
    readonly keyword: ScoreVector;
    readonly similarity: ScoreVector;
  };
}
