import { DEFAULT_KEYWORD_COUNT } from '../constants';
import type { PartialScores, Taxonomy } from '../taxonomy/types';
import { rankScores, sanitizeScores } from '../taxonomy/score-vector';
import { CategoryMatcher } from './category-matcher';
import { KeywordExtractor, type KeywordExtractorOptions } from './keyword-extractor';
import { SignalFusion, type SignalFusionOptions } from './signal-fusion';
import { SimilarityScorer } from './similarity-scorer';
import type { CategorizationBreakdown } from './types';

export interface TextCategorizerOptions extends SignalFusionOptions {
  keywords?: KeywordExtractorOptions;
}

export interface CategorizeInput {
  text: string;
  keywords: readonly string[];
  /** Model-derived scores; absent or partial when the model signal was skipped or failed. */
  modelScores?: PartialScores;
}

/**
 * Wires the keyword, similarity and fusion components around one taxonomy.
 */
export class TextCategorizer {
  readonly keywordExtractor: KeywordExtractor;
  readonly categoryMatcher: CategoryMatcher;
  readonly similarityScorer: SimilarityScorer;
  readonly signalFusion: SignalFusion;

  constructor(
    readonly taxonomy: Taxonomy,
    options: TextCategorizerOptions = {}
  ) {
    this.keywordExtractor = new KeywordExtractor(options.keywords);
    this.categoryMatcher = new CategoryMatcher(taxonomy);
    this.similarityScorer = new SimilarityScorer(taxonomy, {
      maxFeatures: options.keywords?.maxFeatures,
      ngramMax: options.keywords?.ngramMax,
      stopWords: options.keywords?.stopWords,
    });
    this.signalFusion = new SignalFusion(taxonomy, {
      weights: options.weights,
      threshold: options.threshold,
    });
  }

  extractKeywords(text: string, n: number = DEFAULT_KEYWORD_COUNT): string[] {
    return this.keywordExtractor.extract(text, n);
  }

  categorize(input: CategorizeInput): CategorizationBreakdown {
    const model = sanitizeScores(this.taxonomy, input.modelScores ?? {});
    const keyword = this.categoryMatcher.scoreByKeywords(input.keywords);
    const similarity = this.similarityScorer.scoreBySimilarity(input.text);
    const fused = this.signalFusion.combine(model, keyword, similarity);

    return Object.freeze({
      primaryCategory: fused.primaryCategory,
      scores: fused.scores,
      signals: Object.freeze({ model, keyword, similarity }),
    });
  }

  /**
   * Categories with their scores, best first.
   */
  categorySummary(scores: PartialScores): Array<[string, number]> {
    return rankScores(this.taxonomy, scores);
  }
}
