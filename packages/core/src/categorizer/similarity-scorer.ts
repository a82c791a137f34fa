/**
 * SimilarityScorer
 *
 * Compares a document with each category's descriptive passage in a TF-IDF space fitted on
 * the document plus all descriptions. Catches topical text that never uses a taxonomy phrase
 * verbatim.
 */
import { TFIDF_MAX_FEATURES, TFIDF_NGRAM_MAX } from '../constants';
import { type Result, err, ok } from '../result';
import type { ScoreVector, Taxonomy } from '../taxonomy/types';
import { buildScores, zeroScores } from '../taxonomy/score-vector';
import { ENGLISH_STOP_WORDS } from './text';
import { cosineSimilarity, fitTransform, type TfidfErrorKind } from './tfidf';

export type SimilarityErrorKind = TfidfErrorKind | 'row_count_mismatch';

export interface SimilarityScorerOptions {
  maxFeatures?: number;
  ngramMax?: number;
  stopWords?: ReadonlySet<string>;
}

export class SimilarityScorer {
  private readonly maxFeatures: number;
  private readonly ngramMax: number;
  private readonly stopWords: ReadonlySet<string>;

  constructor(
    private readonly taxonomy: Taxonomy,
    options: SimilarityScorerOptions = {}
  ) {
    this.maxFeatures = options.maxFeatures ?? TFIDF_MAX_FEATURES;
    this.ngramMax = options.ngramMax ?? TFIDF_NGRAM_MAX;
    this.stopWords = options.stopWords ?? ENGLISH_STOP_WORDS;
  }

  /**
   * Cosine similarity per category, or all zeros when the space cannot be built.
   */
  scoreBySimilarity(text: string): ScoreVector {
    const result = this.computeSimilarities(text);
    if (!result.ok) {
      console.warn(`[SimilarityScorer] Similarity unavailable (${result.error}), using zero scores`);
      return zeroScores(this.taxonomy);
    }
    return result.value;
  }

  computeSimilarities(text: string): Result<ScoreVector, SimilarityErrorKind> {
    const documents = [text, ...this.taxonomy.categories.map((c) => c.description)];
    const matrix = fitTransform(documents, {
      maxFeatures: this.maxFeatures,
      ngramMax: this.ngramMax,
      stopWords: this.stopWords,
    });
    if (!matrix.ok) {
      return err(matrix.error);
    }

    const [textVector, ...descriptionVectors] = matrix.value.rows;
    if (descriptionVectors.length !== this.taxonomy.categories.length) {
      return err('row_count_mismatch');
    }

    return ok(
      buildScores(this.taxonomy, (_id, index) => Math.min(1, cosineSimilarity(textVector, descriptionVectors[index])))
    );
  }
}
