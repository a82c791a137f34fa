/**
 * KeywordExtractor
 *
 * Ranks salient terms of a single document. The primary path weights unigrams and
 * bigrams with TF-IDF; when that path cannot produce a vocabulary (empty or
 * stop-word-only text, zero vocabulary size) or yields non-finite weights, the
 * frequency fallback runs over the same preprocessed text.
 */
import {
  DEFAULT_KEYWORD_COUNT,
  FALLBACK_MIN_TOKEN_LENGTH,
  MIN_KEYWORD_LENGTH,
  TFIDF_MAX_FEATURES,
  TFIDF_NGRAM_MAX,
} from '../constants';
import { type Result, err, ok } from '../result';
import { ENGLISH_STOP_WORDS, FALLBACK_STOP_WORDS, preprocessText } from './text';
import { fitTransform, type TfidfErrorKind } from './tfidf';

export type KeywordErrorKind = TfidfErrorKind | 'no_positive_weights';

export interface KeywordExtractorOptions {
  /** Vocabulary cap for the TF-IDF path. */
  maxFeatures?: number;
  ngramMax?: number;
  stopWords?: ReadonlySet<string>;
  fallbackStopWords?: ReadonlySet<string>;
}

export class KeywordExtractor {
  private readonly maxFeatures: number;
  private readonly ngramMax: number;
  private readonly stopWords: ReadonlySet<string>;
  private readonly fallbackStopWords: ReadonlySet<string>;

  constructor(options: KeywordExtractorOptions = {}) {
    this.maxFeatures = options.maxFeatures ?? TFIDF_MAX_FEATURES;
    this.ngramMax = options.ngramMax ?? TFIDF_NGRAM_MAX;
    this.stopWords = options.stopWords ?? ENGLISH_STOP_WORDS;
    this.fallbackStopWords = options.fallbackStopWords ?? FALLBACK_STOP_WORDS;
  }

  /**
   * Up to `n` keywords, most relevant first. Never throws.
   */
  extract(text: string, n: number = DEFAULT_KEYWORD_COUNT): string[] {
    if (n <= 0) return [];

    const statistical = this.extractStatistical(text, n);
    if (statistical.ok) {
      return statistical.value;
    }

    if (text.trim().length > 0) {
      console.warn(`[KeywordExtractor] TF-IDF unavailable (${statistical.error}), using frequency fallback`);
    }
    return this.extractByFrequency(text, n);
  }

  /**
   * TF-IDF over the single document: terms ranked by descending weight, ties alphabetical.
   */
  extractStatistical(text: string, n: number = DEFAULT_KEYWORD_COUNT): Result<string[], KeywordErrorKind> {
    if (n <= 0) return ok([]);

    const matrix = fitTransform([preprocessText(text)], {
      maxFeatures: this.maxFeatures,
      ngramMax: this.ngramMax,
      stopWords: this.stopWords,
    });
    if (!matrix.ok) {
      return err(matrix.error);
    }

    const row = matrix.value.rows[0];
    const ranked = matrix.value.vocabulary
      .map((term) => ({ term, weight: row.get(term) ?? 0 }))
      .filter((entry) => entry.weight > 0 && entry.term.length >= MIN_KEYWORD_LENGTH)
      .sort((a, b) => b.weight - a.weight);

    if (ranked.length === 0) {
      return err('no_positive_weights');
    }

    return ok(ranked.slice(0, n).map((entry) => entry.term));
  }

  /**
   * Most frequent words of four or more letters, ties in first-seen order.
   */
  extractByFrequency(text: string, n: number = DEFAULT_KEYWORD_COUNT): string[] {
    if (n <= 0) return [];

    const words = preprocessText(text).match(/\b[a-z]{3,}\b/g) ?? [];
    const counts = new Map<string, number>();
    for (const word of words) {
      if (word.length < FALLBACK_MIN_TOKEN_LENGTH || this.fallbackStopWords.has(word)) continue;
      counts.set(word, (counts.get(word) ?? 0) + 1);
    }

    return [...counts.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, n)
      .map(([word]) => word);
  }
}
