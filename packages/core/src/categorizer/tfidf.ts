/**
 * TF-IDF vectorizer
 *
 * Terms are unigrams and bigrams over stop-word-filtered tokens. The vocabulary keeps the
 * `maxFeatures` terms with the highest corpus count (ties alphabetical). Weights are raw term
 * counts times smoothed IDF `ln((1 + n) / (1 + df)) + 1`, then each row is L2-normalized.
 */
import { err, ok, type Result } from '../result';
import { compareCodePoints, tokenize } from './text';

export interface TfidfOptions {
  maxFeatures: number;
  ngramMax: number;
  stopWords: ReadonlySet<string>;
}

export type TfidfErrorKind = 'empty_vocabulary' | 'non_finite_weight';

/** A sparse, L2-normalized document vector. */
export type TermVector = ReadonlyMap<string, number>;

export interface TfidfMatrix {
  /** Alphabetical. */
  vocabulary: readonly string[];
  rows: readonly TermVector[];
}

/**
 * Split a document into its terms (stop words removed, then n-grams built).
 */
export function analyze(text: string, options: Pick<TfidfOptions, 'ngramMax' | 'stopWords'>): string[] {
  const tokens = tokenize(text).filter((t) => !options.stopWords.has(t));
  const terms: string[] = [...tokens];
  for (let n = 2; n <= options.ngramMax; n++) {
    for (let i = 0; i + n <= tokens.length; i++) {
      terms.push(tokens.slice(i, i + n).join(' '));
    }
  }
  return terms;
}

function countTerms(terms: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1);
  }
  return counts;
}

function selectVocabulary(documentCounts: Map<string, number>[], maxFeatures: number): string[] {
  const corpusCounts = new Map<string, number>();
  for (const counts of documentCounts) {
    for (const [term, count] of counts) {
      corpusCounts.set(term, (corpusCounts.get(term) ?? 0) + count);
    }
  }

  const alphabetical = [...corpusCounts.keys()].sort(compareCodePoints);
  const limited = alphabetical.length > maxFeatures
    ? [...alphabetical]
        .sort((a, b) => (corpusCounts.get(b) ?? 0) - (corpusCounts.get(a) ?? 0))
        .slice(0, Math.max(0, maxFeatures))
    : alphabetical;

  return limited.sort(compareCodePoints);
}

/**
 * Fit the vocabulary and IDF on `documents` and return their weighted vectors.
 */
export function fitTransform(
  documents: readonly string[],
  options: TfidfOptions
): Result<TfidfMatrix, TfidfErrorKind> {
  const documentCounts = documents.map((doc) => countTerms(analyze(doc, options)));
  const vocabulary = selectVocabulary(documentCounts, options.maxFeatures);

  if (vocabulary.length === 0) {
    return err('empty_vocabulary');
  }

  const n = documents.length;
  const idf = new Map<string, number>();
  for (const term of vocabulary) {
    let df = 0;
    for (const counts of documentCounts) {
      if (counts.has(term)) df++;
    }
    idf.set(term, Math.log((1 + n) / (1 + df)) + 1);
  }

  const rows: TermVector[] = [];
  for (const counts of documentCounts) {
    const row = new Map<string, number>();
    let sumSquares = 0;
    for (const term of vocabulary) {
      const count = counts.get(term);
      if (!count) continue;
      const weight = count * (idf.get(term) ?? 1);
      row.set(term, weight);
      sumSquares += weight * weight;
    }

    const norm = Math.sqrt(sumSquares);
    if (norm > 0) {
      for (const [term, weight] of row) {
        const normalized = weight / norm;
        if (!Number.isFinite(normalized)) {
          return err('non_finite_weight');
        }
        row.set(term, normalized);
      }
    }
    rows.push(row);
  }

  return ok({ vocabulary, rows });
}

/**
 * Cosine similarity of two sparse vectors; 0 when either is empty.
 */
export function cosineSimilarity(a: TermVector, b: TermVector): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (const [term, va] of a) {
    dot += va * (b.get(term) ?? 0);
    normA += va * va;
  }
  for (const vb of b.values()) {
    normB += vb * vb;
  }
  const denom = Math.sqrt(normA) * Math.sqrt(normB);
  return denom === 0 ? 0 : dot / denom;
}
