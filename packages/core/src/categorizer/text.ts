/**
 * Text normalization and stop-word sets shared by the keyword and similarity signals.
 */
import stopwords from '../../data/stopwords.json';

/** English stop words removed before building TF-IDF terms. */
export const ENGLISH_STOP_WORDS: ReadonlySet<string> = new Set(stopwords.english);

/** Smaller stop-word set used by the frequency fallback. */
export const FALLBACK_STOP_WORDS: ReadonlySet<string> = new Set(stopwords.frequency);

/**
 * Lowercase, collapse whitespace and replace everything that is not an ASCII letter with a space.
 */
export function preprocessText(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .replace(/[^a-zA-Z\s]/g, ' ')
    .trim();
}

/**
 * Word tokens of two or more letters/digits, lowercased.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}_]{2,}/gu) ?? [];
}

/**
 * Compare strings by code point, independent of locale.
 */
export function compareCodePoints(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
