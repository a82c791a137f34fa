/**
 * Utility functions for extractors
 */
import * as path from 'path';
import { DEFAULT_MAX_CHUNK_SIZE, EXTRACTION_TIMEOUT_MS, EXTRACTION_WARNING_MS } from '../constants';
import type { DocumentMetadata } from './types';

/**
 * Normalize extracted text: whitespace runs become one space and symbols other
 * than basic punctuation become spaces.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/[^\p{L}\p{N}_\s.,!?;:()\-']/gu, ' ')
    .trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Split text on word boundaries into chunks of at most `maxChunkSize` characters
 * (a single longer word becomes its own chunk).
 */
export function chunkText(text: string, maxChunkSize: number = DEFAULT_MAX_CHUNK_SIZE): string[] {
  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    const wordLength = word.length + 1; // +1 for the joining space
    if (currentLength + wordLength > maxChunkSize && current.length > 0) {
      chunks.push(current.join(' '));
      current = [word];
      currentLength = wordLength;
    } else {
      current.push(word);
      currentLength += wordLength;
    }
  }

  if (current.length > 0) {
    chunks.push(current.join(' '));
  }
  return chunks;
}

/**
 * File extension without the dot, lowercased
 */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

export function fileMetadata(filePath: string): DocumentMetadata {
  return {
    filename: path.basename(filePath),
    filepath: path.resolve(filePath),
  };
}

/**
 * Execute an extraction step with timeout protection.
 * Warns once the step runs longer than `warningMs`, rejects after `timeoutMs`.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  filePath: string,
  timeoutMs: number = EXTRACTION_TIMEOUT_MS,
  warningMs: number = EXTRACTION_WARNING_MS,
): Promise<T> {
  const startTime = Date.now();

  const warningTimer = setTimeout(() => {
    const elapsed = Date.now() - startTime;
    console.warn(`[Extractor] Extraction taking longer than expected: ${filePath} (${Math.round(elapsed / 1000)}s elapsed)`);
  }, warningMs);

  let timeoutTimer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutTimer = setTimeout(() => {
      reject(new Error(`Extraction timeout after ${timeoutMs}ms: ${filePath}`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(warningTimer);
    clearTimeout(timeoutTimer);
  }
}
