import * as fs from 'fs';
import { PipelineError } from '../errors';
import { err, ok } from '../result';
import { cleanText, countWords, fileMetadata, withTimeout } from './extractor-utils';
import type { DocumentExtractor, ExtractionResult } from './types';

/**
 * Plain Text Extractor - reads UTF-8 text and markdown files
 * Supports: .txt, .md
 */
export class PlainTextExtractor implements DocumentExtractor {
  readonly id = 'text-extractor';
  readonly supportedExtensions = ['txt', 'md'] as const;

  canExtract(extension: string): boolean {
    const normalized = extension.toLowerCase();
    return this.supportedExtensions.some((supported) => supported === normalized);
  }

  async extract(filePath: string): Promise<ExtractionResult> {
    try {
      const raw = await withTimeout(fs.promises.readFile(filePath, 'utf8'), filePath);
      if (raw.trim().length === 0) {
        return err(new PipelineError('NO_TEXT', `No text could be extracted from ${filePath}`, { filePath }));
      }

      const text = cleanText(raw);
      const firstLine = raw.split('\n').find((line) => line.trim().length > 0);
      const title = firstLine?.replace(/^#+\s*/, '').trim();

      return ok({
        text,
        metadata: { title: title || undefined, ...fileMetadata(filePath) },
        wordCount: countWords(text),
      });
    } catch (error) {
      return err(PipelineError.fromUnknown(error, 'EXTRACTION_FAILED'));
    }
  }
}
