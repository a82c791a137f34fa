import * as fs from 'fs';
import { PDF_MAX_SIZE_BYTES } from '../constants';
import { PipelineError } from '../errors';
import { err, ok } from '../result';
import { cleanText, countWords, fileMetadata, withTimeout } from './extractor-utils';
import type { DocumentExtractor, DocumentMetadata, ExtractionResult } from './types';

function infoString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * PDF Extractor - extracts text and document info from PDF files
 * Supports: .pdf
 */
export class PdfExtractor implements DocumentExtractor {
  readonly id = 'pdf-extractor';
  readonly supportedExtensions = ['pdf'] as const;

  canExtract(extension: string): boolean {
    return extension.toLowerCase() === 'pdf';
  }

  async extract(filePath: string): Promise<ExtractionResult> {
    try {
      const stats = await fs.promises.stat(filePath);
      if (stats.size > PDF_MAX_SIZE_BYTES) {
        return err(
          new PipelineError('EXTRACTION_FAILED', `PDF too large (${Math.round(stats.size / 1024 / 1024)}MB), skipping`, {
            filePath,
            size: stats.size,
          }),
        );
      }

      const dataBuffer = await withTimeout(fs.promises.readFile(filePath), filePath);

      // Loaded on first use: pdf-parse runs a self-test when it is the entry module
      const { default: pdf } = await import('pdf-parse');
      const pdfData = await withTimeout(pdf(dataBuffer), filePath);

      const rawText = pdfData.text ?? '';
      if (rawText.trim().length === 0) {
        // Image-based (scanned) PDF
        return err(new PipelineError('NO_TEXT', `No text could be extracted from ${filePath}`, { filePath }));
      }

      const text = cleanText(rawText);
      const info: Record<string, unknown> = pdfData.info ?? {};
      const metadata: DocumentMetadata = {
        title: infoString(info.Title),
        author: infoString(info.Author),
        subject: infoString(info.Subject),
        creator: infoString(info.Creator),
        pages: pdfData.numpages,
        ...fileMetadata(filePath),
      };

      return ok({ text, metadata, wordCount: countWords(text) });
    } catch (error) {
      return err(PipelineError.fromUnknown(error, 'EXTRACTION_FAILED'));
    }
  }
}
