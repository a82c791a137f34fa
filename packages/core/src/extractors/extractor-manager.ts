import { PipelineError } from '../errors';
import { err } from '../result';
import { extensionOf } from './extractor-utils';
import { PdfExtractor } from './pdf-extractor';
import { PlainTextExtractor } from './text-extractor';
import type { DocumentExtractor, ExtractionResult } from './types';

/**
 * ExtractorManager - routes files to the extractor for their extension
 */
export class ExtractorManager {
  private extractors: DocumentExtractor[];

  constructor(extractors?: DocumentExtractor[]) {
    this.extractors = extractors ?? [new PlainTextExtractor(), new PdfExtractor()];
  }

  findExtractor(extension: string): DocumentExtractor | null {
    return this.extractors.find((extractor) => extractor.canExtract(extension)) ?? null;
  }

  canExtract(filePath: string): boolean {
    return this.findExtractor(extensionOf(filePath)) !== null;
  }

  async extract(filePath: string): Promise<ExtractionResult> {
    const extension = extensionOf(filePath);
    const extractor = this.findExtractor(extension);

    if (!extractor) {
      return err(
        new PipelineError('UNSUPPORTED_FILE', `No extractor found for extension: ${extension || '(none)'}`, {
          filePath,
        }),
      );
    }

    return extractor.extract(filePath);
  }

  getSupportedExtensions(): string[] {
    const extensions = new Set<string>();
    for (const extractor of this.extractors) {
      for (const ext of extractor.supportedExtensions) {
        extensions.add(ext);
      }
    }
    return Array.from(extensions);
  }
}
