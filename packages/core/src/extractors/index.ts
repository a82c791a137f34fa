export type { DocumentExtractor, DocumentMetadata, ExtractedDocument, ExtractionResult } from './types';
export { ExtractorManager } from './extractor-manager';
export { PdfExtractor } from './pdf-extractor';
export { PlainTextExtractor } from './text-extractor';
export { chunkText, cleanText, countWords, extensionOf, fileMetadata, withTimeout } from './extractor-utils';
