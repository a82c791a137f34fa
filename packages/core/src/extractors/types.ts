/**
 * Types for document extraction
 */
import type { PipelineError } from '../errors';
import type { Result } from '../result';

export interface DocumentMetadata {
  title?: string;
  author?: string;
  subject?: string;
  creator?: string;
  pages?: number;
  filename: string;
  filepath: string;
}

export interface ExtractedDocument {
  text: string;
  metadata: DocumentMetadata;
  wordCount: number;
}

export type ExtractionResult = Result<ExtractedDocument, PipelineError>;

export interface DocumentExtractor {
  readonly id: string;
  readonly supportedExtensions: readonly string[];

  canExtract(extension: string): boolean;
  extract(filePath: string): Promise<ExtractionResult>;
}
