import type { CategorizationBreakdown } from '../categorizer/types';
import type { NewDocument } from '../db';
import type { PipelineError } from '../errors';
import type { DocumentMetadata, ExtractionResult } from '../extractors/types';
import type { Summary } from '../summary';
import type { ScoreVector } from '../taxonomy';

/**
 * Text extraction as the pipeline sees it (ExtractorManager in production).
 */
export interface DocumentSource {
  extract(filePath: string): Promise<ExtractionResult>;
}

/**
 * The LLM side of processing (SummaryAgent in production).
 */
export interface DocumentAgent {
  generateSummary(text: string): Promise<Summary>;
  extractKeywords(text: string, count?: number): Promise<string[]>;
  categorize(text: string, keywords: readonly string[]): Promise<ScoreVector>;
}

/**
 * Persistence (DatabaseManager in production).
 */
export interface DocumentStore {
  insertDocument(doc: NewDocument): Promise<number>;
}

export interface ProcessingOptions {
  /** Ask the model for keywords and category scores. Defaults to true. */
  useLlmKeywords?: boolean;
}

export interface ProcessedDocument {
  /** File name of the input, e.g. "paper.pdf" */
  sourceFile: string;
  sourcePath: string;
  processedAt: string;
  metadata: DocumentMetadata;
  summary: Summary;
  keywords: string[];
  categorization: CategorizationBreakdown;
  wordCount: number;
  filenameBase: string;
  outputPath: string;
  /** Written only for structured summaries */
  simplePath?: string;
  /** Set when the document was persisted */
  documentId?: number;
}

export interface BatchFailure {
  filePath: string;
  error: PipelineError;
}

export interface BatchResult {
  processed: ProcessedDocument[];
  failed: BatchFailure[];
}
