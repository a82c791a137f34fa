export { DocumentProcessor, mergeKeywords, type DocumentProcessorDeps } from './document-processor';
export { BatchProcessor, categoryDistribution, findDocuments } from './batch-processor';
export { buildCategoryReport, formatTimestamp, reportFileName, titleCase, writeCategoryReport } from './report';
export { summaryPaths, toSummaryRecord, writeJsonArtifacts, type JsonArtifact, type SummaryRecord } from './record';
export type {
  BatchFailure,
  BatchResult,
  DocumentAgent,
  DocumentSource,
  DocumentStore,
  ProcessedDocument,
  ProcessingOptions,
} from './types';
export { createPipeline, type Pipeline } from './create-pipeline';
