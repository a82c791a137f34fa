export {
  FAILED_SUMMARY_TEXT,
  StructuredSummarySchema,
  stringifyValue,
} from './types';
export type { StructuredField, StructuredSummary, Summary } from './types';
export { extractJsonObject, parseSummaryResponse, stripCodeFences } from './parsers';
export type { JsonExtractionError } from './parsers';
export {
  isPredictionModel,
  keyFindings,
  publicationYear,
  serializeSummary,
  summaryCategories,
  summaryField,
  summaryText,
} from './accessors';
