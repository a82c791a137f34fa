export { KeywordExtractor, type KeywordExtractorOptions, type KeywordErrorKind } from './keyword-extractor';
export { CategoryMatcher, matchScore } from './category-matcher';
export { SimilarityScorer, type SimilarityScorerOptions, type SimilarityErrorKind } from './similarity-scorer';
export { SignalFusion, DEFAULT_SIGNAL_WEIGHTS, type SignalFusionOptions } from './signal-fusion';
export { TextCategorizer, type TextCategorizerOptions, type CategorizeInput } from './text-categorizer';
export { fitTransform, cosineSimilarity, analyze, type TfidfMatrix, type TfidfOptions, type TermVector } from './tfidf';
export { preprocessText, tokenize, ENGLISH_STOP_WORDS, FALLBACK_STOP_WORDS } from './text';
export type { CategorizationResult, CategorizationBreakdown, SignalWeights } from './types';
