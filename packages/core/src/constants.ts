/**
 * Configuration constants for the categorizer, agents and pipeline.
 * All weights, thresholds and limits are defined here for easy adjustment.
 *
 * PRINCIPLE: Change ONE number here, and it updates everywhere automatically.
 */

// ============================================================================
// SIGNAL FUSION
// ============================================================================

/**
 * Weights applied to each categorization signal.
 * They sum to 1 so a fused score stays in [0, 1] when every input does.
 */
export const MODEL_SIGNAL_WEIGHT = 0.4; // LLM-derived category scores
export const KEYWORD_SIGNAL_WEIGHT = 0.3; // Keyword/phrase overlap scores
export const SIMILARITY_SIGNAL_WEIGHT = 0.3; // TF-IDF cosine similarity scores

/**
 * A document whose best fused score is strictly below this value is "uncategorized".
 * A score of exactly the threshold is categorized.
 */
export const DEFAULT_CATEGORY_THRESHOLD = 0.3;

/** Sentinel primary category for documents below the threshold. */
export const UNCATEGORIZED = 'uncategorized';

// ============================================================================
// KEYWORDS & TF-IDF
// ============================================================================

export const TFIDF_MAX_FEATURES = 1000; // Vocabulary cap (most frequent unigrams/bigrams)
export const TFIDF_NGRAM_MAX = 2; // Unigrams and bigrams
export const DEFAULT_KEYWORD_COUNT = 15; // Statistical keywords per document
export const LLM_KEYWORD_COUNT = 10; // Keywords requested from the LLM
export const MIN_KEYWORD_LENGTH = 3; // Shorter keywords are dropped
export const FALLBACK_MIN_TOKEN_LENGTH = 4; // Frequency fallback keeps tokens longer than 3 chars

/** Partial-match increment used by the LLM categorization fallback. */
export const MODEL_FALLBACK_PARTIAL_INCREMENT = 0.1;

// ============================================================================
// FILENAMES
// ============================================================================

export const FILENAME_MAX_LENGTH = 50;
export const FILENAME_UNKNOWN = 'unknown';

// ============================================================================
// PROMPT LIMITS
// ============================================================================

export const SUMMARY_PROMPT_MAX_CHARS = 3000; // Text sent for structured summaries
export const KEYWORD_PROMPT_MAX_CHARS = 2000; // Text sent for keyword extraction
export const CATEGORY_PROMPT_MAX_CHARS = 1500; // Text sent for categorization

/** Sampling temperatures per task. */
export const SUMMARY_TEMPERATURE = 0.7;
export const KEYWORD_TEMPERATURE = 0.3;
export const CATEGORY_TEMPERATURE = 0.2;

// ============================================================================
// API & TIMEOUT SETTINGS
// ============================================================================

export const API_DEFAULT_TIMEOUT_MS = 180000; // 3 minutes default timeout
export const API_DEFAULT_MAX_TOKENS = 1000; // Default max completion tokens

/**
 * WorkerPool settings.
 */
export const WORKER_POOL_DEFAULT_MAX_WORKERS = 4; // Default concurrent documents
export const WORKER_POOL_SLOW_TASK_MS = 30000; // Tasks slower than this are logged
export const WORKER_POOL_MAX_ITERATIONS = 10000; // Safety limit for queue waiting
export const WORKER_POOL_CHECK_INTERVAL_MS = 50; // How often to check queue

// ============================================================================
// EXTRACTION LIMITS
// ============================================================================

export const PDF_MAX_SIZE_BYTES = 50 * 1024 * 1024; // 50MB
export const EXTRACTION_TIMEOUT_MS = 60000; // 60 seconds
export const EXTRACTION_WARNING_MS = 10000; // 10 seconds
export const DEFAULT_MAX_CHUNK_SIZE = 4000; // Characters per text chunk

// ============================================================================
// REPORTS
// ============================================================================

export const REPORT_KEYWORD_COUNT = 8; // Keywords listed per document in reports
export const TABLE_KEYWORD_COUNT = 5; // Keywords shown in the results table
