export {
  LLMClient,
  DEFAULT_MODELS,
  createLLMClient,
  getProviderDisplayName,
  mapToOpenAIModel,
  ollamaBaseUrl,
  type ChatCompleter,
  type ChatCompletionOptions,
  type LLMClientConfig,
} from './llm-client';
export { executeApiCall, type ApiCallError, type ApiCallErrorKind, type ApiCallOptions } from './api-call-helper';
export {
  SummaryAgent,
  fallbackCategoryScores,
  parseKeywordResponse,
  type CategoryScoreError,
  type SummaryAgentOptions,
} from './summary-agent';
export { WorkerPool, type WorkerPoolStats } from './worker-pool';
