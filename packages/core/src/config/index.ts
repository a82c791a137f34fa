export {
  DEFAULT_OLLAMA_HOST,
  DEFAULT_OLLAMA_MODEL,
  DEFAULT_OUTPUT_DIR,
  LLM_PROVIDERS,
  loadConfig,
  withModel,
} from './config';
export type { AppConfig, LLMProvider } from './config';
export { loadEnvFile, maskSecret, setEnvValue } from './env-file';
