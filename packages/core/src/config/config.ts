/**
 * Application configuration
 *
 * Reads process environment values (after `.env` loading) into a validated, frozen AppConfig.
 */
import * as path from 'path';
import { z } from 'zod';
import {
  API_DEFAULT_TIMEOUT_MS,
  DEFAULT_CATEGORY_THRESHOLD,
  DEFAULT_MAX_CHUNK_SIZE,
  WORKER_POOL_DEFAULT_MAX_WORKERS,
} from '../constants';
import { ConfigError } from '../errors';

export const LLM_PROVIDERS = ['ollama', 'openai', 'openrouter'] as const;
export type LLMProvider = (typeof LLM_PROVIDERS)[number];

export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'mistral:latest';
export const DEFAULT_OUTPUT_DIR = './summaries';

/** Empty strings count as unset. */
const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z.object({
  LLM_PROVIDER: z.enum(LLM_PROVIDERS).optional(),
  OLLAMA_HOST: optionalText,
  OLLAMA_MODEL: optionalText,
  OPENAI_API_KEY: optionalText,
  OPENROUTER_API_KEY: optionalText,
  LLM_MODEL: optionalText,
  OUTPUT_DIR: optionalText,
  MAX_CHUNK_SIZE: z.coerce.number().int().positive().optional(),
  DATABASE_PATH: optionalText,
  CONCURRENCY: z.coerce.number().int().min(1).optional(),
  CATEGORY_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
  TAXONOMY_PATH: optionalText,
  API_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export interface AppConfig {
  readonly provider: LLMProvider;
  readonly ollamaHost: string;
  /** Model for the active provider; undefined lets the client pick its default. */
  readonly model?: string;
  readonly openaiApiKey?: string;
  readonly openrouterApiKey?: string;
  readonly outputDir: string;
  readonly maxChunkSize: number;
  readonly databasePath?: string;
  readonly concurrency: number;
  readonly categoryThreshold: number;
  readonly taxonomyPath?: string;
  readonly apiTimeoutMs: number;
}

type EnvSource = Readonly<Record<string, string | undefined>>;

/**
 * Blank values are dropped before validation so defaults apply.
 */
function presentValues(env: EnvSource): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) out[key] = value;
  }
  return out;
}

export function loadConfig(env: EnvSource = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(presentValues(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(issue.path.join('.'), issue.message);
  }
  const values = parsed.data;

  const provider: LLMProvider =
    values.LLM_PROVIDER ??
    (values.OPENROUTER_API_KEY ? 'openrouter' : values.OPENAI_API_KEY ? 'openai' : 'ollama');

  if (provider === 'openai' && !values.OPENAI_API_KEY) {
    throw new ConfigError('OPENAI_API_KEY', 'required when LLM_PROVIDER is openai');
  }
  if (provider === 'openrouter' && !values.OPENROUTER_API_KEY) {
    throw new ConfigError('OPENROUTER_API_KEY', 'required when LLM_PROVIDER is openrouter');
  }

  const model = values.LLM_MODEL ?? (provider === 'ollama' ? (values.OLLAMA_MODEL ?? DEFAULT_OLLAMA_MODEL) : undefined);

  return Object.freeze({
    provider,
    ollamaHost: values.OLLAMA_HOST ?? DEFAULT_OLLAMA_HOST,
    model,
    openaiApiKey: values.OPENAI_API_KEY,
    openrouterApiKey: values.OPENROUTER_API_KEY,
    outputDir: path.resolve(values.OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR),
    maxChunkSize: values.MAX_CHUNK_SIZE ?? DEFAULT_MAX_CHUNK_SIZE,
    databasePath: values.DATABASE_PATH,
    concurrency: values.CONCURRENCY ?? WORKER_POOL_DEFAULT_MAX_WORKERS,
    categoryThreshold: values.CATEGORY_THRESHOLD ?? DEFAULT_CATEGORY_THRESHOLD,
    taxonomyPath: values.TAXONOMY_PATH,
    apiTimeoutMs: values.API_TIMEOUT_MS ?? API_DEFAULT_TIMEOUT_MS,
  });
}

/**
 * Config with `model` replaced, e.g. from a `--model` flag.
 */
export function withModel(config: AppConfig, model: string | undefined): AppConfig {
  return model ? Object.freeze({ ...config, model }) : config;
}
