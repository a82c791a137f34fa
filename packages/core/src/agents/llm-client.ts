import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import type { AppConfig, LLMProvider } from '../config';
import { DEFAULT_OLLAMA_HOST, DEFAULT_OLLAMA_MODEL } from '../config';
import { API_DEFAULT_MAX_TOKENS } from '../constants';

export type LLMClientConfig = {
  provider: LLMProvider;
  /** Not needed for Ollama */
  apiKey?: string;
  model?: string;
  /** Ollama server, e.g. http://localhost:11434 */
  host?: string;
};

export type ChatCompletionOptions = {
  model?: string;
  maxTokens?: number;
  temperature?: number;
};

/**
 * Anything that can answer a chat completion. LLMClient is the real one;
 * tests substitute an in-process fake.
 */
export interface ChatCompleter {
  chatCompletion(messages: ChatCompletionMessageParam[], options?: ChatCompletionOptions): Promise<string>;
  getModel(): string;
}

/**
 * Default models for each provider
 */
export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  ollama: DEFAULT_OLLAMA_MODEL,
  openrouter: 'openai/gpt-4o-mini',
  openai: 'gpt-4o-mini',
};

/**
 * Map an OpenRouter model ID to the native OpenAI model ID
 */
export function mapToOpenAIModel(modelId: string): string {
  if (modelId.startsWith('openai/')) {
    return modelId.slice('openai/'.length);
  }
  return modelId.includes('/') ? DEFAULT_MODELS.openai : modelId;
}

/**
 * OpenAI-compatible endpoint of an Ollama server
 */
export function ollamaBaseUrl(host: string): string {
  const trimmed = host.replace(/\/+$/, '');
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
}

/**
 * LLM Client for Ollama, OpenRouter and OpenAI
 *
 * All three speak the OpenAI chat-completions format; only the base URL,
 * credentials and model naming differ. Ollama is reached through its `/v1`
 * compatibility endpoint and ignores the API key.
 */
export class LLMClient implements ChatCompleter {
  private readonly client: OpenAI;
  private readonly provider: LLMProvider;
  private readonly model: string;

  constructor(config: LLMClientConfig) {
    this.provider = config.provider;
    const configuredModel = config.model ?? DEFAULT_MODELS[config.provider];

    if (config.provider === 'ollama') {
      this.model = configuredModel;
      this.client = new OpenAI({
        baseURL: ollamaBaseUrl(config.host ?? DEFAULT_OLLAMA_HOST),
        apiKey: config.apiKey ?? 'ollama',
      });
    } else if (config.provider === 'openrouter') {
      // OpenRouter uses the full model ID (e.g., "openai/gpt-4o-mini")
      this.model = configuredModel;
      this.client = new OpenAI({
        baseURL: 'https://openrouter.ai/api/v1',
        apiKey: config.apiKey,
        defaultHeaders: { 'X-Title': 'paper-sieve' },
      });
    } else {
      this.model = mapToOpenAIModel(configuredModel);
      this.client = new OpenAI({ apiKey: config.apiKey });
    }
  }

  getModel(): string {
    return this.model;
  }

  /**
   * Create a chat completion and return the trimmed text of the first choice
   */
  async chatCompletion(messages: ChatCompletionMessageParam[], options?: ChatCompletionOptions): Promise<string> {
    const modelToUse = options?.model ?? this.model;

    try {
      console.log(`[LLMClient] Making API call - Provider: ${this.provider}, Model: ${modelToUse}, Messages: ${messages.length}`);

      const response = await this.client.chat.completions.create({
        model: modelToUse,
        messages,
        max_tokens: options?.maxTokens ?? API_DEFAULT_MAX_TOKENS,
        temperature: options?.temperature,
      });

      if (!Array.isArray(response.choices) || response.choices.length === 0) {
        throw new Error('API response has no choices');
      }

      const content = response.choices[0].message.content?.trim() ?? '';
      if (!content) {
        console.warn(
          `[LLMClient] Empty content in response. Finish reason: ${response.choices[0].finish_reason}, ` +
            `Model: ${modelToUse}, Provider: ${this.provider}`,
        );
      }

      return content;
    } catch (error) {
      console.error(`[LLMClient] Error in chatCompletion:`, error);
      throw error;
    }
  }

  /**
   * Model IDs the backend reports
   */
  async listModels(): Promise<string[]> {
    const models: string[] = [];
    for await (const model of this.client.models.list()) {
      models.push(model.id);
    }
    return models;
  }

  /**
   * Whether the configured model is installed (exact or partial name match).
   * Unreachable backends count as unavailable.
   */
  async isModelAvailable(): Promise<boolean> {
    try {
      const models = await this.listModels();
      return models.some((name) => name === this.model || name.includes(this.model));
    } catch (error) {
      console.error(`[LLMClient] Error checking model availability:`, error);
      return false;
    }
  }
}

export function createLLMClient(config: AppConfig): LLMClient {
  const apiKey =
    config.provider === 'openrouter'
      ? config.openrouterApiKey
      : config.provider === 'openai'
        ? config.openaiApiKey
        : undefined;

  return new LLMClient({
    provider: config.provider,
    apiKey,
    model: config.model,
    host: config.ollamaHost,
  });
}

export function getProviderDisplayName(provider: LLMProvider): string {
  switch (provider) {
    case 'ollama':
      return 'Ollama';
    case 'openrouter':
      return 'OpenRouter';
    case 'openai':
      return 'OpenAI';
  }
}
