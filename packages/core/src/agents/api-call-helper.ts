import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { API_DEFAULT_MAX_TOKENS, API_DEFAULT_TIMEOUT_MS } from '../constants';
import { errorMessage } from '../errors';
import { type Result, err, ok } from '../result';
import type { ChatCompleter } from './llm-client';
import type { WorkerPool } from './worker-pool';

export type ApiCallErrorKind = 'no_client' | 'timeout' | 'context_length' | 'empty_response' | 'request_failed';

export interface ApiCallError {
  kind: ApiCallErrorKind;
  message: string;
}

export interface ApiCallOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Why the call is made (for logging) */
  reason?: string;
  timeoutMs?: number;
  workerPool?: WorkerPool | null;
}

class ApiTimeoutError extends Error {
  constructor(timeoutMs: number, reason: string) {
    super(`API call timeout after ${timeoutMs}ms: ${reason}`);
    this.name = 'ApiTimeoutError';
  }
}

function classifyFailure(error: unknown): ApiCallErrorKind {
  if (error instanceof ApiTimeoutError) return 'timeout';
  const text = errorMessage(error).toLowerCase();
  if (text.includes('maximum context length') || text.includes('context length') || text.includes('too many tokens')) {
    return 'context_length';
  }
  return 'request_failed';
}

/**
 * Run one chat completion with a timeout, optionally through a worker pool.
 * Never throws: every failure becomes an ApiCallError the caller branches on.
 */
export async function executeApiCall(
  messages: ChatCompletionMessageParam[],
  client: ChatCompleter | null,
  options: ApiCallOptions = {},
): Promise<Result<string, ApiCallError>> {
  const reason = options.reason ?? 'API call';
  if (!client) {
    return err({ kind: 'no_client', message: `No LLM client configured: ${reason}` });
  }

  const timeoutMs = options.timeoutMs ?? API_DEFAULT_TIMEOUT_MS;
  console.log(`[API Call] ${reason}`);

  const performRequest = async (): Promise<Result<string, ApiCallError>> => {
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new ApiTimeoutError(timeoutMs, reason)), timeoutMs);
      });

      const content = await Promise.race([
        client.chatCompletion(messages, {
          model: options.model,
          maxTokens: options.maxTokens ?? API_DEFAULT_MAX_TOKENS,
          temperature: options.temperature,
        }),
        timeoutPromise,
      ]);

      console.log(`[API Call] Completed in ${Date.now() - startTime}ms: ${reason}`);

      if (!content.trim()) {
        return err({ kind: 'empty_response', message: `Empty response: ${reason}` });
      }
      return ok(content);
    } catch (error) {
      const kind = classifyFailure(error);
      console.warn(`[API Call] ${kind} after ${Date.now() - startTime}ms: ${reason} - ${errorMessage(error)}`);
      return err({ kind, message: errorMessage(error) });
    } finally {
      clearTimeout(timer);
    }
  };

  if (options.workerPool) {
    try {
      return await options.workerPool.execute(performRequest);
    } catch (error) {
      // pool shut down before the request started
      return err({ kind: 'request_failed', message: errorMessage(error) });
    }
  }
  return performRequest();
}
