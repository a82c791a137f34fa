/**
 * Summary Agent
 *
 * The single LLM-facing agent of the pipeline. Per document it makes up to three calls:
 * 1. generateSummary: structured summary (Summary variant)
 * 2. extractKeywords: LLM keyword list
 * 3. categorize: model-derived category scores, the first of the three fusion signals
 *
 * Every call degrades instead of throwing: a failed summary becomes `failed`,
 * failed keywords become [], and categorization falls back to phrase matching.
 */
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import {
  CATEGORY_TEMPERATURE,
  KEYWORD_TEMPERATURE,
  LLM_KEYWORD_COUNT,
  MIN_KEYWORD_LENGTH,
  MODEL_FALLBACK_PARTIAL_INCREMENT,
  SUMMARY_TEMPERATURE,
} from '../constants';
import { type Result, err, ok } from '../result';
import { type JsonExtractionError, extractJsonObject, parseSummaryResponse, type Summary } from '../summary';
import { type ScoreVector, type Taxonomy, buildScores, maxScore, sanitizeScores } from '../taxonomy';
import { type ApiCallError, executeApiCall } from './api-call-helper';
import type { ChatCompleter } from './llm-client';
import {
  DOCUMENT_AGENT_SYSTEM_PROMPT,
  buildCategoryPrompt,
  buildKeywordPrompt,
  buildSummaryPrompt,
} from './prompts/document-agent-prompt';
import type { WorkerPool } from './worker-pool';

export type CategoryScoreError =
  | { kind: 'api'; error: ApiCallError }
  | { kind: 'unparseable'; reason: JsonExtractionError };

export interface SummaryAgentOptions {
  workerPool?: WorkerPool | null;
  timeoutMs?: number;
}

/**
 * Keyword-vs-phrase containment scoring, used when the model gives no usable scores.
 * Each containment (either direction) adds a fixed increment; the result is divided by its maximum.
 */
export function fallbackCategoryScores(taxonomy: Taxonomy, keywords: readonly string[]): ScoreVector {
  const normalized = keywords.map((keyword) => keyword.trim().toLowerCase()).filter((keyword) => keyword.length > 0);

  const raw = buildScores(taxonomy, (_id, index) => {
    let score = 0;
    for (const keyword of normalized) {
      for (const phrase of taxonomy.categories[index].phrases) {
        if (keyword.includes(phrase) || phrase.includes(keyword)) {
          score += MODEL_FALLBACK_PARTIAL_INCREMENT;
        }
      }
    }
    return score;
  });

  const max = maxScore(raw);
  if (max === 0) return raw;
  return buildScores(taxonomy, (id) => Math.min(raw[id] / max, 1));
}

/**
 * Comma-separated model reply → lowercase keywords longer than two characters.
 */
export function parseKeywordResponse(response: string, count: number): string[] {
  return response
    .split(',')
    .map((keyword) => keyword.trim().toLowerCase())
    .filter((keyword) => keyword.length >= MIN_KEYWORD_LENGTH)
    .slice(0, Math.max(0, count));
}

export class SummaryAgent {
  private readonly client: ChatCompleter | null;
  private readonly taxonomy: Taxonomy;
  private readonly workerPool: WorkerPool | null;
  private readonly timeoutMs?: number;

  constructor(client: ChatCompleter | null, taxonomy: Taxonomy, options: SummaryAgentOptions = {}) {
    this.client = client;
    this.taxonomy = taxonomy;
    this.workerPool = options.workerPool ?? null;
    this.timeoutMs = options.timeoutMs;
  }

  hasClient(): boolean {
    return this.client !== null;
  }

  private messages(prompt: string): ChatCompletionMessageParam[] {
    return [
      { role: 'system', content: DOCUMENT_AGENT_SYSTEM_PROMPT },
      { role: 'user', content: prompt },
    ];
  }

  async generateSummary(text: string): Promise<Summary> {
    const response = await executeApiCall(this.messages(buildSummaryPrompt(text)), this.client, {
      reason: 'structured summary',
      temperature: SUMMARY_TEMPERATURE,
      timeoutMs: this.timeoutMs,
      workerPool: this.workerPool,
    });

    if (!response.ok) {
      return { kind: 'failed', reason: response.error.message };
    }
    return parseSummaryResponse(response.value);
  }

  async extractKeywords(text: string, count: number = LLM_KEYWORD_COUNT): Promise<string[]> {
    if (count <= 0) return [];

    const response = await executeApiCall(this.messages(buildKeywordPrompt(text, count)), this.client, {
      reason: 'keyword extraction',
      temperature: KEYWORD_TEMPERATURE,
      timeoutMs: this.timeoutMs,
      workerPool: this.workerPool,
    });

    if (!response.ok) {
      console.warn(`[SummaryAgent] Keyword extraction failed (${response.error.kind}), continuing without LLM keywords`);
      return [];
    }
    return parseKeywordResponse(response.value, count);
  }

  /**
   * Scores straight from the model, clamped to [0, 1] and total over the taxonomy.
   */
  async requestCategoryScores(text: string, keywords: readonly string[]): Promise<Result<ScoreVector, CategoryScoreError>> {
    const prompt = buildCategoryPrompt(text, keywords, this.taxonomy.categoryIds);
    const response = await executeApiCall(this.messages(prompt), this.client, {
      reason: 'category scoring',
      temperature: CATEGORY_TEMPERATURE,
      timeoutMs: this.timeoutMs,
      workerPool: this.workerPool,
    });
    if (!response.ok) {
      return err({ kind: 'api', error: response.error });
    }

    const json = extractJsonObject(response.value);
    if (!json.ok) {
      return err({ kind: 'unparseable', reason: json.error });
    }
    return ok(sanitizeScores(this.taxonomy, json.value, { clampToUnit: true }));
  }

  /**
   * Model category scores, or the keyword containment fallback when the model gives none.
   */
  async categorize(text: string, keywords: readonly string[]): Promise<ScoreVector> {
    const scores = await this.requestCategoryScores(text, keywords);
    if (scores.ok) {
      return scores.value;
    }

    const cause = scores.error.kind === 'api' ? scores.error.error.kind : scores.error.reason;
    console.warn(`[SummaryAgent] Model categorization unavailable (${cause}), using keyword fallback`);
    return fallbackCategoryScores(this.taxonomy, keywords);
  }
}
