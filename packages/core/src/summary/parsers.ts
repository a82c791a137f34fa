/**
 * Summary - Response Parsing
 *
 * Parses LLM responses into the Summary variant.
 * Handles common LLM habits: markdown fences, prose around the JSON object, malformed JSON.
 */
import { type Result, err, ok } from '../result';
import { StructuredSummarySchema, type Summary } from './types';

export type JsonExtractionError = 'empty_response' | 'no_json_object' | 'invalid_json';

/**
 * Remove surrounding markdown code fences if present.
 */
export function stripCodeFences(response: string): string {
  let text = response.trim();
  if (text.startsWith('```')) {
    text = text.replace(/```json\n?/g, '').replace(/```\n?/g, '').trim();
  }
  return text;
}

/**
 * Parse the outermost `{...}` span of a response.
 */
export function extractJsonObject(response: string): Result<Record<string, unknown>, JsonExtractionError> {
  const text = stripCodeFences(response);
  if (text.length === 0) {
    return err('empty_response');
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return err('no_json_object');
  }

  try {
    const parsed: unknown = JSON.parse(text.slice(start, end + 1));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return err('invalid_json');
    }
    return ok({ ...parsed });
  } catch {
    return err('invalid_json');
  }
}

/**
 * Structured whenever the response carries a JSON object, raw text otherwise.
 */
export function parseSummaryResponse(response: string): Summary {
  const json = extractJsonObject(response);
  if (!json.ok) {
    if (json.error === 'empty_response') {
      return { kind: 'failed', reason: 'Empty response from model' };
    }
    console.warn(`[SummaryParser] Response is not a JSON summary (${json.error}), keeping raw text`);
    return { kind: 'raw', text: response.trim() };
  }

  return { kind: 'structured', fields: StructuredSummarySchema.parse(json.value) };
}
