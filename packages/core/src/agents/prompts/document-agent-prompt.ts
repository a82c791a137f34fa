/**
 * Document Agent Prompts
 *
 * Three single-purpose prompts: a structured summary of a research document,
 * a comma-separated keyword list, and per-category relevance scores.
 * Each prompt receives only the first part of the text.
 */
import {
  CATEGORY_PROMPT_MAX_CHARS,
  KEYWORD_PROMPT_MAX_CHARS,
  SUMMARY_PROMPT_MAX_CHARS,
} from '../../constants';

export const DOCUMENT_AGENT_SYSTEM_PROMPT = `You are a careful research assistant. You read documents (mostly scientific papers and books) and report what they contain accurately. Never invent authors, years or numbers that are not in the text; write "Not specified" instead.`;

function excerpt(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}

/**
 * Structured summary request. The reply must be one JSON object with the listed keys.
 */
export function buildSummaryPrompt(text: string): string {
  return `Summarize the following document as a single JSON object with exactly these keys:

{
  "Title": "Full title of the document",
  "Author(s)": "Authors as written, e.g. \\"Smith, John A. and Jones, Mary B.\\"",
  "Year Published": "Four-digit year",
  "Journal": "Journal or publisher",
  "BibTeX Citation": "A complete BibTeX entry",
  "Type": "Study type, e.g. randomized controlled trial, cohort study, review, book",
  "Categories": "Comma-separated topical categories",
  "Sample Size": "Number of participants or samples, if any",
  "Method": "Main methods in one or two sentences",
  "Key Findings": { "Short finding name": "One-sentence description" },
  "Prediction Model": "Yes or No, with the model type if Yes",
  "Key Takeaways": "Two or three sentences on why the document matters"
}

Use "Not specified" for anything the text does not state.
Return only the JSON object, no additional text.

Text to summarize:
${excerpt(text, SUMMARY_PROMPT_MAX_CHARS)}`;
}

export function buildKeywordPrompt(text: string, count: number): string {
  return `Extract ${count} most important keywords or key phrases from the following text.
Return only the keywords, separated by commas, without any additional text or explanation.
Focus on topics, concepts, and main themes.

Text:
${excerpt(text, KEYWORD_PROMPT_MAX_CHARS)}`;
}

export function buildCategoryPrompt(text: string, keywords: readonly string[], categoryIds: readonly string[]): string {
  return `Based on the following text and keywords, assign relevance scores (0-1) for each category.
Return your response as a JSON object with category names as keys and scores as values.

Categories: ${categoryIds.join(', ')}
Keywords: ${keywords.join(', ')}

Text sample:
${excerpt(text, CATEGORY_PROMPT_MAX_CHARS)}

Return only the JSON object, no additional text.`;
}
