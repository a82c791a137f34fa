/**
 * Read-only views over a Summary used by filenames, reports and storage.
 */
import { FAILED_SUMMARY_TEXT, type StructuredField, type Summary, stringifyValue } from './types';

/**
 * Field value as display text; undefined when absent, blank, or the summary is not structured.
 */
export function summaryField(summary: Summary, field: StructuredField): string | undefined {
  if (summary.kind !== 'structured') return undefined;
  const value = stringifyValue(summary.fields[field]).trim();
  return value.length > 0 ? value : undefined;
}

export function keyFindings(summary: Summary): Array<[name: string, description: string]> {
  if (summary.kind !== 'structured') return [];
  return Object.entries(summary.fields['Key Findings'] ?? {});
}

/**
 * true for "yes", false for "no", null when unknown.
 */
export function isPredictionModel(summary: Summary): boolean | null {
  const value = summaryField(summary, 'Prediction Model')?.toLowerCase();
  if (value === undefined) return null;
  if (value.startsWith('yes')) return true;
  if (value.startsWith('no')) return false;
  return null;
}

export function publicationYear(summary: Summary): number | null {
  const match = summaryField(summary, 'Year Published')?.match(/\b(\d{4})\b/);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function summaryCategories(summary: Summary): string[] {
  if (summary.kind !== 'structured') return [];
  const value = summary.fields.Categories;
  const items = Array.isArray(value) ? value.map(stringifyValue) : stringifyValue(value).split(',');
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Unstructured text of a summary: the raw model answer, or the failure marker.
 */
export function summaryText(summary: Summary): string {
  switch (summary.kind) {
    case 'structured':
      return summaryField(summary, 'Key Takeaways') ?? '';
    case 'raw':
      return summary.text;
    case 'failed':
      return FAILED_SUMMARY_TEXT;
  }
}

/**
 * Value stored under `structured_summary` in the persisted record.
 */
export function serializeSummary(summary: Summary): Record<string, unknown> | string {
  return summary.kind === 'structured' ? { ...summary.fields } : summaryText(summary);
}
