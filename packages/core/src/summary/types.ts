/**
 * Summary - Type Definitions
 *
 * A generated summary is one of three shapes:
 * - structured: the model returned a JSON object (fields normalized, never rejected)
 * - raw: the model answered, but not with usable JSON (the text is kept)
 * - failed: no answer at all (backend unavailable, timeout, empty response)
 *
 * Consumers (filename derivation, reports, storage) switch on `kind`.
 */
import { z } from 'zod';

type Scalar = string | number | boolean;

/**
 * Recognized keys of a structured summary, in prompt order.
 */
const SUMMARY_FIELDS = [
  'Title',
  'Author(s)',
  'Year Published',
  'Journal',
  'BibTeX Citation',
  'Type',
  'Categories',
  'Sample Size',
  'Method',
  'Key Findings',
  'Prediction Model',
  'Key Takeaways',
] as const;

export type StructuredField = Exclude<(typeof SUMMARY_FIELDS)[number], 'Key Findings'>;

// Models return lists and objects where text was asked for. No field rejects the object;
// odd shapes are flattened to text instead.
function toScalar(value: unknown, listSeparator: string): Scalar | null | undefined {
  if (value === null || value === undefined) return value;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value.map(stringifyValue).join(listSeparator);
  return stringifyValue(value);
}

const ScalarField = z.unknown().transform((value) => toScalar(value, ', '));

/** Author lists join with " and " so the first-author split still applies. */
const AuthorField = z.unknown().transform((value) => toScalar(value, ' and '));

const ListOrScalarField = z
  .unknown()
  .transform((value): Scalar | string[] | null | undefined =>
    Array.isArray(value) ? value.map(stringifyValue) : toScalar(value, ', '),
  );

/**
 * Key findings arrive as a name → description mapping, sometimes as a plain list or a single sentence.
 */
const KeyFindingsField = z.unknown().transform((value): Record<string, string> | undefined => {
  if (value === null || value === undefined) return undefined;
  const out: Record<string, string> = {};
  if (Array.isArray(value)) {
    value.forEach((item, index) => {
      out[`Finding ${index + 1}`] = stringifyValue(item);
    });
    return out;
  }
  if (typeof value === 'object') {
    for (const [name, description] of Object.entries(value)) {
      out[name] = stringifyValue(description);
    }
    return out;
  }
  const text = stringifyValue(value).trim();
  return text.length > 0 ? { 'Finding 1': text } : undefined;
});

export const StructuredSummarySchema = z
  .object({
    Title: ScalarField,
    'Author(s)': AuthorField,
    'Year Published': ScalarField,
    Journal: ScalarField,
    'BibTeX Citation': ScalarField,
    Type: ScalarField,
    Categories: ListOrScalarField,
    'Sample Size': ScalarField,
    Method: ScalarField,
    'Key Findings': KeyFindingsField,
    'Prediction Model': ScalarField,
    'Key Takeaways': ListOrScalarField,
  })
  .passthrough();

export type StructuredSummary = z.infer<typeof StructuredSummarySchema>;

export type Summary =
  | { readonly kind: 'structured'; readonly fields: StructuredSummary }
  | { readonly kind: 'raw'; readonly text: string }
  | { readonly kind: 'failed'; readonly reason: string };

export const FAILED_SUMMARY_TEXT = 'Failed to generate summary';

export function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return value.map(stringifyValue).join(', ');
  return JSON.stringify(value);
}
