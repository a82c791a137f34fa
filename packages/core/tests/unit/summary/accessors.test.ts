import { describe, expect, expectTypeOf, it } from 'vitest';
import {
  FAILED_SUMMARY_TEXT,
  type StructuredField,
  type Summary,
  isPredictionModel,
  keyFindings,
  publicationYear,
  serializeSummary,
  stringifyValue,
  summaryCategories,
  summaryField,
  summaryText,
} from '../../../src';
import { structured } from '../../fixtures';

const RAW: Summary = { kind: 'raw', text: 'free text' };
const FAILED: Summary = { kind: 'failed', reason: 'timeout' };

describe('stringifyValue', () => {
  it('renders each value type', () => {
    expect(stringifyValue(null)).toBe('');
    expect(stringifyValue(undefined)).toBe('');
    expect(stringifyValue('x')).toBe('x');
    expect(stringifyValue(2020)).toBe('2020');
    expect(stringifyValue(false)).toBe('false');
    expect(stringifyValue(['a', 1])).toBe('a, 1');
    expect(stringifyValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('summaryField', () => {
  it('trims values and hides blanks', () => {
    const summary = structured({ Title: '  Tides  ', Journal: '   ', 'Year Published': 2019 });
    expect(summaryField(summary, 'Title')).toBe('Tides');
    expect(summaryField(summary, 'Journal')).toBeUndefined();
    expect(summaryField(summary, 'Year Published')).toBe('2019');
    expect(summaryField(summary, 'Method')).toBeUndefined();
  });

  it('is undefined for non-structured summaries', () => {
    expect(summaryField(RAW, 'Title')).toBeUndefined();
  });
});

describe('derived values', () => {
  it('reads prediction model answers', () => {
    expect(isPredictionModel(structured({ 'Prediction Model': 'Yes, a logistic model' }))).toBe(true);
    expect(isPredictionModel(structured({ 'Prediction Model': 'No' }))).toBe(false);
    expect(isPredictionModel(structured({ 'Prediction Model': 'Unclear' }))).toBeNull();
    expect(isPredictionModel(FAILED)).toBeNull();
  });

  it('finds a four-digit year', () => {
    expect(publicationYear(structured({ 'Year Published': 'Published in 2018 (online)' }))).toBe(2018);
    expect(publicationYear(structured({ 'Year Published': 'Not specified' }))).toBeNull();
  });

  it('splits categories from lists or comma text', () => {
    expect(summaryCategories(structured({ Categories: ['ecology', ' oceans '] }))).toEqual(['ecology', 'oceans']);
    expect(summaryCategories(structured({ Categories: 'ecology, , oceans' }))).toEqual(['ecology', 'oceans']);
    expect(summaryCategories(RAW)).toEqual([]);
  });

  it('lists key findings', () => {
    expect(keyFindings(structured({ 'Key Findings': { A: 'one' } }))).toEqual([['A', 'one']]);
    expect(keyFindings(RAW)).toEqual([]);
  });
});

describe('summaryText / serializeSummary', () => {
  it('uses key takeaways, raw text or the failure marker', () => {
    expect(summaryText(structured({ 'Key Takeaways': 'Tides matter' }))).toBe('Tides matter');
    expect(summaryText(structured({}))).toBe('');
    expect(summaryText(RAW)).toBe('free text');
    expect(summaryText(FAILED)).toBe(FAILED_SUMMARY_TEXT);
  });

  it('serializes structured summaries as objects and the rest as text', () => {
    expect(serializeSummary(structured({ Title: 'T' }))).toEqual({ Title: 'T' });
    expect(serializeSummary(FAILED)).toBe('Failed to generate summary');
  });
});

describe('StructuredField', () => {
  it('names only the recognized text fields', () => {
    expectTypeOf<StructuredField>().toEqualTypeOf<
      | 'Title'
      | 'Author(s)'
      | 'Year Published'
      | 'Journal'
      | 'BibTeX Citation'
      | 'Type'
      | 'Categories'
      | 'Sample Size'
      | 'Method'
      | 'Prediction Model'
      | 'Key Takeaways'
    >();
  });
});
