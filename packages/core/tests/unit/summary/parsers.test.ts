import { describe, expect, it } from 'vitest';
import { extractJsonObject, parseSummaryResponse, stripCodeFences } from '../../../src';

describe('stripCodeFences', () => {
  it('removes json fences', () => {
    expect(stripCodeFences('```json\n{"Title": "A"}\n```')).toBe('{"Title": "A"}');
  });

  it('leaves unfenced text alone', () => {
    expect(stripCodeFences('  plain answer ')).toBe('plain answer');
  });
});

describe('extractJsonObject', () => {
  it('finds the object inside surrounding prose', () => {
    expect(extractJsonObject('Here you go: {"alpha": 0.4} Hope this helps')).toEqual({
      ok: true,
      value: { alpha: 0.4 },
    });
  });

  it('classifies failures', () => {
    expect(extractJsonObject('   ')).toEqual({ ok: false, error: 'empty_response' });
    expect(extractJsonObject('no braces here')).toEqual({ ok: false, error: 'no_json_object' });
    expect(extractJsonObject('{"alpha": }')).toEqual({ ok: false, error: 'invalid_json' });
  });
});

describe('parseSummaryResponse', () => {
  it('parses a structured summary and normalizes key findings', () => {
    const summary = parseSummaryResponse(
      '```json\n' +
        JSON.stringify({
          Title: 'Tidal Mixing',
          'Author(s)': 'Ada Marsh',
          'Year Published': 2021,
          'Key Findings': { Mixing: 'Stronger at spring tides', Depth: 40 },
          'Key Takeaways': 'Tides matter',
        }) +
        '\n```'
    );

    expect(summary.kind).toBe('structured');
    if (summary.kind === 'structured') {
      expect(summary.fields.Title).toBe('Tidal Mixing');
      expect(summary.fields['Year Published']).toBe(2021);
      expect(summary.fields['Key Findings']).toEqual({ Mixing: 'Stronger at spring tides', Depth: '40' });
    }
  });

  it('turns a findings list into numbered findings', () => {
    const summary = parseSummaryResponse('{"Key Findings": ["first", "second"]}');
    expect(summary).toEqual({
      kind: 'structured',
      fields: { 'Key Findings': { 'Finding 1': 'first', 'Finding 2': 'second' } },
    });
  });

  it('keeps extra fields', () => {
    const summary = parseSummaryResponse('{"Title": "T", "Funding": "None"}');
    expect(summary).toEqual({ kind: 'structured', fields: { Title: 'T', Funding: 'None' } });
  });

  it('keeps prose answers as raw text', () => {
    expect(parseSummaryResponse('  The paper studies tides.  ')).toEqual({
      kind: 'raw',
      text: 'The paper studies tides.',
    });
  });

  it('wraps a single key finding sentence', () => {
    expect(
      parseSummaryResponse('{"Author(s)": "Ada Marsh", "Year Published": 2020, "Key Findings": "Warming is faster"}'),
    ).toEqual({
      kind: 'structured',
      fields: {
        'Author(s)': 'Ada Marsh',
        'Year Published': 2020,
        'Key Findings': { 'Finding 1': 'Warming is faster' },
      },
    });
  });

  it('joins an author list with "and"', () => {
    expect(parseSummaryResponse('{"Author(s)": ["Ada Marsh", "Ben Hale"]}')).toEqual({
      kind: 'structured',
      fields: { 'Author(s)': 'Ada Marsh and Ben Hale' },
    });
  });

  it('flattens lists and objects in text fields', () => {
    expect(parseSummaryResponse('{"Method": ["survey", "regression"], "Title": {"nested": true}}')).toEqual({
      kind: 'structured',
      fields: { Method: 'survey, regression', Title: '{"nested":true}' },
    });
  });

  it('marks an empty answer as failed', () => {
    expect(parseSummaryResponse('')).toEqual({ kind: 'failed', reason: 'Empty response from model' });
  });
});
