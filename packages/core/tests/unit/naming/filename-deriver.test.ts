import { describe, expect, it } from 'vitest';
import { type Summary, deriveFilename, filenameCandidates, parseAuthorList, parseSummaryResponse, sanitizeFilename } from '../../../src';
import { structured } from '../../fixtures';

describe('deriveFilename', () => {
  it('uses the last name and year of a single author', () => {
    expect(deriveFilename(structured({ 'Author(s)': 'David A. Loeffler', 'Year Published': 2019 }), 'doc')).toBe(
      'Loeffler-2019'
    );
  });

  it('uses the first of several "Last, First" authors', () => {
    const summary = structured({ 'Author(s)': 'Smith, John A. and Jones, Mary B.', 'Year Published': 2023 });
    expect(deriveFilename(summary, 'doc')).toBe('Smith-2023');
  });

  it('keeps the original identifier when the author is not specified', () => {
    const summary = structured({ 'Author(s)': 'Not specified', 'Year Published': 2023 });
    expect(deriveFilename(summary, 'research_paper')).toBe('research_paper');
    expect(deriveFilename(structured({ 'Author(s)': 'NOT SPECIFIED' }), 'research_paper')).toBe('research_paper');
  });

  it('omits an empty year', () => {
    expect(deriveFilename(structured({ 'Author(s)': 'Kimberly C. Paul', 'Year Published': '' }), 'doc')).toBe('Paul');
  });

  it('omits sentinel years', () => {
    for (const year of ['null', 'None', 'Not specified']) {
      expect(deriveFilename(structured({ 'Author(s)': 'Ada Marsh', 'Year Published': year }), 'doc')).toBe('Marsh');
    }
    expect(deriveFilename(structured({ 'Author(s)': 'Ada Marsh', 'Year Published': null }), 'doc')).toBe('Marsh');
  });

  it('keeps the original identifier for missing or blank authors', () => {
    expect(deriveFilename(structured({ 'Year Published': 2020 }), 'scan_01')).toBe('scan_01');
    expect(deriveFilename(structured({ 'Author(s)': '   ' }), 'scan_01')).toBe('scan_01');
  });

  it('keeps the original identifier for raw and failed summaries', () => {
    const raw: Summary = { kind: 'raw', text: 'Author: Ada Marsh' };
    const failed: Summary = { kind: 'failed', reason: 'timeout' };
    expect(deriveFilename(raw, 'notes')).toBe('notes');
    expect(deriveFilename(failed, 'notes')).toBe('notes');
  });

  it('strips trailing punctuation from last names', () => {
    expect(deriveFilename(structured({ 'Author(s)': 'Marsh, A.', 'Year Published': 2001 }), 'doc')).toBe('Marsh-2001');
    expect(deriveFilename(structured({ 'Author(s)': 'Ada Marsh.', 'Year Published': 2001 }), 'doc')).toBe('Marsh-2001');
  });

  it('sanitizes unsafe characters in the result', () => {
    expect(deriveFilename(structured({ 'Author(s)': 'Ana Ri/os', 'Year Published': '2020?' }), 'doc')).toBe('Rios-2020');
  });

  it('keeps the original identifier when the first author has no last name', () => {
    expect(deriveFilename(structured({ 'Author(s)': ', Ada and Ben Hale', 'Year Published': 2020 }), 'doc')).toBe('doc');
  });

  it('derives names from loosely typed model answers', () => {
    const answers = [
      '{"Author(s)": "Ada Marsh", "Year Published": 2020, "Key Findings": "Warming is faster"}',
      '{"Author(s)": ["Ada Marsh", "Ben Hale"], "Year Published": 2020}',
      '{"Author(s)": "Ada Marsh", "Year Published": 2020, "Method": ["survey", "regression"]}',
    ];
    for (const answer of answers) {
      expect(deriveFilename(parseSummaryResponse(answer), 'paper_01')).toBe('Marsh-2020');
    }
  });

  it('is deterministic', () => {
    const summary = structured({ 'Author(s)': 'David A. Loeffler', 'Year Published': 2019 });
    expect(deriveFilename(summary, 'doc')).toBe(deriveFilename(summary, 'doc'));
  });
});

describe('parseAuthorList', () => {
  it('returns at most two last names', () => {
    expect(parseAuthorList('Ada Marsh and Ben Hale and Cy Dorn')).toEqual(['Marsh', 'Hale']);
    expect(parseAuthorList('Marsh, Ada')).toEqual(['Marsh']);
  });

  it('keeps an empty slot for a segment without a last name', () => {
    expect(parseAuthorList(', Ada and Ben Hale')).toEqual(['', 'Hale']);
  });
});

describe('filenameCandidates', () => {
  function firstCandidates(base: string, identifier: string, count: number): string[] {
    const out: string[] = [];
    for (const candidate of filenameCandidates(base, identifier)) {
      out.push(candidate);
      if (out.length === count) break;
    }
    return out;
  }

  it('tries the identifier suffix before numbered names', () => {
    expect(firstCandidates('Marsh-2020', 'two', 4)).toEqual([
      'Marsh-2020',
      'Marsh-2020_two',
      'Marsh-2020_2',
      'Marsh-2020_3',
    ]);
  });

  it('skips the identifier suffix when the base already is the identifier', () => {
    expect(firstCandidates('scan_07', 'scan_07', 2)).toEqual(['scan_07', 'scan_07_2']);
  });

  it('shortens the base so the suffix fits', () => {
    const [, second] = firstCandidates('a'.repeat(50), 'paper', 2);
    expect(second).toBe(`${'a'.repeat(44)}_paper`);
  });
});

describe('sanitizeFilename', () => {
  it('replaces whitespace and trims separators', () => {
    expect(sanitizeFilename('  my file . ')).toBe('my_file');
    expect(sanitizeFilename('__x__')).toBe('x');
  });

  it('falls back to unknown and caps the length', () => {
    expect(sanitizeFilename('???')).toBe('unknown');
    expect(sanitizeFilename('a'.repeat(80))).toHaveLength(50);
  });
});
