import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseManager, LATEST_SCHEMA_VERSION, type NewDocument, type Summary } from '../../../src';
import { structured } from '../../fixtures';

function newDocument(overrides: Partial<NewDocument> = {}): NewDocument {
  return {
    sourceFile: 'tides.pdf',
    processedAt: '2024-03-01T10:00:00.000Z',
    metadata: { title: 'Tides', filename: 'tides.pdf', filepath: '/papers/tides.pdf', pages: 12 },
    summary: structured({
      Title: 'Tidal Mixing in Shelf Seas',
      'Author(s)': 'Marsh, Ada and Hale, Ben',
      'Year Published': '2019',
      Journal: 'Journal of Coastal Studies',
      Categories: 'oceanography, physics',
      'Key Findings': { Mixing: 'Stronger at spring tides' },
      'Prediction Model': 'No',
      'Key Takeaways': 'Tides drive mixing.',
    }),
    keywords: ['tides', 'mixing'],
    primaryCategory: 'beta',
    categoryScores: { alpha: 0.1, beta: 0.712345, gamma: 0 },
    wordCount: 5400,
    ...overrides,
  };
}

describe('DatabaseManager', () => {
  let db: DatabaseManager;

  beforeEach(() => {
    db = new DatabaseManager(':memory:');
  });

  afterEach(async () => {
    await db.close();
  });

  it('is at the latest schema version', () => {
    expect(LATEST_SCHEMA_VERSION).toBe(2);
  });

  it('stores a document with its keywords, scores and findings', async () => {
    const id = await db.insertDocument(newDocument());
    const stored = await db.getDocumentById(id);

    expect(stored).toMatchObject({
      id,
      source_file: 'tides.pdf',
      pdf_title: 'Tides',
      pdf_pages: 12,
      title: 'Tidal Mixing in Shelf Seas',
      authors: 'Marsh, Ada and Hale, Ben',
      year_published: 2019,
      journal: 'Journal of Coastal Studies',
      prediction_model: false,
      key_takeaways: 'Tides drive mixing.',
      word_count: 5400,
      primary_category: 'beta',
      keywords: ['tides', 'mixing'],
      category_scores: { alpha: 0.1, beta: 0.7123, gamma: 0 },
      key_findings: [{ name: 'Mixing', description: 'Stronger at spring tides' }],
    });
  });

  it('stores the failure marker for unstructured summaries', async () => {
    const failed: Summary = { kind: 'failed', reason: 'timeout' };
    const id = await db.insertDocument(newDocument({ summary: failed }));
    const stored = await db.getDocumentById(id);

    expect(stored?.title).toBeNull();
    expect(stored?.prediction_model).toBeNull();
    expect(stored?.key_takeaways).toBe('Failed to generate summary');
  });

  it('returns undefined for unknown ids', async () => {
    expect(await db.getDocumentById(404)).toBeUndefined();
  });

  describe('searchDocuments', () => {
    beforeEach(async () => {
      await db.insertDocument(newDocument());
      await db.insertDocument(
        newDocument({
          sourceFile: 'markets.pdf',
          processedAt: '2024-03-02T10:00:00.000Z',
          summary: structured({
            Title: 'Price Shocks',
            'Author(s)': 'Dorn, Cy',
            'Year Published': 2021,
            Journal: 'Economic Letters',
            'Key Takeaways': 'Markets adjust slowly.',
          }),
          keywords: ['prices'],
          primaryCategory: 'gamma',
        })
      );
    });

    it('lists the most recent first', async () => {
      const rows = await db.searchDocuments();
      expect(rows.map((row) => row.source_file)).toEqual(['markets.pdf', 'tides.pdf']);
      expect(rows[1].keywords).toEqual(['mixing', 'tides']);
    });

    it('filters by text, category, author, journal and year', async () => {
      expect((await db.searchDocuments({ query: 'slowly' })).map((r) => r.source_file)).toEqual(['markets.pdf']);
      expect((await db.searchDocuments({ category: 'beta' })).map((r) => r.source_file)).toEqual(['tides.pdf']);
      expect((await db.searchDocuments({ author: 'hale' })).map((r) => r.source_file)).toEqual(['tides.pdf']);
      expect((await db.searchDocuments({ journal: 'Economic' })).map((r) => r.source_file)).toEqual(['markets.pdf']);
      expect((await db.searchDocuments({ yearFrom: 2019, yearTo: 2019 })).map((r) => r.source_file)).toEqual([
        'tides.pdf',
      ]);
      expect(await db.searchDocuments({ yearFrom: 2022 })).toEqual([]);
    });

    it('honours the limit', async () => {
      expect(await db.searchDocuments({ limit: 1 })).toHaveLength(1);
    });
  });

  it('computes statistics', async () => {
    await db.insertDocument(newDocument());
    await db.insertDocument(newDocument({ sourceFile: 'b.pdf' }));
    await db.insertDocument(
      newDocument({
        sourceFile: 'c.pdf',
        primaryCategory: 'uncategorized',
        summary: structured({ Journal: 'Not specified', 'Year Published': 2020 }),
      })
    );

    expect(await db.getStatistics()).toEqual({
      totalDocuments: 3,
      byCategory: [
        { category: 'beta', count: 2 },
        { category: 'uncategorized', count: 1 },
      ],
      byYear: [
        { year: 2020, count: 1 },
        { year: 2019, count: 2 },
      ],
      topJournals: [{ journal: 'Journal of Coastal Studies', count: 2 }],
    });
  });

  it('fails operations after close', async () => {
    await db.close();
    await expect(db.searchDocuments()).rejects.toThrow('Database not initialized');
  });
});
