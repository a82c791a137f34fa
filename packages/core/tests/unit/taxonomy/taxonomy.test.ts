import * as fs from 'fs';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { PipelineError, createTaxonomy, loadBuiltinTaxonomy, loadTaxonomy } from '../../../src';
import { cleanupTestDir, createTestDir } from '../../fixtures';

function expectTaxonomyError(fn: () => unknown, message: string): void {
  try {
    fn();
  } catch (error) {
    expect(error).toBeInstanceOf(PipelineError);
    if (error instanceof PipelineError) {
      expect(error.category).toBe('TAXONOMY_INVALID');
      expect(error.message).toBe(message);
    }
    return;
  }
  throw new Error('expected a TAXONOMY_INVALID error');
}

describe('createTaxonomy', () => {
  it('normalizes phrases to trimmed, lowercase, de-duplicated lists', () => {
    const taxonomy = createTaxonomy({
      name: 'demo',
      categories: [
        { id: 'ml', phrases: ['  Machine Learning ', 'machine learning', 'Neural Network', ''], description: 'models' },
      ],
    });

    expect(taxonomy.name).toBe('demo');
    expect(taxonomy.categoryIds).toEqual(['ml']);
    expect(taxonomy.categories[0].phrases).toEqual(['machine learning', 'neural network']);
  });

  it('keeps declaration order', () => {
    const taxonomy = createTaxonomy({
      categories: [
        { id: 'zeta', phrases: ['z'], description: 'z' },
        { id: 'alpha', phrases: ['a'], description: 'a' },
      ],
    });
    expect(taxonomy.name).toBe('custom');
    expect(taxonomy.categoryIds).toEqual(['zeta', 'alpha']);
  });

  it('returns a frozen structure', () => {
    const taxonomy = createTaxonomy({ categories: [{ id: 'a', phrases: ['x'], description: 'x' }] });
    expect(Object.isFrozen(taxonomy)).toBe(true);
    expect(Object.isFrozen(taxonomy.categories)).toBe(true);
    expect(Object.isFrozen(taxonomy.categories[0].phrases)).toBe(true);
  });

  it('rejects the reserved uncategorized id', () => {
    expectTaxonomyError(
      () => createTaxonomy({ categories: [{ id: 'uncategorized', phrases: ['x'], description: 'x' }] }),
      '"uncategorized" is reserved and cannot be a category id'
    );
  });

  it('rejects duplicate ids', () => {
    expectTaxonomyError(
      () =>
        createTaxonomy({
          categories: [
            { id: 'a', phrases: ['x'], description: 'x' },
            { id: 'a', phrases: ['y'], description: 'y' },
          ],
        }),
      'Duplicate category id "a"'
    );
  });

  it('rejects a category whose phrases are all blank', () => {
    expectTaxonomyError(
      () => createTaxonomy({ categories: [{ id: 'a', phrases: ['  '], description: 'x' }] }),
      'Category "a" has no usable phrases'
    );
  });

  it('rejects an empty category list', () => {
    expect(() => createTaxonomy({ categories: [] })).toThrow(PipelineError);
  });
});

describe('loadTaxonomy', () => {
  let testDir: string;

  beforeAll(() => {
    testDir = createTestDir('taxonomy-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  it('falls back to the built-in general taxonomy', () => {
    const taxonomy = loadTaxonomy();
    expect(taxonomy.name).toBe('general');
    expect(taxonomy.categoryIds).toContain('business');
    expect(taxonomy.categoryIds).toContain('technology');
  });

  it('reads a taxonomy file', () => {
    const filePath = path.join(testDir, 'custom.json');
    fs.writeFileSync(
      filePath,
      JSON.stringify({ name: 'lab', categories: [{ id: 'optics', phrases: ['Laser'], description: 'laser light' }] })
    );

    const taxonomy = loadTaxonomy(filePath);
    expect(taxonomy.name).toBe('lab');
    expect(taxonomy.categories[0].phrases).toEqual(['laser']);
  });

  it('reports unreadable files as invalid taxonomies', () => {
    const filePath = path.join(testDir, 'broken.json');
    fs.writeFileSync(filePath, '{ not json');
    expect(() => loadTaxonomy(filePath)).toThrow(/Cannot read taxonomy file/);
  });

  it('loads the research taxonomy by name', () => {
    const taxonomy = loadBuiltinTaxonomy('research');
    expect(taxonomy.name).toBe('research');
    expect(taxonomy.categoryIds.length).toBeGreaterThan(0);
  });
});
