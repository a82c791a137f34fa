/**
 * Shared test fixtures: a small three-category taxonomy and summary builders.
 */
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createTaxonomy, type Summary, StructuredSummarySchema, type Taxonomy } from '../src';

export const TEST_TAXONOMY: Taxonomy = createTaxonomy({
  name: 'test',
  categories: [
    {
      id: 'alpha',
      phrases: ['machine learning', 'neural network'],
      description: 'machine learning neural network training model gradient',
    },
    {
      id: 'beta',
      phrases: ['climate', 'ocean'],
      description: 'climate ocean temperature carbon emissions',
    },
    {
      id: 'gamma',
      phrases: ['economics', 'market'],
      description: 'economics market price trade inflation',
    },
  ],
});

export function structured(fields: Record<string, unknown>): Summary {
  return { kind: 'structured', fields: StructuredSummarySchema.parse(fields) };
}

export function createTestDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupTestDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
