import * as fs from 'fs';
import { z } from 'zod';
import generalTaxonomy from '../../data/taxonomies/general.json';
import researchTaxonomy from '../../data/taxonomies/research.json';
import { UNCATEGORIZED } from '../constants';
import { PipelineError, errorMessage } from '../errors';
import type { CategoryDefinition, Taxonomy } from './types';

// ============================================================================
// Taxonomy File Schema
// ============================================================================

export const CategoryDefinitionSchema = z.object({
  id: z.string().trim().min(1),
  phrases: z.array(z.string()).min(1),
  description: z.string().trim().min(1),
});

export const TaxonomyFileSchema = z.object({
  name: z.string().trim().min(1).default('custom'),
  categories: z.array(CategoryDefinitionSchema).min(1),
});

export type TaxonomyFile = z.input<typeof TaxonomyFileSchema>;

export const BUILTIN_TAXONOMIES = {
  general: generalTaxonomy,
  research: researchTaxonomy,
} as const;

export type BuiltinTaxonomyName = keyof typeof BUILTIN_TAXONOMIES;

function normalizePhrases(phrases: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of phrases) {
    const phrase = raw.trim().toLowerCase();
    if (phrase.length > 0 && !seen.has(phrase)) {
      seen.add(phrase);
      out.push(phrase);
    }
  }
  return out;
}

/**
 * Validate a taxonomy definition and freeze it.
 * Throws PipelineError('TAXONOMY_INVALID') on malformed input.
 */
export function createTaxonomy(input: unknown): Taxonomy {
  const parsed = TaxonomyFileSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PipelineError(
      'TAXONOMY_INVALID',
      `Invalid taxonomy at ${issue.path.join('.') || '<root>'}: ${issue.message}`
    );
  }

  const seen = new Set<string>();
  const categories: CategoryDefinition[] = [];

  for (const entry of parsed.data.categories) {
    if (entry.id === UNCATEGORIZED) {
      throw new PipelineError('TAXONOMY_INVALID', `"${UNCATEGORIZED}" is reserved and cannot be a category id`);
    }
    if (seen.has(entry.id)) {
      throw new PipelineError('TAXONOMY_INVALID', `Duplicate category id "${entry.id}"`);
    }
    seen.add(entry.id);

    const phrases = normalizePhrases(entry.phrases);
    if (phrases.length === 0) {
      throw new PipelineError('TAXONOMY_INVALID', `Category "${entry.id}" has no usable phrases`);
    }

    categories.push(
      Object.freeze({
        id: entry.id,
        phrases: Object.freeze(phrases),
        description: entry.description,
      })
    );
  }

  return Object.freeze({
    name: parsed.data.name,
    categories: Object.freeze(categories),
    categoryIds: Object.freeze(categories.map((c) => c.id)),
  });
}

/**
 * Load a taxonomy from a JSON file, or the built-in general taxonomy when no path is given.
 */
export function loadTaxonomy(filePath?: string): Taxonomy {
  if (!filePath) {
    return createTaxonomy(BUILTIN_TAXONOMIES.general);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new PipelineError('TAXONOMY_INVALID', `Cannot read taxonomy file ${filePath}: ${errorMessage(error)}`, {
      filePath,
    });
  }
  return createTaxonomy(raw);
}

export function loadBuiltinTaxonomy(name: BuiltinTaxonomyName): Taxonomy {
  return createTaxonomy(BUILTIN_TAXONOMIES[name]);
}
