/**
 * Taxonomy - Type Definitions
 *
 * A taxonomy is loaded once at startup and passed by reference into every
 * scoring component. Nothing mutates it afterwards.
 */

export interface CategoryDefinition {
  readonly id: string;
  /** Lowercase lexical phrases, in declaration order. */
  readonly phrases: readonly string[];
  /** Dense bag of domain terms used by the similarity signal. */
  readonly description: string;
}

export interface Taxonomy {
  readonly name: string;
  /** Declaration order is the tie-break order for primary category selection. */
  readonly categories: readonly CategoryDefinition[];
  readonly categoryIds: readonly string[];
}

/**
 * Per-category relevance. Produced by the scoring components, it always holds
 * every category of the taxonomy with a finite, non-negative value.
 */
export type ScoreVector = Readonly<Record<string, number>>;

/**
 * A possibly partial or untrusted score mapping, e.g. from an external model.
 */
export type PartialScores = Readonly<Partial<Record<string, number>>>;
