export type { CategoryDefinition, Taxonomy, ScoreVector, PartialScores } from './types';
export {
  createTaxonomy,
  loadTaxonomy,
  loadBuiltinTaxonomy,
  BUILTIN_TAXONOMIES,
  TaxonomyFileSchema,
  type BuiltinTaxonomyName,
  type TaxonomyFile,
} from './taxonomy';
export { scoreOf, zeroScores, buildScores, sanitizeScores, maxScore, rankScores } from './score-vector';
