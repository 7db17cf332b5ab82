export type { CategoryTable } from './categories.js';
export {
  buildCategoryTable,
  categorize,
  clampScore,
  thresholdFor,
  CATCH_ALL_CATEGORY,
  DEFAULT_THRESHOLDS,
} from './categories.js';
export { cosineSimilarity } from './similarity.js';
export type { PaperText, ScoreResult } from './scorer.js';
export { buildPaperText, scoreEmbedding, scorePaper, scoreText, NOTES_HEADER } from './scorer.js';
