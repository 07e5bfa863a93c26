/**
 * Extraction Worker
 *
 * Wires a tagger to the resolution rules: load the lexicon once, then
 * extract entities from any number of articles with it.
 */

export {
  LEXICON_PATHS,
  EXTRACTION_CONCURRENCY,
  MIN_TEXT_LENGTH,
  loadLexiconConfig,
  loadLexicon,
} from './config';
export type { LexiconPaths } from './config';

export { logger, workerLogger } from './utils/logger';

export type { SpanTagger } from './tagger';

export { createEntityExtractor } from './extractor';
export type { EntityExtractor } from './extractor';

export { processArticles } from './processing/articles';
export type {
  ArticleStats,
  ProcessArticlesOptions,
  ProcessArticlesResult,
} from './processing/articles';
