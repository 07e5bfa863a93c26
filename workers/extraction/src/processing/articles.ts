/**
 * articles.ts: article entity extraction
 *
 * Preprocesses each article, extracts its entities and collects run
 * statistics. Articles are independent: up to `concurrency` are in flight
 * at once, and one failing article never stops the run.
 */

import { articleSchema, type ProcessedArticle } from '@newsner/shared';
import { preprocessText } from '@newsner/entity-rules';
import { EXTRACTION_CONCURRENCY, MIN_TEXT_LENGTH } from '../config';
import type { EntityExtractor } from '../extractor';
import { workerLogger } from '../utils/logger';

const log = workerLogger('articles');

export interface ArticleStats {
  totalArticles: number;
  processedArticles: number;
  skippedArticles: number;
  totalPersons: number;
  totalOrganisations: number;
  totalLocations: number;
  processingTimeMs: number;
}

export interface ProcessArticlesOptions {
  minTextLength?: number;
  concurrency?: number;
}

export interface ProcessArticlesResult {
  /** Processed articles, in input order. */
  articles: ProcessedArticle[];
  stats: ArticleStats;
}

type ArticleOutcome =
  | { status: 'processed'; article: ProcessedArticle }
  | { status: 'skipped'; reason: string; issues?: string[] };

async function processArticle(
  raw: unknown,
  extractor: EntityExtractor,
  minTextLength: number,
): Promise<ArticleOutcome> {
  const parsed = articleSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    return { status: 'skipped', reason: 'invalid article', issues };
  }

  const article = parsed.data;
  if (!article.text) {
    return { status: 'skipped', reason: 'no text' };
  }

  const text = preprocessText(article.text);
  if (text.length < minTextLength) {
    return { status: 'skipped', reason: 'text too short' };
  }

  const { entities } = await extractor.extractFromText(text);

  return {
    status: 'processed',
    article: { ...article, text, extractedEntities: entities },
  };
}

export async function processArticles(
  articles: readonly unknown[],
  extractor: EntityExtractor,
  options: ProcessArticlesOptions = {},
): Promise<ProcessArticlesResult> {
  const minTextLength = options.minTextLength ?? MIN_TEXT_LENGTH;
  const concurrency = Math.max(1, options.concurrency ?? EXTRACTION_CONCURRENCY);
  const startedAt = Date.now();

  log.info({ count: articles.length, concurrency }, 'Starting entity extraction');

  const outcomes: ArticleOutcome[] = [];
  let next = 0;

  async function settle(index: number): Promise<ArticleOutcome> {
    try {
      return await processArticle(articles[index], extractor, minTextLength);
    } catch (err) {
      log.error({ err, index }, 'Article extraction failed');
      return { status: 'skipped', reason: 'extraction failed' };
    }
  }

  // Each lane pulls the next unclaimed article until none remain.
  async function lane(): Promise<void> {
    while (next < articles.length) {
      const index = next++;
      outcomes[index] = await settle(index);
    }
  }

  await Promise.all(
    Array.from({ length: Math.min(concurrency, articles.length) }, () => lane()),
  );

  const stats: ArticleStats = {
    totalArticles: articles.length,
    processedArticles: 0,
    skippedArticles: 0,
    totalPersons: 0,
    totalOrganisations: 0,
    totalLocations: 0,
    processingTimeMs: 0,
  };
  const processed: ProcessedArticle[] = [];

  outcomes.forEach((outcome, index) => {
    if (outcome.status === 'skipped') {
      stats.skippedArticles++;
      log.info({ index, reason: outcome.reason, issues: outcome.issues }, 'Article skipped');
      return;
    }

    const { extractedEntities } = outcome.article;
    stats.processedArticles++;
    stats.totalPersons += extractedEntities.persons.length;
    stats.totalOrganisations += extractedEntities.organisations.length;
    stats.totalLocations += extractedEntities.locations.length;
    processed.push(outcome.article);
  });

  stats.processingTimeMs = Date.now() - startedAt;

  log.info(stats, 'Entity extraction complete');
  return { articles: processed, stats };
}
