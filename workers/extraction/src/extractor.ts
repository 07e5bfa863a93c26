/**
 * Entity Extractor
 *
 * Tags one document and resolves its spans against the shared lexicon.
 */

import { resolveEntities, type Lexicon, type ResolutionResult } from '@newsner/entity-rules';
import type { SpanTagger } from './tagger';
import { workerLogger } from './utils/logger';

const log = workerLogger('extractor');

export interface EntityExtractor {
  extractFromText(text: string): Promise<ResolutionResult>;
}

export function createEntityExtractor(tagger: SpanTagger, lexicon: Lexicon): EntityExtractor {
  return {
    async extractFromText(text: string) {
      const rawSpans = await tagger.tag(text);
      const result = resolveEntities(rawSpans, lexicon);

      if (result.skippedSpans > 0) {
        log.warn(
          { skippedSpans: result.skippedSpans, totalSpans: rawSpans.length },
          'Dropped malformed spans from tagger output',
        );
      }

      return result;
    },
  };
}
