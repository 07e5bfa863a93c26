/**
 * Document Resolution
 *
 * Runs every resolver over one document's tagger output. Pure and
 * synchronous; documents share nothing but the frozen lexicon.
 */

import { ENTITY_LABELS, type ExtractedEntities, type IndexedSpan } from '@newsner/shared';
import type { Lexicon } from './lexicon';
import { normalizeSpans, spansWithLabel } from './spans';
import { linkPersonPositions } from './persons';
import { classifyLocations } from './locations';
import { classifyOrganisations } from './organisations';

export interface ResolutionResult {
  entities: ExtractedEntities;
  /** Spans tagged as "no entity", for display of un-annotated text. */
  unannotated: IndexedSpan[];
  /** Raw items dropped as malformed. */
  skippedSpans: number;
}

export function resolveEntities(rawSpans: readonly unknown[], lexicon: Lexicon): ResolutionResult {
  const { spans, skipped } = normalizeSpans(rawSpans, lexicon);

  return {
    entities: {
      persons: linkPersonPositions(spans),
      organisations: classifyOrganisations(spans, lexicon.organisationTypes),
      locations: classifyLocations(spans, lexicon.locationTypes),
    },
    unannotated: spansWithLabel(spans, ENTITY_LABELS.NONE),
    skippedSpans: skipped,
  };
}
