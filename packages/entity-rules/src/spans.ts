/**
 * Span Normalization
 *
 * Validates raw tagger output and rewrites label codes to canonical labels.
 * Must run before any resolver partitions spans by label.
 */

import { rawSpanSchema, type EntityLabel, type IndexedSpan } from '@newsner/shared';
import type { Lexicon } from './lexicon';

export interface NormalizedSpans {
  spans: IndexedSpan[];
  /** Raw items that were not valid spans and were dropped. */
  skipped: number;
}

/**
 * `LABEL_3` -> mapping["3"]. Codes missing from the mapping keep the raw
 * label verbatim.
 */
export function normalizeLabel(rawLabel: string, labels: ReadonlyMap<string, string>): string {
  const segments = rawLabel.split('_');
  const code = segments[segments.length - 1];
  return labels.get(code) ?? rawLabel;
}

/**
 * Each span keeps its position in the raw list as `index`, so dropping a
 * malformed item does not pull its neighbours closer together.
 */
export function normalizeSpans(rawSpans: readonly unknown[], lexicon: Lexicon): NormalizedSpans {
  const spans: IndexedSpan[] = [];
  let skipped = 0;

  rawSpans.forEach((raw, index) => {
    const parsed = rawSpanSchema.safeParse(raw);
    if (!parsed.success) {
      skipped++;
      return;
    }

    spans.push({
      ...parsed.data,
      label: normalizeLabel(parsed.data.label, lexicon.labels),
      index,
    });
  });

  return { spans, skipped };
}

export function spansWithLabel(spans: readonly IndexedSpan[], label: EntityLabel): IndexedSpan[] {
  return spans.filter((span) => span.label === label);
}
