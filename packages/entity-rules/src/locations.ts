/**
 * Location Classification
 *
 * Types LOCATION and GPE mentions by exact (case-sensitive) gazetteer
 * membership. Locations are not deduplicated.
 */

import {
  ENTITY_LABELS,
  DEFAULT_LOCATION_TYPE,
  type IndexedSpan,
  type LocationMention,
} from '@newsner/shared';
import { lookupType, type Gazetteer } from './lexicon';
import { isProperName } from './proper-name';
import { spansWithLabel } from './spans';

/** All LOCATION spans first, then all GPE spans, each in document order. */
export function classifyLocations(
  spans: readonly IndexedSpan[],
  gazetteer: Gazetteer,
): LocationMention[] {
  const candidates = [
    ...spansWithLabel(spans, ENTITY_LABELS.LOCATION),
    ...spansWithLabel(spans, ENTITY_LABELS.GPE),
  ];
  const locations: LocationMention[] = [];

  for (const span of candidates) {
    const name = span.text.replaceAll('"', '').trim();
    if (!isProperName(name)) continue;

    locations.push({
      name,
      type: lookupType(gazetteer, name) ?? DEFAULT_LOCATION_TYPE,
      mention: { startChar: span.start, endChar: span.end },
    });
  }

  return locations;
}
