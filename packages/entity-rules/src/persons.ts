/**
 * Person–Position Linking
 *
 * Attaches each person to the closest title before it in the tagger output
 * ("Prezident İlham Əliyev"). Proximity stands in for syntactic apposition.
 */

import {
  ENTITY_LABELS,
  MAX_POSITION_DISTANCE,
  UNKNOWN_POSITION,
  type IndexedSpan,
  type PersonMention,
} from '@newsner/shared';
import { lemmatize } from './lemmatize';
import { isProperName } from './proper-name';
import { isDuplicateName } from './dedup';
import { spansWithLabel } from './spans';

/** Spans must be in document order. */
export function linkPersonPositions(spans: readonly IndexedSpan[]): PersonMention[] {
  const persons = spansWithLabel(spans, ENTITY_LABELS.PERSON);
  const positions = spansWithLabel(spans, ENTITY_LABELS.POSITION);
  const links: PersonMention[] = [];

  for (const person of persons) {
    const originalName = person.text.trim();
    if (!isProperName(originalName)) continue;

    const name = lemmatize(originalName, true);
    if (isDuplicateName(name, links)) continue;

    let position = UNKNOWN_POSITION;
    let mention = { startChar: person.start, endChar: person.end };

    const title = closestPrecedingPosition(positions, person.index);
    if (title && person.index - title.index <= MAX_POSITION_DISTANCE) {
      position = lemmatize(title.text);
      mention = { startChar: title.start, endChar: title.end };
    }

    links.push({ name, originalName, position, mention });
  }

  return links;
}

export function closestPrecedingPosition(
  positions: readonly IndexedSpan[],
  index: number,
): IndexedSpan | undefined {
  let closest: IndexedSpan | undefined;
  for (const candidate of positions) {
    if (candidate.index < index && (!closest || candidate.index > closest.index)) {
      closest = candidate;
    }
  }
  return closest;
}
