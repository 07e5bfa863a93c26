/**
 * Organisation Extraction & Classification
 *
 * Strips quoting and abbreviation noise from organisation mentions, drops
 * repeats and types the rest from the organisation gazetteer.
 */

import {
  ENTITY_LABELS,
  DEFAULT_ORGANISATION_TYPE,
  ORGANISATION_NAME_PATTERNS,
  MIN_GLOSS_LENGTH,
  EXCLUDED_GLOSS_PREFIX,
  LEGAL_FORM_SUFFIXES,
  type IndexedSpan,
  type OrganisationMention,
} from '@newsner/shared';
import { lookupType, type Gazetteer } from './lexicon';
import { isProperName } from './proper-name';
import { isDuplicateName } from './dedup';
import { spansWithLabel } from './spans';

export function extractOrganisationName(text: string): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();

  for (const pattern of ORGANISATION_NAME_PATTERNS) {
    const match = pattern.exec(collapsed);
    if (!match) continue;

    const name = match[1].trim();
    const gloss = match[2]?.trim();
    if (
      gloss &&
      gloss.length > MIN_GLOSS_LENGTH &&
      !gloss.toLowerCase().startsWith(EXCLUDED_GLOSS_PREFIX)
    ) {
      return `${name} (${gloss})`;
    }
    return name;
  }

  return collapsed.replaceAll('"', '').trim();
}

/**
 * Gazetteer match on the lowercased surface text; a legal-form ending
 * overrides it back to a company.
 */
export function classifyOrganisationType(surfaceText: string, gazetteer: Gazetteer): string {
  const lower = surfaceText.toLowerCase();

  if (LEGAL_FORM_SUFFIXES.some((suffix) => lower.endsWith(suffix))) {
    return DEFAULT_ORGANISATION_TYPE;
  }

  return lookupType(gazetteer, lower) ?? DEFAULT_ORGANISATION_TYPE;
}

export function classifyOrganisations(
  spans: readonly IndexedSpan[],
  gazetteer: Gazetteer,
): OrganisationMention[] {
  const organisations: OrganisationMention[] = [];

  for (const span of spansWithLabel(spans, ENTITY_LABELS.ORGANISATION)) {
    const surfaceText = span.text.trim();
    const name = extractOrganisationName(surfaceText);

    if (!isProperName(name)) continue;
    if (isDuplicateName(name, organisations)) continue;

    organisations.push({
      name,
      type: classifyOrganisationType(surfaceText, gazetteer),
      mention: { startChar: span.start, endChar: span.end },
    });
  }

  return organisations;
}
