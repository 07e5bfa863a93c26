/**
 * Canonical entity labels produced by the label mapping.
 * Resolvers partition normalized spans by these names.
 */

export const ENTITY_LABELS = {
  PERSON: 'PERSON',
  POSITION: 'POSITION',
  LOCATION: 'LOCATION',
  GPE: 'GPE',
  ORGANISATION: 'ORGANISATION',
  NONE: 'O',
} as const;

export type EntityLabel = (typeof ENTITY_LABELS)[keyof typeof ENTITY_LABELS];

export const UNKNOWN_POSITION = 'unknown';
export const DEFAULT_LOCATION_TYPE = 'COUNTRY';
export const DEFAULT_ORGANISATION_TYPE = 'COMPANY';

/**
 * A title is linked to a person only when at most one other span
 * sits between them in the tagger output.
 */
export const MAX_POSITION_DISTANCE = 2;

/**
 * Lowercased words that the tagger often capitalizes but that are never
 * names on their own: pronouns, question words, generic place and
 * institution nouns.
 */
export const NAME_STOP_WORDS: ReadonlySet<string> = new Set([
  'mən',
  'sən',
  'o',
  'biz',
  'siz',
  'onlar',
  'bu',
  'həmin',
  'belə',
  'kim',
  'nə',
  'harada',
  'necə',
  'niyə',
  'nə üçün',
  'azərbaycan',
  'respublika',
  'dövlət',
  'şəhər',
  'rayon',
  'universitet',
  'bank',
  'şirkət',
  'kompaniya',
  'ölkədə',
  'ölkə',
  'şəhərdə',
  'rayonda',
]);
