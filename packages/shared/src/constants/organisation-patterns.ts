/**
 * Organisation name cleanup patterns, tried in priority order.
 * First match wins, so order matters.
 *
 * Group 1 is the display name. Group 2, when present, is a gloss that may be
 * appended in parentheses.
 */
export const ORGANISATION_NAME_PATTERNS: readonly RegExp[] = [
  // "Name" (gloss) trailing text
  /^"([^"]+)"\s*(?:\([^)]+\))?\s*(.*)/,
  // Name (ABBR)
  /^([^(]+)\s*\(([^)]+)\)/,
  // ABBR - Full name
  /^(\b[A-Z]+\b[+-]?)\s*[-–]\s*(.+)/,
  // "Name"
  /^"([^"]+)"/,
];

/** Glosses must be longer than this to be kept. */
export const MIN_GLOSS_LENGTH = 3;

/** Glosses starting with this (lowercased) are dropped. */
export const EXCLUDED_GLOSS_PREFIX = 'bey';

/**
 * Legal-form endings (MMC, ASC, MQ, İK) that always mark a company,
 * whatever the gazetteer says. Matched against the lowercased surface text.
 */
export const LEGAL_FORM_SUFFIXES: readonly string[] = [' mmc', ' asc', ' mq', ' ik'];
