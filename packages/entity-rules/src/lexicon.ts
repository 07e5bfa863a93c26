/**
 * Lexicon
 *
 * The three lookup tables every resolver reads: label mapping, location
 * gazetteer and organisation gazetteer. Built once from validated config and
 * frozen; safe to share between any number of concurrent documents.
 */

import type { GazetteerConfig, LexiconConfig } from '@newsner/shared';

export interface GazetteerEntry {
  readonly type: string;
  readonly forms: ReadonlySet<string>;
}

/** Gazetteer types in config order. Lookups stop at the first match. */
export type Gazetteer = readonly GazetteerEntry[];

export interface Lexicon {
  readonly labels: ReadonlyMap<string, string>;
  /** Exact, case-sensitive forms. */
  readonly locationTypes: Gazetteer;
  /** Lowercased forms; lookups are case-insensitive. */
  readonly organisationTypes: Gazetteer;
}

export function createLexicon(config: LexiconConfig): Lexicon {
  return Object.freeze({
    labels: new Map(Object.entries(config.labels)),
    locationTypes: buildGazetteer(config.locationTypes, (form) => form),
    organisationTypes: buildGazetteer(config.organisationTypes, (form) => form.toLowerCase()),
  });
}

function buildGazetteer(config: GazetteerConfig, fold: (form: string) => string): Gazetteer {
  return Object.freeze(
    Object.entries(config).map(([type, forms]) =>
      Object.freeze({ type, forms: new Set(forms.map(fold)) }),
    ),
  );
}

/** First gazetteer type whose forms contain `form`. */
export function lookupType(gazetteer: Gazetteer, form: string): string | undefined {
  return gazetteer.find((entry) => entry.forms.has(form))?.type;
}
