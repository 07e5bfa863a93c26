/**
 * Azerbaijani morphology tables used by the stem normalizer.
 * Only enough morphology to collapse inflected entity mentions onto one stem.
 */

import suffixRules from '../data/suffix-rules.json';

export interface SuffixRule {
  suffix: string;
  /** The whole word must be strictly longer than this. */
  minLength: number;
}

/**
 * Suffix stripping rules applied in priority order.
 * Longer / more specific suffixes come first. First match wins.
 */
export const SUFFIX_RULES: readonly SuffixRule[] = suffixRules;

export const BACK_VOWELS: ReadonlySet<string> = new Set(['a', 'ı', 'o', 'u']);
export const FRONT_VOWELS: ReadonlySet<string> = new Set(['ə', 'e', 'i', 'ö', 'ü']);

/** Irregular forms mapped straight to their stem. */
export const LEMMA_EXCEPTIONS: ReadonlyMap<string, string> = new Map([
  ['mənimsənilməsində', 'mənimsən'],
  ['mənimsənilməsi', 'mənimsən'],
  ['olunur', 'ol'],
  ['edir', 'et'],
  ['gedir', 'get'],
  ['görür', 'gör'],
  ['deyir', 'de'],
  ['alır', 'al'],
  ['verir', 'ver'],
  ['gəlir', 'gəl'],
  ['oxuyur', 'oxu'],
  ['yazır', 'yaz'],
  ['işləyir', 'işlə'],
  ['demək', 'de'],
  ['görmək', 'gör'],
  ['almaq', 'al'],
]);

/** Words returned untouched. */
export const UNCHANGEABLE_WORDS: ReadonlySet<string> = new Set([
  'var',
  'yox',
  'çox',
  'az',
  'bəli',
  'xeyr',
  'hə',
  'bəlkə',
  'olası',
  'mümkün',
]);
