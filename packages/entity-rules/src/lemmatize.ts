/**
 * Rule-Based Lemmatization
 *
 * Reduces an inflected Azerbaijani word to a stem good enough for matching
 * mentions of the same entity. Suffixes are stripped once, by the first rule
 * that fits and keeps vowel harmony.
 */

import {
  SUFFIX_RULES,
  BACK_VOWELS,
  FRONT_VOWELS,
  LEMMA_EXCEPTIONS,
  UNCHANGEABLE_WORDS,
} from '@newsner/shared';

export function lemmatize(word: string, treatAsName: boolean = false): string {
  if (!word) return word;

  // Names keep their case.
  const form = treatAsName ? word : word.toLowerCase();

  const exception = LEMMA_EXCEPTIONS.get(form);
  if (exception !== undefined) return exception;

  if (UNCHANGEABLE_WORDS.has(form)) return form;

  for (const { suffix, minLength } of SUFFIX_RULES) {
    if (!form.endsWith(suffix) || form.length <= minLength) continue;

    const stem = form.slice(0, -suffix.length);
    if (stem.length >= 2 && isHarmonic(stem, suffix)) {
      return stem;
    }
  }

  return form;
}

/**
 * A suffix fits a stem when none of its vowels belongs to the class
 * opposite the stem's last vowel. Stems without a vowel accept anything.
 */
export function isHarmonic(stem: string, suffix: string): boolean {
  let lastVowel: string | undefined;
  for (let i = stem.length - 1; i >= 0; i--) {
    const char = stem[i];
    if (BACK_VOWELS.has(char) || FRONT_VOWELS.has(char)) {
      lastVowel = char;
      break;
    }
  }

  if (lastVowel === undefined) return true;

  const stemIsBack = BACK_VOWELS.has(lastVowel);

  for (const char of suffix) {
    if (stemIsBack && FRONT_VOWELS.has(char)) return false;
    if (!stemIsBack && BACK_VOWELS.has(char)) return false;
  }

  return true;
}

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

/** Lemmatize every word of a text, joined by single spaces. */
export function lemmatizeText(text: string): string {
  const words = text.match(WORD_PATTERN) ?? [];
  return words.map((word) => lemmatize(word)).join(' ');
}

export function lemmatizeAll(words: string[]): string[] {
  return words.map((word) => lemmatize(word));
}
