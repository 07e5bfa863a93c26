/**
 * Text Preprocessing
 *
 * Applied before tagging so that span offsets index the cleaned text.
 * Typographic quotes become plain quotes, which the organisation
 * patterns rely on.
 */

const REPLACEMENTS: [from: string, to: string][] = [
  ['\n', ' '],
  ['«', '"'],
  ['»', '"'],
  ['“', '"'],
  ['”', '"'],
  ['•', ''],
  ['mln.', 'milyon'],
  ['mlrd.', 'milyard'],
];

export function preprocessText(text: string | null | undefined): string {
  if (!text) return '';

  let result = text;
  for (const [from, to] of REPLACEMENTS) {
    result = result.replaceAll(from, to);
  }

  return result.replace(/\s+/g, ' ').trim();
}
