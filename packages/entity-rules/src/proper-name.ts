/**
 * Proper-Name Filter
 *
 * Heuristic gate in front of every resolver. Rejects text that is unlikely
 * to be a real name; rejection is silent.
 */

import { NAME_STOP_WORDS } from '@newsner/shared';

export function isProperName(text: string): boolean {
  if (!text || text.trim().length < 2) return false;

  const trimmed = text.trim();

  if (!/^\p{Lu}/u.test(trimmed)) return false;
  if (NAME_STOP_WORDS.has(trimmed.toLowerCase())) return false;
  if (/^\p{Nd}+$/u.test(trimmed)) return false;
  if (!/\p{L}/u.test(trimmed)) return false;

  return true;
}
