import type { IndexedSpan } from '@newsner/shared';
import { createLexicon } from '../lexicon';

export const testLexicon = createLexicon({
  labels: {
    '0': 'O',
    '1': 'PERSON',
    '2': 'LOCATION',
    '3': 'ORGANISATION',
    '14': 'GPE',
    '23': 'POSITION',
  },
  locationTypes: {
    CITY: ['Bakı', 'Gəncə'],
    REGION: ['Qarabağ'],
    COUNTRY: ['Türkiyə'],
  },
  organisationTypes: {
    BANK: ['kapital bank'],
    GOVERNMENT: ['Nazirlər Kabineti'],
  },
});

/** Lay labelled words out one space apart, indexed in order. */
export function layout(...items: [label: string, text: string][]): IndexedSpan[] {
  let offset = 0;
  return items.map(([label, text], index) => {
    const start = offset;
    offset += text.length + 1;
    return { label, text, start, end: start + text.length, index };
  });
}
