import { describe, it, expect } from 'vitest';
import { resolveEntities } from '../resolve';
import { testLexicon } from './helpers';

describe('resolveEntities', () => {
  it('resolves a whole document', () => {
    const result = resolveEntities(
      [
        { label: 'LABEL_23', text: 'Prezident', start: 0, end: 9 },
        { label: 'LABEL_1', text: 'İlham Əliyev', start: 10, end: 22 },
        { label: 'LABEL_0', text: 'bu gün', start: 23, end: 29 },
        { entity_group: 'LABEL_14', word: 'Bakı', start: 30, end: 34, score: 0.98 },
        { label: 'LABEL_0', text: 'şəhərində', start: 35, end: 44 },
        { label: 'LABEL_3', text: '"Kapital Bank" ASC', start: 45, end: 63 },
        { label: 'LABEL_3', text: 'Kapital Bank', start: 64, end: 76 },
        { label: 'LABEL_1', text: 'Rəşad' },
      ],
      testLexicon,
    );

    expect(result.entities).toEqual({
      persons: [
        {
          name: 'İlham Əliyev',
          originalName: 'İlham Əliyev',
          position: 'prezident',
          mention: { startChar: 0, endChar: 9 },
        },
      ],
      organisations: [
        { name: 'Kapital Bank', type: 'COMPANY', mention: { startChar: 45, endChar: 63 } },
      ],
      locations: [{ name: 'Bakı', type: 'CITY', mention: { startChar: 30, endChar: 34 } }],
    });
    expect(result.unannotated.map((span) => span.text)).toEqual(['bu gün', 'şəhərində']);
    expect(result.skippedSpans).toBe(1);
  });

  it('counts dropped spans when measuring title distance', () => {
    const result = resolveEntities(
      [
        { label: 'LABEL_23', text: 'Nazir', start: 0, end: 5 },
        { label: 'LABEL_0', start: 6, end: 8 },
        { text: 'gün', start: 9, end: 12 },
        { label: 'LABEL_1', text: 'Rəşad', start: 13, end: 18 },
      ],
      testLexicon,
    );

    expect(result.skippedSpans).toBe(2);
    expect(result.entities.persons).toEqual([
      {
        name: 'Rəşad',
        originalName: 'Rəşad',
        position: 'unknown',
        mention: { startChar: 13, endChar: 18 },
      },
    ]);
  });

  it('links a title across a single dropped span', () => {
    const result = resolveEntities(
      [
        { label: 'LABEL_23', text: 'Nazir', start: 0, end: 5 },
        { label: 'LABEL_0', start: 6, end: 8 },
        { label: 'LABEL_1', text: 'Rəşad', start: 9, end: 14 },
      ],
      testLexicon,
    );

    expect(result.skippedSpans).toBe(1);
    expect(result.entities.persons[0].position).toBe('nazir');
  });

  it('ignores labels missing from the mapping', () => {
    const result = resolveEntities(
      [{ label: 'LABEL_42', text: 'Rəşad', start: 0, end: 5 }],
      testLexicon,
    );
    expect(result.entities.persons).toEqual([]);
  });

  it('returns empty lists for an empty document', () => {
    expect(resolveEntities([], testLexicon)).toEqual({
      entities: { persons: [], organisations: [], locations: [] },
      unannotated: [],
      skippedSpans: 0,
    });
  });
});
