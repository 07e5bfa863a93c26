import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { lookupType } from '@newsner/entity-rules';
import { LEXICON_PATHS, loadLexiconConfig, loadLexicon } from '../config';

let dir: string;

beforeAll(() => {
  dir = mkdtempSync(join(tmpdir(), 'lexicon-'));
});

afterAll(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeFixture(name: string, content: string): string {
  const path = join(dir, name);
  writeFileSync(path, content, 'utf-8');
  return path;
}

describe('loadLexiconConfig', () => {
  it('loads the bundled lexicon files', () => {
    const config = loadLexiconConfig();

    expect(config.labels['1']).toBe('PERSON');
    expect(config.labels['23']).toBe('POSITION');
    expect(Object.keys(config.locationTypes)).toEqual(['CITY', 'REGION', 'COUNTRY']);
    expect(config.organisationTypes.BANK).toContain('kapital bank');
  });

  it('fails on a missing file', () => {
    const missing = join(dir, 'missing.json');
    expect(() => loadLexiconConfig({ ...LEXICON_PATHS, labels: missing })).toThrow(
      `Cannot read lexicon file ${missing}`,
    );
  });

  it('fails on invalid JSON', () => {
    const path = writeFixture('broken.json', '{"CITY": [');
    expect(() => loadLexiconConfig({ ...LEXICON_PATHS, locationTypes: path })).toThrow(
      `Lexicon file ${path} is not valid JSON`,
    );
  });

  it('fails on an empty gazetteer', () => {
    const path = writeFixture('empty.json', '{}');
    expect(() => loadLexiconConfig({ ...LEXICON_PATHS, organisationTypes: path })).toThrow(
      'is invalid: (root): gazetteer must not be empty',
    );
  });

  it('fails when a gazetteer type is not a list', () => {
    const path = writeFixture('scalar.json', '{"CITY": "Bakı"}');
    expect(() => loadLexiconConfig({ ...LEXICON_PATHS, locationTypes: path })).toThrow(
      'CITY: Expected array, received string',
    );
  });
});

describe('loadLexicon', () => {
  it('builds a lexicon from the bundled files', () => {
    const lexicon = loadLexicon();

    expect(lexicon.labels.get('14')).toBe('GPE');
    expect(lookupType(lexicon.locationTypes, 'Bakı')).toBe('CITY');
    expect(lookupType(lexicon.organisationTypes, 'milli məclis')).toBe('GOVERNMENT');
  });
});
