import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import type { ZodType } from 'zod';
import {
  labelMappingSchema,
  gazetteerSchema,
  type LexiconConfig,
} from '@newsner/shared';
import { createLexicon, type Lexicon } from '@newsner/entity-rules';

// ── Lexicon files ────────────────────────────────────────────────────────────

const CONFIG_DIR = fileURLToPath(new URL('../config/', import.meta.url));

export interface LexiconPaths {
  labels: string;
  locationTypes: string;
  organisationTypes: string;
}

export const LEXICON_PATHS: LexiconPaths = {
  labels: process.env.LABELS_PATH ?? join(CONFIG_DIR, 'label_mapping.json'),
  locationTypes: process.env.TYPES_LOC_PATH ?? join(CONFIG_DIR, 'types_city_country.json'),
  organisationTypes: process.env.ORGS_TYPES_PATH ?? join(CONFIG_DIR, 'types_org.json'),
};

// ── Worker settings ──────────────────────────────────────────────────────────

export const EXTRACTION_CONCURRENCY = Number(process.env.EXTRACTION_CONCURRENCY) || 3;
export const MIN_TEXT_LENGTH = Number(process.env.MIN_TEXT_LENGTH) || 50;
export const LOG_LEVEL = process.env.LOG_LEVEL ?? 'info';

// ── Loading ──────────────────────────────────────────────────────────────────

function readConfigFile<T>(path: string, schema: ZodType<T>): T {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new Error(`Cannot read lexicon file ${path}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Lexicon file ${path} is not valid JSON`, { cause: err });
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Lexicon file ${path} is invalid: ${issues}`);
  }

  return parsed.data;
}

/**
 * Read and validate the three lexicon files. Any missing or malformed file
 * is fatal; there is no empty fallback.
 */
export function loadLexiconConfig(paths: LexiconPaths = LEXICON_PATHS): LexiconConfig {
  return {
    labels: readConfigFile(paths.labels, labelMappingSchema),
    locationTypes: readConfigFile(paths.locationTypes, gazetteerSchema),
    organisationTypes: readConfigFile(paths.organisationTypes, gazetteerSchema),
  };
}

export function loadLexicon(paths: LexiconPaths = LEXICON_PATHS): Lexicon {
  return createLexicon(loadLexiconConfig(paths));
}
