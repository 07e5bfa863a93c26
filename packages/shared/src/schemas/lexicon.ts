import { z } from 'zod';

const nonEmptyRecord = (value: Record<string, unknown>) => Object.keys(value).length > 0;

// --- Label mapping: raw tagger code -> canonical label ---
export const labelMappingSchema = z
  .record(z.string().min(1))
  .refine(nonEmptyRecord, 'label mapping must not be empty');
export type LabelMapping = z.infer<typeof labelMappingSchema>;

// --- Gazetteer: type name -> known surface forms ---
export const gazetteerSchema = z
  .record(z.array(z.string()))
  .refine(nonEmptyRecord, 'gazetteer must not be empty');
export type GazetteerConfig = z.infer<typeof gazetteerSchema>;

export const lexiconConfigSchema = z.object({
  labels: labelMappingSchema,
  locationTypes: gazetteerSchema,
  organisationTypes: gazetteerSchema,
});
export type LexiconConfig = z.infer<typeof lexiconConfigSchema>;
