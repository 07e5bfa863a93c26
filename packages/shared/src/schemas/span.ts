import { z } from 'zod';

const offset = z.number().int().nonnegative();

// --- Span: labelled substring with character offsets ---
export const spanSchema = z.object({
  label: z.string(),
  text: z.string(),
  start: offset,
  end: offset,
});
export type Span = z.infer<typeof spanSchema>;

// Output of a token-classification pipeline with grouped entities.
const pipelineSpanSchema = z
  .object({
    entity_group: z.string(),
    word: z.string(),
    start: offset,
    end: offset,
    score: z.number().optional(),
  })
  .transform(
    ({ entity_group, word, start, end }): Span => ({ label: entity_group, text: word, start, end }),
  );

// --- Raw tagger item, in either shape ---
export const rawSpanSchema = z
  .union([spanSchema, pipelineSpanSchema])
  .refine((span: Span) => span.start <= span.end, 'start must not exceed end');
