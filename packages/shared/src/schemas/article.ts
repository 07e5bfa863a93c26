import { z } from 'zod';

// --- News article as handed to the extraction worker ---
// Only `text` decides whether an article is processed. Metadata comes from
// the article store as-is (dates may be Date objects or epoch numbers) and
// is carried through untouched, unknown keys included.
export const articleSchema = z
  .object({
    id: z.unknown(),
    source: z.unknown(),
    url: z.unknown(),
    title: z.unknown(),
    author: z.unknown(),
    parseDate: z.unknown(),
    articleDate: z.unknown(),
    text: z.string().nullish(),
    section: z.unknown(),
    tags: z.unknown(),
  })
  .passthrough();
export type Article = z.infer<typeof articleSchema>;
