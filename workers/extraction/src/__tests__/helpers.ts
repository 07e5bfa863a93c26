import type { SpanTagger } from '../tagger';

/**
 * In-process stand-in for the tagging model: finds each surface form in the
 * text and reports it with the given label code.
 */
export function fakeTagger(entities: [label: string, surface: string][]): SpanTagger {
  return {
    async tag(text: string) {
      return entities.flatMap(([label, surface]) => {
        const start = text.indexOf(surface);
        return start === -1 ? [] : [{ label, text: surface, start, end: start + surface.length }];
      });
    },
  };
}

export const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
