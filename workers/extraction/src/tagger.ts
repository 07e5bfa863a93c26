/**
 * Entity tagger seam. The model behind it is opaque; its output is validated
 * span by span during normalization, so items are typed as unknown here.
 *
 * Offsets must index the exact text passed to `tag`: preprocess first.
 */
export interface SpanTagger {
  tag(text: string): Promise<readonly unknown[]>;
}
