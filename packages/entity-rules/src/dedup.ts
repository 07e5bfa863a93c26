/**
 * Dedup Gate
 *
 * A candidate duplicates an accepted entry when either name contains the
 * other (case-sensitive). First seen wins; later duplicates are dropped,
 * never merged.
 *
 * O(n) per candidate, O(n²) per document. Per-document entity counts are
 * small; an interval or prefix index would be needed for large inputs.
 */

export function isDuplicateName(candidate: string, accepted: readonly { name: string }[]): boolean {
  return accepted.some(({ name }) => name.includes(candidate) || candidate.includes(name));
}
