import type { Span } from '../schemas/span';
import type { Article } from '../schemas/article';

/** A normalized span that remembers where it sat in the tagger output. */
export interface IndexedSpan extends Span {
  index: number;
}

export interface Mention {
  startChar: number;
  endChar: number;
}

export interface PersonMention {
  name: string;
  originalName: string;
  position: string;
  mention: Mention;
}

export interface LocationMention {
  name: string;
  type: string;
  mention: Mention;
}

export interface OrganisationMention {
  name: string;
  type: string;
  mention: Mention;
}

export interface ExtractedEntities {
  persons: PersonMention[];
  organisations: OrganisationMention[];
  locations: LocationMention[];
}

export interface ProcessedArticle extends Article {
  text: string;
  extractedEntities: ExtractedEntities;
}
