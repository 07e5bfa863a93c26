export { lemmatize, lemmatizeText, lemmatizeAll, isHarmonic } from './lemmatize';
export { isProperName } from './proper-name';

export { createLexicon, lookupType } from './lexicon';
export type { Lexicon, Gazetteer, GazetteerEntry } from './lexicon';

export { normalizeLabel, normalizeSpans, spansWithLabel } from './spans';
export type { NormalizedSpans } from './spans';

export { isDuplicateName } from './dedup';
export { linkPersonPositions, closestPrecedingPosition } from './persons';
export { classifyLocations } from './locations';
export { extractOrganisationName, classifyOrganisationType, classifyOrganisations } from './organisations';

export { resolveEntities } from './resolve';
export type { ResolutionResult } from './resolve';

export { preprocessText } from './preprocess';
