export * from './constants/entity-labels';
export * from './constants/morphology';
export * from './constants/organisation-patterns';
export * from './schemas/lexicon';
export * from './schemas/span';
export * from './schemas/article';
export type * from './types/index';
