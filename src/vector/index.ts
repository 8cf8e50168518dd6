export * from './types';
export { create } from './vector-index';
export { cosineSimilarity, compareHits } from './similarity';
