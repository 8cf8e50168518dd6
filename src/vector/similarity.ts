import { VectorHit } from './types';

/**
 * Cosine similarity; zero when either vector has no magnitude.
 */
export const cosineSimilarity = (a: readonly number[], b: readonly number[]): number => {
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) {
        return 0;
    }
    return dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

/**
 * Higher score first. Scores within `epsilon` of each other count as equal
 * and fall back to the more recent `createdAt`, then the smaller id.
 */
export const compareHits = (epsilon: number) => (a: VectorHit, b: VectorHit): number => {
    if (Math.abs(a.score - b.score) > epsilon) {
        return b.score - a.score;
    }
    if (a.metadata.createdAt !== b.metadata.createdAt) {
        return a.metadata.createdAt < b.metadata.createdAt ? 1 : -1;
    }
    if (a.insightId === b.insightId) {
        return 0;
    }
    return a.insightId < b.insightId ? -1 : 1;
};
