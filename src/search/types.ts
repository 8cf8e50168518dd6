/**
 * Search Types
 */

import { EmbeddingGateway } from '../embedding';
import { GatewayInstance } from '../generation';
import { InsightStoreInstance } from '../store';
import { VectorHit, VectorIndexInstance } from '../vector';

export interface SearchConfig {
    embeddings: EmbeddingGateway;
    index: VectorIndexInstance;
    store: InsightStoreInstance;
    generation: GatewayInstance;
    defaultResults: number;
    maxContextChars: number;
    temperature?: number;
}

export interface AnswerOptions {
    k?: number;
    preferLocal?: boolean;
}

export interface SearchSource {
    insightId: string;
    title: string;
    createdAt: string;
    score: number;
}

export interface SearchAnswer {
    answerText: string;
    citedInsightIds: string[];
    sources: SearchSource[];
}

export interface SearchStats {
    totalInsights: number;
    searchable: boolean;
}

export interface SearchInstance {
    answer(query: string, options?: AnswerOptions): Promise<SearchAnswer>;
    search(query: string, k?: number): Promise<VectorHit[]>;
    stats(): Promise<SearchStats>;
}
