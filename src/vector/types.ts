/**
 * Vector Index Types
 */

export interface VectorMetadata {
    title: string;
    tags: string[];
    createdAt: string;
}

export interface VectorRecord {
    insightId: string;
    embedding: number[];
    metadata: VectorMetadata;
}

export interface VectorHit {
    insightId: string;
    /** Cosine similarity in [-1, 1] */
    score: number;
    metadata: VectorMetadata;
}

export interface VectorIndexConfig {
    filePath: string;
    tieEpsilon?: number;
}

export interface VectorIndexInstance {
    /** Reads the persisted file; called implicitly by every other operation. */
    load(): Promise<number>;
    /** Inserts or replaces the record for `insightId`. */
    add(insightId: string, embedding: number[], metadata: VectorMetadata): Promise<void>;
    query(embedding: number[], k: number): Promise<VectorHit[]>;
    remove(insightId: string): Promise<boolean>;
    has(insightId: string): Promise<boolean>;
    get(insightId: string): Promise<VectorRecord | null>;
    size(): Promise<number>;
    dimension(): Promise<number | null>;
    clear(): Promise<void>;
}
