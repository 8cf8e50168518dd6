/**
 * Embedding Types
 */

export type EmbeddingProvider = 'openai' | 'local';

export interface EmbeddingGateway {
    /** Fixed-length vector for `text`; rejects with EmbeddingError. */
    embed(text: string): Promise<number[]>;
}

/** A single provider call, without retries or error mapping. */
export interface EmbeddingBackend {
    readonly name: string;
    embed(text: string): Promise<number[]>;
}
