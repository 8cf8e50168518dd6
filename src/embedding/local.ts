import { z } from 'zod';
import { LOCAL_LLM_TIMEOUT_MS } from '../constants';
import { EmbeddingBackend } from './types';

const EmbeddingResponseSchema = z.object({
    embedding: z.array(z.number()).min(1),
});

export const create = (url: string, model: string): EmbeddingBackend => {
    const baseUrl = url.replace(/\/+$/, '');

    const embed = async (text: string): Promise<number[]> => {
        const response = await fetch(`${baseUrl}/api/embeddings`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify({ model, prompt: text }),
            signal: AbortSignal.timeout(LOCAL_LLM_TIMEOUT_MS),
        });
        if (!response.ok) {
            throw new Error(`Ollama /api/embeddings returned HTTP ${response.status}`);
        }
        return EmbeddingResponseSchema.parse(await response.json()).embedding;
    };

    return { name: `ollama:${model}`, embed };
};
