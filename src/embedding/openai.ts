import OpenAI from 'openai';
import { EmbeddingBackend } from './types';

export const create = (getClient: () => OpenAI, model: string): EmbeddingBackend => {
    const embed = async (text: string): Promise<number[]> => {
        const response = await getClient().embeddings.create({ model, input: text });
        const vector = response.data[0]?.embedding;
        if (!vector || vector.length === 0) {
            throw new Error('OpenAI returned no embedding');
        }
        return vector;
    };

    return { name: `openai:${model}`, embed };
};
