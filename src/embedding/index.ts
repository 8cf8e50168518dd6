/**
 * Embedding System
 *
 * Wraps a provider backend with the shared retry policy and maps every
 * failure to EmbeddingError.
 */

import OpenAI from 'openai';
import * as Logging from '../logging';
import { EmbeddingError, errorMessage } from '../errors';
import { RetryPolicy, Sleep, retry } from '../util/retry';
import * as OpenAIEmbeddings from './openai';
import * as LocalEmbeddings from './local';
import { EmbeddingBackend, EmbeddingGateway, EmbeddingProvider } from './types';

export * from './types';

export interface EmbeddingConfig {
    provider: EmbeddingProvider;
    model: string;
    apiKey?: string;
    localLlmUrl: string;
    policy: RetryPolicy;
    openaiClient?: OpenAI;
    sleep?: Sleep;
}

export const fromBackend = (backend: EmbeddingBackend, policy: RetryPolicy, sleep?: Sleep): EmbeddingGateway => {
    const logger = Logging.getLogger();

    const embed = async (text: string): Promise<number[]> => {
        if (!text.trim()) {
            throw new EmbeddingError('Cannot embed empty text');
        }
        try {
            return await retry(() => backend.embed(text), policy, {
                sleep,
                onFailedAttempt: (error, attempt) => {
                    logger.warn('Embedding attempt %d/%d with %s failed: %s', attempt, policy.attempts, backend.name, errorMessage(error));
                },
            });
        } catch (error) {
            throw new EmbeddingError(`Embedding with ${backend.name} failed: ${errorMessage(error)}`, { cause: error });
        }
    };

    return { embed };
};

export const create = (config: EmbeddingConfig): EmbeddingGateway => {
    let client: OpenAI | null = config.openaiClient ?? null;
    const getClient = (): OpenAI => {
        if (!client) {
            client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
        }
        return client;
    };

    const backend = config.provider === 'local'
        ? LocalEmbeddings.create(config.localLlmUrl, config.model)
        : OpenAIEmbeddings.create(getClient, config.model);

    return fromBackend(backend, config.policy, config.sleep);
};
