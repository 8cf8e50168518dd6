/**
 * Remote generation backend using OpenAI chat completions.
 */

import OpenAI from 'openai';
import * as Logging from '../../logging';
import { CompletionParams, GenerationBackend, RemoteBackendConfig } from '../types';

export const create = (config: RemoteBackendConfig): GenerationBackend => {
    const logger = Logging.getLogger();

    // Lazy-initialize OpenAI client (only when actually needed)
    let client: OpenAI | null = config.openaiClient ?? null;
    const getClient = (): OpenAI => {
        if (!client) {
            // Attempts are counted by the gateway's retry policy only
            client = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 });
        }
        return client;
    };

    const isAvailable = async (): Promise<boolean> => {
        return !!config.openaiClient || !!config.apiKey;
    };

    const complete = async (prompt: string, params: CompletionParams): Promise<string> => {
        const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
        if (params.systemPrompt) {
            messages.push({ role: 'system', content: params.systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });

        logger.info('Sending request to remote model: %s', config.model);
        const startTime = Date.now();

        const response = await getClient().chat.completions.create({
            model: config.model,
            messages,
            temperature: params.temperature,
        });

        logger.info('Remote model responded in %dms', Date.now() - startTime);

        const content = response.choices[0]?.message?.content?.trim();
        if (!content) {
            throw new Error('No response received from OpenAI');
        }
        return content;
    };

    return {
        name: `openai:${config.model}`,
        kind: 'remote',
        isAvailable,
        complete,
    };
};
