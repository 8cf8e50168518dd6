/**
 * Local generation backend talking to an Ollama server.
 */

import { z } from 'zod';
import * as Logging from '../../logging';
import { LOCAL_LLM_PROBE_TIMEOUT_MS, LOCAL_LLM_TIMEOUT_MS } from '../../constants';
import { CompletionParams, GenerationBackend, LocalBackendConfig } from '../types';

const CompletionResponseSchema = z.object({
    response: z.string().optional(),
    message: z.object({
        content: z.string().optional(),
    }).optional(),
});

const TagsResponseSchema = z.object({
    models: z.array(z.object({
        name: z.string().optional(),
        model: z.string().optional(),
    })).default([]),
});

export class LocalBackendHttpError extends Error {
    readonly status: number;

    constructor(endpoint: string, status: number) {
        super(`Ollama ${endpoint} returned HTTP ${status}`);
        this.name = 'LocalBackendHttpError';
        this.status = status;
    }
}

const extractText = (payload: unknown): string => {
    if (typeof payload === 'string') {
        return payload;
    }
    const parsed = CompletionResponseSchema.safeParse(payload);
    if (!parsed.success) {
        return '';
    }
    return parsed.data.response ?? parsed.data.message?.content ?? '';
};

export const create = (config: LocalBackendConfig): GenerationBackend => {
    const logger = Logging.getLogger();
    const baseUrl = config.url.replace(/\/+$/, '');
    const timeoutMs = config.timeoutMs ?? LOCAL_LLM_TIMEOUT_MS;
    const probeTimeoutMs = config.probeTimeoutMs ?? LOCAL_LLM_PROBE_TIMEOUT_MS;

    const post = async (endpoint: string, body: Record<string, unknown>): Promise<Response> => {
        return fetch(`${baseUrl}${endpoint}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: JSON.stringify(body),
            signal: AbortSignal.timeout(timeoutMs),
        });
    };

    const completeWithChat = async (prompt: string, params: CompletionParams): Promise<string> => {
        const messages: Array<{ role: string; content: string }> = [];
        if (params.systemPrompt) {
            messages.push({ role: 'system', content: params.systemPrompt });
        }
        messages.push({ role: 'user', content: prompt });

        const response = await post('/api/chat', {
            model: config.model,
            messages,
            stream: false,
            options: { temperature: params.temperature },
        });
        if (!response.ok) {
            throw new LocalBackendHttpError('/api/chat', response.status);
        }
        return extractText(await response.json());
    };

    const complete = async (prompt: string, params: CompletionParams): Promise<string> => {
        const fullPrompt = params.systemPrompt
            ? `${params.systemPrompt}\n\nUser: ${prompt}\nAssistant:`
            : prompt;

        logger.debug('Sending prompt to local model %s at %s', config.model, baseUrl);
        const startTime = Date.now();

        const response = await post('/api/generate', {
            model: config.model,
            prompt: fullPrompt,
            stream: false,
            options: { temperature: params.temperature },
        });

        let text: string;
        if (response.status === 404) {
            logger.info('Ollama /api/generate returned 404; retrying with /api/chat');
            text = await completeWithChat(prompt, params);
        } else if (!response.ok) {
            throw new LocalBackendHttpError('/api/generate', response.status);
        } else {
            text = extractText(await response.json());
        }

        logger.debug('Local model responded in %dms', Date.now() - startTime);
        return text.trim();
    };

    const isAvailable = async (): Promise<boolean> => {
        try {
            const response = await fetch(`${baseUrl}/api/tags`, {
                signal: AbortSignal.timeout(probeTimeoutMs),
            });
            if (response.status !== 200) {
                logger.debug('Ollama availability check failed with status %d', response.status);
                return false;
            }

            const tags = TagsResponseSchema.safeParse(await response.json());
            const models = tags.success ? tags.data.models : [];
            const present = models.some((tag) => tag.name === config.model || tag.model === config.model);
            if (!present) {
                logger.warn('Local model "%s" is not present; run "ollama pull %s" or change localLlmModel', config.model, config.model);
                return false;
            }
            return true;
        } catch (error) {
            logger.debug('Ollama not available: %s', error);
            return false;
        }
    };

    return {
        name: `ollama:${config.model}`,
        kind: 'local',
        isAvailable,
        complete,
    };
};
