/**
 * Generation System
 *
 * Builds the gateway from configuration: the local Ollama backend first (when
 * enabled) with its retry policy, then the remote OpenAI backend.
 */

import * as Gateway from './gateway';
import * as Local from './backends/local';
import * as Remote from './backends/remote';
import { BackendStrategy, GatewayInstance } from './types';
import { RetryPolicy, Sleep } from '../util/retry';
import OpenAI from 'openai';

export * from './types';
export * as Prompts from './prompts';

export interface GenerationConfig {
    useLocalLlm: boolean;
    localLlmUrl: string;
    localLlmModel: string;
    remoteModel: string;
    apiKey?: string;
    temperature: number;
    localAttempts: number;
    remoteAttempts: number;
    backoffInitialMs: number;
    backoffMultiplier: number;
    backoffMaxMs: number;
    openaiClient?: OpenAI;
    sleep?: Sleep;
}

export const create = (config: GenerationConfig): GatewayInstance => {
    const policy = (attempts: number): RetryPolicy => ({
        attempts,
        initialDelayMs: config.backoffInitialMs,
        multiplier: config.backoffMultiplier,
        maxDelayMs: config.backoffMaxMs,
    });

    const strategies: BackendStrategy[] = [
        {
            backend: Local.create({ url: config.localLlmUrl, model: config.localLlmModel }),
            policy: policy(config.localAttempts),
            enabled: config.useLocalLlm,
        },
        {
            backend: Remote.create({ apiKey: config.apiKey, model: config.remoteModel, openaiClient: config.openaiClient }),
            policy: policy(config.remoteAttempts),
        },
    ];

    return Gateway.create({
        strategies,
        defaultTemperature: config.temperature,
        sleep: config.sleep,
    });
};
