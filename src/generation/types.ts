/**
 * Generation Types
 *
 * Types for the text-generation gateway and the backends it falls back across.
 */

import OpenAI from 'openai';
import { RetryPolicy, Sleep } from '../util/retry';

export type GenerationRole = 'capsule' | 'outline' | 'draft' | 'takeaways' | 'expand' | 'search-answer';

export interface GenerationRequest {
    role: GenerationRole;
    prompt: string;
    systemPrompt?: string;
    temperature?: number;
    /** When false, remote backends are tried before local ones. Defaults to true. */
    preferLocal?: boolean;
}

export interface CompletionParams {
    systemPrompt?: string;
    temperature: number;
}

export type BackendKind = 'local' | 'remote';

export interface GenerationBackend {
    readonly name: string;
    readonly kind: BackendKind;
    isAvailable(): Promise<boolean>;
    complete(prompt: string, params: CompletionParams): Promise<string>;
}

export interface BackendStrategy {
    backend: GenerationBackend;
    policy: RetryPolicy;
    enabled?: boolean;
}

export interface GatewayConfig {
    strategies: BackendStrategy[];
    defaultTemperature: number;
    sleep?: Sleep;
}

export interface GatewayInstance {
    generate(request: GenerationRequest): Promise<string>;
    backends(): string[];
}

export interface LocalBackendConfig {
    url: string;
    model: string;
    timeoutMs?: number;
    probeTimeoutMs?: number;
}

export interface RemoteBackendConfig {
    apiKey?: string;
    model: string;
    openaiClient?: OpenAI;
}
