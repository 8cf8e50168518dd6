/**
 * Transcription System
 *
 * Factory for the transcription gateway. The OpenAI client is created lazily
 * so commands that never transcribe do not need an API key.
 */

import OpenAI from 'openai';
import { TranscriptionGateway, TranscriptionModel } from './types';
import * as Service from './service';
import { TranscriptionError, errorMessage } from '../errors';

export * from './types';

export interface CreateOptions {
    apiKey?: string;
    model?: TranscriptionModel;
    language?: string;
    openaiClient?: OpenAI;
}

export const create = (options: CreateOptions = {}): TranscriptionGateway => {
    let service: TranscriptionGateway | null = null;
    const getService = (): TranscriptionGateway => {
        if (!service) {
            const openai = options.openaiClient ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
            service = Service.create(openai, {
                model: options.model ?? 'whisper-1',
                language: options.language,
            });
        }
        return service;
    };

    const transcribe = async (audioPath: string): Promise<string> => {
        let active: TranscriptionGateway;
        try {
            active = getService();
        } catch (error) {
            throw new TranscriptionError(`Transcription client unavailable: ${errorMessage(error)}`, { cause: error });
        }
        return active.transcribe(audioPath);
    };

    return { transcribe };
};
