/**
 * Transcription Service
 *
 * Sends a finalized audio file to OpenAI's transcription endpoint.
 */

import OpenAI from 'openai';
import * as fs from 'node:fs';
import * as Storage from '../util/storage';
import * as Logging from '../logging';
import { TranscriptionError, errorMessage, isCapsuleError } from '../errors';
import { MAX_AUDIO_SIZE, TranscriptionConfig, TranscriptionGateway } from './types';

export const create = (openai: OpenAI, config: TranscriptionConfig): TranscriptionGateway => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });

    const transcribe = async (audioPath: string): Promise<string> => {
        logger.debug('Starting transcription', { model: config.model, file: audioPath });

        try {
            if (!await storage.isFile(audioPath)) {
                throw new TranscriptionError(`Audio file not found: ${audioPath}`);
            }

            const { size } = await fs.promises.stat(audioPath);
            if (size > MAX_AUDIO_SIZE) {
                throw new TranscriptionError(`Audio file is ${(size / (1024 * 1024)).toFixed(1)} MB, above the 25 MB upload limit`);
            }

            const startTime = Date.now();
            const response = await openai.audio.transcriptions.create({
                model: config.model,
                file: await storage.readStream(audioPath),
                response_format: 'json',
                ...(config.language && { language: config.language }),
                ...(config.temperature !== undefined && { temperature: config.temperature }),
                ...(config.prompt && { prompt: config.prompt }),
            });

            logger.info('Transcribed %s in %dms', audioPath, Date.now() - startTime);
            return response.text;
        } catch (error) {
            if (isCapsuleError(error)) {
                throw error;
            }
            throw new TranscriptionError(`Transcription failed: ${errorMessage(error)}`, { cause: error });
        }
    };

    return { transcribe };
};
