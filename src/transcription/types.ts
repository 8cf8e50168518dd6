/**
 * Transcription Types
 *
 * The engine only needs audio in, text out. Model choice is configuration.
 */

export type TranscriptionModel =
    | 'whisper-1'
    | 'gpt-4o-mini-transcribe'
    | 'gpt-4o-transcribe';

export interface TranscriptionConfig {
    model: TranscriptionModel;
    language?: string;
    prompt?: string;
    temperature?: number;
}

export interface TranscriptionGateway {
    /** Resolves to the raw transcript text; rejects with TranscriptionError. */
    transcribe(audioPath: string): Promise<string>;
}

// OpenAI API rejects uploads above 25 MB
export const MAX_AUDIO_SIZE = 25 * 1024 * 1024;
