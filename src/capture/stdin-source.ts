/**
 * Audio source reading raw signed 16-bit little-endian mono PCM from a
 * stream, stdin by default. For example:
 *
 *   arecord -f S16_LE -r 16000 -c 1 -t raw | insight-capsule record
 */

import { Readable } from 'node:stream';
import * as Logging from '../logging';
import { AudioCaptureError } from '../errors';
import { pcm16ToFloat32 } from './wav';
import { AudioSink, AudioSource } from './types';

export const create = (input: Readable = process.stdin): AudioSource => {
    const logger = Logging.getLogger();
    let detach: (() => void) | null = null;

    const start = async (sink: AudioSink): Promise<void> => {
        if (detach) {
            throw new AudioCaptureError('Audio source is already started');
        }

        // Samples can straddle chunk boundaries
        let carry: Buffer = Buffer.alloc(0);

        const onData = (chunk: Buffer): void => {
            const data = carry.length > 0 ? Buffer.concat([carry, chunk]) : chunk;
            const usable = data.length - (data.length % 2);
            carry = data.subarray(usable);
            if (usable > 0) {
                sink.onFrame(pcm16ToFloat32(data.subarray(0, usable)));
            }
        };
        const onError = (error: Error): void => {
            sink.onError(new AudioCaptureError(`Audio input failed: ${error.message}`, { cause: error }));
        };
        const onEnd = (): void => {
            logger.debug('Audio input reached end of stream');
            sink.onEnd?.();
        };

        input.on('data', onData);
        input.on('error', onError);
        input.on('end', onEnd);
        input.resume();

        detach = () => {
            input.off('data', onData);
            input.off('error', onError);
            input.off('end', onEnd);
            input.pause();
        };
    };

    const stop = async (): Promise<void> => {
        detach?.();
        detach = null;
    };

    return { start, stop };
};
