/**
 * Capture Session
 *
 * Owns one recording: buffers frames in arrival order, tracks trailing
 * silence, and turns the buffer into a WAV artifact on finalize. The
 * artifact path belongs to the session until finalize hands it out.
 */

import * as path from 'node:path';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { AudioCaptureError, InvalidStateError, errorMessage } from '../errors';
import { timestampId } from '../util/ids';
import { AmplitudeSample, SilenceConfig, isSilent, pushAmplitude, rms } from './silence';
import { concatFrames, encodePcm16Wav } from './wav';
import { CaptureConfig, CaptureSessionInstance, FrameResult, SessionState } from './types';

export const create = (config: CaptureConfig, options: { id?: string; now?: () => Date } = {}): CaptureSessionInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });
    const now = options.now ?? (() => new Date());

    const id = options.id ?? timestampId(now());
    const silence: SilenceConfig = {
        threshold: config.silenceThreshold,
        durationMs: config.silenceDurationMs,
    };

    let state: SessionState = 'idle';
    let startedAt: Date | null = null;
    let frames: Float32Array[] = [];
    let totalSamples = 0;
    let window: AmplitudeSample[] = [];

    const getState = (): SessionState => state;

    const frameDurationMs = (samples: Float32Array): number =>
        (samples.length / config.channels / config.sampleRate) * 1000;

    const begin = (): void => {
        if (state !== 'idle') {
            throw new InvalidStateError(`Capture session ${id} cannot begin from state ${state}`);
        }
        state = 'recording';
        startedAt = now();
        logger.debug('Capture session %s started', id);
    };

    const appendFrame = (samples: Float32Array): FrameResult => {
        if (state !== 'recording') {
            logger.debug('Dropping frame for capture session %s in state %s', id, state);
            return { autoStop: false };
        }
        if (samples.length === 0) {
            return { autoStop: false };
        }

        frames.push(samples);
        totalSamples += samples.length;

        if (!config.silenceDetection) {
            return { autoStop: false };
        }

        window = pushAmplitude(window, { rms: rms(samples), durationMs: frameDurationMs(samples) }, silence);
        if (isSilent(window, silence)) {
            logger.info('Silence detected for %dms in capture session %s', config.silenceDurationMs, id);
            window = [];
            return { autoStop: true };
        }
        return { autoStop: false };
    };

    const finalize = async (): Promise<string> => {
        if (state !== 'recording') {
            throw new InvalidStateError(`Capture session ${id} cannot finalize from state ${state}`);
        }

        // Snapshot before the first await so every frame appended so far is kept
        state = 'finalizing';
        const snapshot = frames;
        frames = [];
        window = [];

        if (totalSamples === 0) {
            state = 'closed';
            throw new AudioCaptureError(`Capture session ${id} recorded no audio`);
        }

        const target = path.join(config.audioDirectory, `${id}.wav`);
        try {
            const wav = encodePcm16Wav(concatFrames(snapshot), config.sampleRate, config.channels);
            await storage.writeFileAtomic(target, wav);
        } catch (error) {
            state = 'closed';
            await storage.deleteFile(target);
            throw new AudioCaptureError(`Could not write audio for capture session ${id}: ${errorMessage(error)}`, { cause: error });
        }

        if (getState() !== 'finalizing') {
            // Aborted while the file was being written
            await storage.deleteFile(target);
            throw new AudioCaptureError(`Capture session ${id} was aborted`);
        }

        state = 'closed';
        logger.info('Capture session %s wrote %s (%dms of audio)', id, target, Math.round(durationMs()));
        return target;
    };

    // A finalize in flight removes its own file once it sees the abort;
    // after a successful finalize the artifact belongs to the caller.
    const abort = async (): Promise<void> => {
        if (state === 'closed') {
            return;
        }
        state = 'closed';
        frames = [];
        window = [];
        totalSamples = 0;
        logger.debug('Capture session %s aborted', id);
    };

    const durationMs = (): number => (totalSamples / config.channels / config.sampleRate) * 1000;

    return {
        id,
        getState,
        getStartedAt: () => startedAt,
        begin,
        appendFrame,
        finalize,
        abort,
        sampleCount: () => totalSamples,
        durationMs,
    };
};
