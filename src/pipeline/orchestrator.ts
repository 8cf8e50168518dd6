/**
 * Pipeline Orchestrator
 *
 * The capture-to-insight state machine:
 *
 *   idle -> recording -> processing -> idle
 *                                  \-> error -> idle
 *
 * Transitions are linearized by one lock. Processing stages run outside it
 * with the state parked at `processing`, which is what keeps a second run
 * out. Events go through the dispatcher and reach listeners after the lock
 * is released.
 */

import * as Logging from '../logging';
import * as Mutex from '../util/mutex';
import * as Storage from '../util/storage';
import {
    AudioCaptureError,
    BusyError,
    ErrorCode,
    InvalidRequestError,
    InvalidStateError,
    TranscriptionError,
    errorMessage,
    toFailureReason,
} from '../errors';
import { AudioSink, CaptureSessionInstance, Session } from '../capture';
import { Prompts } from '../generation';
import { Draft, DraftKind, Insight, extractTags, generateTitle } from '../store';
import { timestampId } from '../util/ids';
import * as Events from './events';
import {
    ActionOptions,
    FailedOutcome,
    OrchestratorConfig,
    OrchestratorInstance,
    PipelineState,
    ProcessingStage,
    RunOutcome,
    StopHandle,
    StopReason,
} from './types';

interface ActiveCapture {
    session: CaptureSessionInstance;
}

interface Run {
    runId: string;
    audioPath: string;
    /** Audio written by a capture session; files passed to processFile are not ours to delete. */
    ownsAudio: boolean;
}

const STAGE_FAILURE: Record<ProcessingStage, ErrorCode> = {
    transcribing: 'transcription',
    generating: 'generation',
    storing: 'storage',
};

export const create = (config: OrchestratorConfig): OrchestratorInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });
    const lock = Mutex.create();
    const dispatcher = Events.create();
    const now = config.now ?? (() => new Date());

    let state: PipelineState = 'idle';
    let active: ActiveCapture | null = null;
    let idleWaiters: Array<() => void> = [];

    const setState = (next: PipelineState): void => {
        if (state === next) {
            return;
        }
        logger.debug('Pipeline state %s -> %s', state, next);
        state = next;
        if (next === 'idle') {
            const waiters = idleWaiters;
            idleWaiters = [];
            waiters.forEach((resolve) => resolve());
        }
    };

    const stopSource = async (): Promise<void> => {
        if (!config.audioSource) {
            return;
        }
        try {
            await config.audioSource.stop();
        } catch (error) {
            logger.warn('Audio source did not stop cleanly: %s', errorMessage(error));
        }
    };

    const removeArtifact = async (filePath: string): Promise<void> => {
        try {
            await storage.deleteFile(filePath);
        } catch (error) {
            logger.warn('Could not remove %s: %s', filePath, errorMessage(error));
        }
    };

    // Called with the lock held
    const failRun = (outcome: FailedOutcome): void => {
        setState('error');
        logger.error('Run %s failed (%s): %s', outcome.runId, outcome.reason, outcome.message);
        dispatcher.emit({
            type: 'failed',
            runId: outcome.runId,
            reason: outcome.reason,
            message: outcome.message,
            audioPath: outcome.audioPath,
            transcriptPath: outcome.transcriptPath,
        });
        setState('idle');
    };

    const keepTranscript = async (run: Run, transcript: string, reason: ErrorCode, message: string): Promise<string | null> => {
        try {
            return await config.store.writeRawTranscript({
                sessionId: run.runId,
                text: transcript,
                audioPath: run.audioPath,
                reason,
                message,
                failedAt: now().toISOString(),
            });
        } catch (error) {
            logger.error('Could not preserve the transcript of run %s: %s', run.runId, errorMessage(error));
            return null;
        }
    };

    const runStages = async (run: Run): Promise<RunOutcome> => {
        let stage: ProcessingStage = 'transcribing';
        let transcript: string | null = null;

        const enter = (next: ProcessingStage): void => {
            stage = next;
            logger.info('Run %s: %s', run.runId, next);
            dispatcher.emit({ type: 'processingStageChanged', runId: run.runId, stage: next });
        };

        try {
            enter('transcribing');
            transcript = (await config.transcription.transcribe(run.audioPath)).trim();
            if (!transcript) {
                throw new TranscriptionError('Transcription returned no text');
            }

            enter('generating');
            const capsule = await config.generation.generate({
                role: 'capsule',
                prompt: Prompts.capsulePrompt(transcript, config.maxCapsuleWords),
                temperature: config.temperature,
            });

            enter('storing');
            const createdAt = now();
            const keepAudio = !run.ownsAudio || config.retainAudio;
            const insight: Insight = {
                id: timestampId(createdAt),
                createdAt: createdAt.toISOString(),
                title: generateTitle(transcript),
                tags: extractTags(transcript, capsule),
                transcript,
                capsule,
                drafts: [],
                sourceAudioPath: keepAudio ? run.audioPath : null,
            };
            await config.store.save(insight);

            if (!keepAudio) {
                await removeArtifact(run.audioPath);
            }

            await lock.runExclusive(() => {
                dispatcher.emit({ type: 'complete', runId: run.runId, insight });
                setState('idle');
            });
            logger.info('Run %s stored insight %s', run.runId, insight.id);
            config.indexer.schedule(insight, (insightId, ok, error) => {
                dispatcher.emit({ type: 'indexed', insightId, ok, ...(error ? { error } : {}) });
            });
            return { status: 'complete', runId: run.runId, insight };
        } catch (error) {
            const reason = toFailureReason(error, STAGE_FAILURE[stage]);
            const message = errorMessage(error);
            const transcriptPath = transcript && stage !== 'transcribing'
                ? await keepTranscript(run, transcript, reason, message)
                : null;
            const outcome: FailedOutcome = {
                status: 'failed',
                runId: run.runId,
                reason,
                message,
                audioPath: run.audioPath,
                transcriptPath,
            };
            await lock.runExclusive(() => failRun(outcome));
            return outcome;
        }
    };

    const sinkFor = (session: CaptureSessionInstance): AudioSink => {
        const isCurrent = (): boolean => active?.session === session;
        return {
            onFrame: (samples) => {
                if (!isCurrent()) {
                    return;
                }
                const { autoStop } = session.appendFrame(samples);
                if (!autoStop) {
                    return;
                }
                if (config.autoStopOnSilence) {
                    finishCapture('silence', session).catch((error: unknown) => {
                        logger.warn('Silence auto-stop did not complete: %s', errorMessage(error));
                    });
                } else {
                    dispatcher.emit({ type: 'autoStopSuggested', sessionId: session.id });
                }
            },
            onError: (error) => {
                if (!isCurrent()) {
                    return;
                }
                abortActive(session, error).catch((abortError: unknown) => {
                    logger.error('Could not abort capture %s: %s', session.id, errorMessage(abortError));
                });
            },
            onEnd: () => {
                if (!isCurrent()) {
                    return;
                }
                finishCapture('manual', session).catch((error: unknown) => {
                    logger.warn('Stop at end of input did not complete: %s', errorMessage(error));
                });
            },
        };
    };

    const startCapture = async (): Promise<{ sessionId: string }> => {
        return lock.runExclusive(async () => {
            if (state !== 'idle') {
                throw new BusyError();
            }
            if (!config.audioSource) {
                throw new AudioCaptureError('No audio source is configured');
            }

            const session = Session.create(config.capture, { now });
            session.begin();
            active = { session };
            setState('recording');

            try {
                await config.audioSource.start(sinkFor(session));
            } catch (error) {
                active = null;
                await session.abort();
                await stopSource();
                const message = `Audio source failed to start: ${errorMessage(error)}`;
                failRun({
                    status: 'failed',
                    runId: session.id,
                    reason: 'audio-capture',
                    message,
                    audioPath: null,
                    transcriptPath: null,
                });
                throw new AudioCaptureError(message, { cause: error });
            }

            logger.info('Recording started (session %s)', session.id);
            dispatcher.emit({ type: 'recordingStarted', sessionId: session.id });
            return { sessionId: session.id };
        });
    };

    /**
     * Finalizes the active session and starts processing. With `expected`,
     * only that session is stopped, so a late silence signal cannot stop a
     * newer recording.
     */
    const finishCapture = async (reason: StopReason, expected?: CaptureSessionInstance): Promise<StopHandle> => {
        return lock.runExclusive(async () => {
            if (state !== 'recording' || !active || (expected && active.session !== expected)) {
                throw new InvalidStateError(`Cannot stop capture while ${state}`);
            }
            const { session } = active;
            active = null;
            await stopSource();

            let audioPath: string;
            try {
                audioPath = await session.finalize();
            } catch (error) {
                dispatcher.emit({ type: 'recordingStopped', sessionId: session.id, reason, audioPath: null });
                const outcome: FailedOutcome = {
                    status: 'failed',
                    runId: session.id,
                    reason: toFailureReason(error, 'audio-capture'),
                    message: errorMessage(error),
                    audioPath: null,
                    transcriptPath: null,
                };
                failRun(outcome);
                return { sessionId: session.id, audioPath: null, result: Promise.resolve(outcome) };
            }

            logger.info('Recording stopped (%s), audio at %s', reason, audioPath);
            dispatcher.emit({ type: 'recordingStopped', sessionId: session.id, reason, audioPath });
            setState('processing');
            const result = runStages({ runId: session.id, audioPath, ownsAudio: true });
            return { sessionId: session.id, audioPath, result };
        });
    };

    const abortActive = async (expected: CaptureSessionInstance | null, cause?: Error): Promise<void> => {
        await lock.runExclusive(async () => {
            if (state !== 'recording' || !active || (expected && active.session !== expected)) {
                throw new InvalidStateError(`Cannot abort capture while ${state}`);
            }
            const { session } = active;
            active = null;
            await session.abort();
            await stopSource();
            dispatcher.emit({ type: 'recordingStopped', sessionId: session.id, reason: 'aborted', audioPath: null });

            if (cause) {
                failRun({
                    status: 'failed',
                    runId: session.id,
                    reason: 'audio-capture',
                    message: errorMessage(cause),
                    audioPath: null,
                    transcriptPath: null,
                });
                return;
            }
            logger.info('Recording aborted (session %s)', session.id);
            setState('idle');
        });
    };

    const processFile = async (audioPath: string): Promise<RunOutcome> => {
        const runId = timestampId(now());
        await lock.runExclusive(() => {
            if (state !== 'idle') {
                throw new BusyError();
            }
            setState('processing');
        });
        logger.info('Processing %s (run %s)', audioPath, runId);
        return runStages({ runId, audioPath, ownsAudio: false });
    };

    const actionPrompt = (insight: Insight, kind: DraftKind, options: ActionOptions): string => {
        switch (kind) {
            case 'outline':
                return Prompts.outlinePrompt(insight.capsule, insight.transcript);
            case 'draft': {
                const outline = [...insight.drafts].reverse().find((draft) => draft.kind === 'outline');
                return Prompts.draftPrompt(insight.capsule, { outline: outline?.text, transcript: insight.transcript });
            }
            case 'takeaways':
                return Prompts.takeawaysPrompt(insight.capsule);
            case 'expand':
                return Prompts.expandPrompt(insight.capsule, options.sectionTitle ?? '');
        }
    };

    const requestAction = async (insightId: string, kind: DraftKind, options: ActionOptions = {}): Promise<Draft> => {
        const sectionTitle = options.sectionTitle?.trim();
        if (kind === 'expand' && !sectionTitle) {
            throw new InvalidRequestError('Expanding a section needs a section title');
        }

        const insight = await config.store.load(insightId);
        logger.info('Generating %s for insight %s', kind, insightId);
        const text = await config.generation.generate({
            role: kind,
            prompt: actionPrompt(insight, kind, { ...options, sectionTitle }),
            temperature: config.temperature,
            preferLocal: options.preferLocal,
        });

        const draft: Draft = {
            kind,
            text,
            createdAt: now().toISOString(),
            ...(kind === 'expand' && sectionTitle ? { sectionTitle } : {}),
        };
        await config.store.appendDraft(insightId, draft);
        return draft;
    };

    const whenIdle = (): Promise<void> => {
        if (state === 'idle') {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            idleWaiters.push(resolve);
        });
    };

    return {
        startCapture,
        stopCapture: () => finishCapture('manual'),
        abortCapture: () => abortActive(null),
        processFile,
        requestAction,
        subscribe: dispatcher.subscribe,
        getState: () => state,
        whenIdle,
        flushEvents: dispatcher.flush,
    };
};
