/**
 * Tests for the capture-to-insight orchestrator
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import OpenAI from 'openai';
import * as Pipeline from '../../src/pipeline';
import * as Generation from '../../src/generation';
import * as Store from '../../src/store';
import * as Vector from '../../src/vector';
import { AudioSink } from '../../src/capture';
import {
    AudioCaptureError,
    BusyError,
    EmbeddingError,
    GenerationError,
    InvalidRequestError,
    InvalidStateError,
    NotFoundError,
    StorageError,
    TranscriptionError,
} from '../../src/errors';
import { gardening } from '../store/fixtures';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

const NOW = new Date('2024-03-15T14:22:33.000Z');
const TRANSCRIPT = 'Gardening teaches patience in ways #garden nothing else does';
const CAPSULE = 'Patience is grown, not forced. #patience';

// Delivers 100ms frames at 1 kHz to whichever sink the orchestrator attached
const createSource = () => {
    let sink: AudioSink | null = null;
    return {
        start: vi.fn(async (next: AudioSink) => {
            sink = next;
        }),
        stop: vi.fn(async () => {
            sink = null;
        }),
        frame: (value: number) => sink?.onFrame(new Float32Array(100).fill(value)),
        fail: (error: Error) => sink?.onError(error),
        end: () => sink?.onEnd?.(),
    };
};

const stages = (events: Pipeline.PipelineEvent[]) =>
    events.flatMap((event) => (event.type === 'processingStageChanged' ? [event.stage] : []));

describe('pipeline orchestrator', () => {
    let dataDirectory: string;
    let audioDirectory: string;
    let source: ReturnType<typeof createSource>;
    const transcribe = vi.fn();
    const generate = vi.fn();
    const embed = vi.fn();

    beforeEach(async () => {
        dataDirectory = await fs.mkdtemp(path.join(os.tmpdir(), 'capsule-pipeline-'));
        audioDirectory = path.join(dataDirectory, 'audio');
        source = createSource();
        transcribe.mockReset().mockResolvedValue(TRANSCRIPT);
        generate.mockReset().mockResolvedValue(CAPSULE);
        embed.mockReset().mockResolvedValue([1, 0]);
    });

    afterEach(async () => {
        vi.unstubAllGlobals();
        await fs.rm(dataDirectory, { recursive: true, force: true });
    });

    const build = (overrides: Partial<Pipeline.OrchestratorConfig> = {}) => {
        const store = Store.create({ dataDirectory });
        const index = Vector.create({ filePath: path.join(dataDirectory, 'vectors.json') });
        const indexer = Pipeline.Indexer.create({ embeddings: { embed }, index, store });
        const orchestrator = Pipeline.create({
            transcription: { transcribe },
            generation: { generate, backends: () => ['fake'] },
            store,
            indexer,
            capture: {
                audioDirectory,
                sampleRate: 1000,
                channels: 1,
                silenceDetection: true,
                silenceThreshold: 0.01,
                silenceDurationMs: 300,
            },
            audioSource: source,
            autoStopOnSilence: true,
            retainAudio: true,
            now: () => NOW,
            ...overrides,
        });
        const events: Pipeline.PipelineEvent[] = [];
        orchestrator.subscribe((event) => {
            events.push(event);
        });
        const settle = async () => {
            await indexer.drain();
            await orchestrator.flushEvents();
        };
        return { orchestrator, store, index, indexer, events, settle };
    };

    describe('capture', () => {
        it('should turn a recording into a stored, searchable insight', async () => {
            const { orchestrator, store, index, events, settle } = build();

            const { sessionId } = await orchestrator.startCapture();
            expect(orchestrator.getState()).toBe('recording');
            source.frame(0.5);
            source.frame(0.5);
            const handle = await orchestrator.stopCapture();
            const outcome = await handle.result;
            await settle();

            expect(handle.sessionId).toBe(sessionId);
            expect(handle.audioPath).toBe(path.join(audioDirectory, `${sessionId}.wav`));
            expect(transcribe).toHaveBeenCalledWith(handle.audioPath);
            expect(generate).toHaveBeenCalledWith(expect.objectContaining({ role: 'capsule' }));
            expect(generate.mock.calls[0][0].prompt).toContain(TRANSCRIPT);

            expect(outcome.status).toBe('complete');
            if (outcome.status !== 'complete') return;
            const { insight } = outcome;
            expect(insight.title).toBe('Gardening teaches patience in ways...');
            expect(insight.tags).toEqual(['garden', 'patience']);
            expect(insight.transcript).toBe(TRANSCRIPT);
            expect(insight.capsule).toBe(CAPSULE);
            expect(insight.createdAt).toBe('2024-03-15T14:22:33.000Z');
            expect(insight.sourceAudioPath).toBe(handle.audioPath);
            await expect(store.load(insight.id)).resolves.toEqual(insight);
            await expect(index.has(insight.id)).resolves.toBe(true);

            expect(events.map((event) => event.type)).toEqual([
                'recordingStarted',
                'recordingStopped',
                'processingStageChanged',
                'processingStageChanged',
                'processingStageChanged',
                'complete',
                'indexed',
            ]);
            expect(events[1]).toEqual({ type: 'recordingStopped', sessionId, reason: 'manual', audioPath: handle.audioPath });
            expect(stages(events)).toEqual(['transcribing', 'generating', 'storing']);
            expect(events[6]).toEqual({ type: 'indexed', insightId: insight.id, ok: true });
            expect(orchestrator.getState()).toBe('idle');
            expect(source.stop).toHaveBeenCalled();
        });

        it('should delete the recording after saving when audio is not retained', async () => {
            const { orchestrator } = build({ retainAudio: false });

            await orchestrator.startCapture();
            source.frame(0.5);
            const outcome = await (await orchestrator.stopCapture()).result;

            expect(outcome.status === 'complete' && outcome.insight.sourceAudioPath).toBeNull();
            expect(await fs.readdir(audioDirectory)).toEqual([]);
        });

        it('should stop by itself after a stretch of silence', async () => {
            const { orchestrator, events, settle } = build();

            const { sessionId } = await orchestrator.startCapture();
            [0.5, 0, 0, 0].forEach((value) => source.frame(value));
            await orchestrator.whenIdle();
            await settle();

            expect(events).toContainEqual({
                type: 'recordingStopped',
                sessionId,
                reason: 'silence',
                audioPath: path.join(audioDirectory, `${sessionId}.wav`),
            });
            expect(events.some((event) => event.type === 'complete')).toBe(true);
        });

        it('should only suggest stopping when auto-stop is off', async () => {
            const { orchestrator, events } = build({ autoStopOnSilence: false });

            const { sessionId } = await orchestrator.startCapture();
            [0.5, 0, 0, 0].forEach((value) => source.frame(value));
            await orchestrator.flushEvents();

            expect(events).toContainEqual({ type: 'autoStopSuggested', sessionId });
            expect(orchestrator.getState()).toBe('recording');
            await (await orchestrator.stopCapture()).result;
        });

        it('should stop when the source runs out of input', async () => {
            const { orchestrator, events, settle } = build();

            await orchestrator.startCapture();
            source.frame(0.5);
            source.end();
            await orchestrator.whenIdle();
            await settle();

            expect(events.find((event) => event.type === 'recordingStopped')).toMatchObject({ reason: 'manual' });
            expect(events.some((event) => event.type === 'complete')).toBe(true);
        });

        it('should discard everything on abort', async () => {
            const { orchestrator, events } = build();

            const { sessionId } = await orchestrator.startCapture();
            source.frame(0.5);
            await orchestrator.abortCapture();
            await orchestrator.flushEvents();

            expect(orchestrator.getState()).toBe('idle');
            expect(events).toEqual([
                { type: 'recordingStarted', sessionId },
                { type: 'recordingStopped', sessionId, reason: 'aborted', audioPath: null },
            ]);
            expect(transcribe).not.toHaveBeenCalled();
            expect(await fs.readdir(audioDirectory).catch(() => [])).toEqual([]);
        });

        it('should reject a second capture while one is active', async () => {
            const { orchestrator } = build();

            await orchestrator.startCapture();
            await expect(orchestrator.startCapture()).rejects.toThrow(BusyError);
            await expect(orchestrator.processFile('/tmp/other.wav')).rejects.toThrow(BusyError);
            await orchestrator.abortCapture();
        });

        it('should reject new work while a run is processing', async () => {
            let release: (text: string) => void = () => undefined;
            transcribe.mockReturnValue(new Promise<string>((resolve) => {
                release = resolve;
            }));
            const { orchestrator } = build();

            await orchestrator.startCapture();
            source.frame(0.5);
            const handle = await orchestrator.stopCapture();

            expect(orchestrator.getState()).toBe('processing');
            await expect(orchestrator.startCapture()).rejects.toThrow(BusyError);
            await expect(orchestrator.processFile('/tmp/other.wav')).rejects.toThrow(BusyError);
            expect(orchestrator.getState()).toBe('processing');

            release(TRANSCRIPT);
            await expect(handle.result).resolves.toMatchObject({ status: 'complete' });
            expect(orchestrator.getState()).toBe('idle');
        });

        it('should refuse to stop or abort when nothing is recording', async () => {
            const { orchestrator } = build();

            await expect(orchestrator.stopCapture()).rejects.toThrow(InvalidStateError);
            await expect(orchestrator.abortCapture()).rejects.toThrow(InvalidStateError);
        });

        it('should need an audio source to record', async () => {
            const { orchestrator } = build({ audioSource: undefined });

            await expect(orchestrator.startCapture()).rejects.toThrow('No audio source is configured');
            expect(orchestrator.getState()).toBe('idle');
        });

        it('should report a source that fails to start', async () => {
            source.start.mockRejectedValueOnce(new Error('device busy'));
            const { orchestrator, events } = build();

            await expect(orchestrator.startCapture()).rejects.toThrow(AudioCaptureError);
            await orchestrator.flushEvents();

            expect(orchestrator.getState()).toBe('idle');
            expect(events).toHaveLength(1);
            expect(events[0]).toMatchObject({
                type: 'failed',
                reason: 'audio-capture',
                message: 'Audio source failed to start: device busy',
                audioPath: null,
                transcriptPath: null,
            });
        });

        it('should fail the run when the source errors mid-recording', async () => {
            const { orchestrator, events } = build();

            const { sessionId } = await orchestrator.startCapture();
            source.frame(0.5);
            source.fail(new AudioCaptureError('mic unplugged'));
            await orchestrator.whenIdle();
            await orchestrator.flushEvents();

            expect(events.map((event) => event.type)).toEqual(['recordingStarted', 'recordingStopped', 'failed']);
            expect(events[2]).toEqual({
                type: 'failed',
                runId: sessionId,
                reason: 'audio-capture',
                message: 'mic unplugged',
                audioPath: null,
                transcriptPath: null,
            });
            expect(transcribe).not.toHaveBeenCalled();
        });

        it('should fail an empty recording without transcribing', async () => {
            const { orchestrator } = build();

            await orchestrator.startCapture();
            const handle = await orchestrator.stopCapture();

            expect(handle.audioPath).toBeNull();
            await expect(handle.result).resolves.toMatchObject({ status: 'failed', reason: 'audio-capture' });
            expect(orchestrator.getState()).toBe('idle');
            expect(transcribe).not.toHaveBeenCalled();
        });
    });

    describe('failures', () => {
        it('should keep the audio when transcription fails', async () => {
            transcribe.mockRejectedValue(new TranscriptionError('Transcription failed: 401 Unauthorized'));
            const { orchestrator, events } = build({ retainAudio: false });

            await orchestrator.startCapture();
            source.frame(0.5);
            const handle = await orchestrator.stopCapture();
            const outcome = await handle.result;
            await orchestrator.flushEvents();

            expect(outcome).toEqual({
                status: 'failed',
                runId: handle.sessionId,
                reason: 'transcription',
                message: 'Transcription failed: 401 Unauthorized',
                audioPath: handle.audioPath,
                transcriptPath: null,
            });
            expect(events[events.length - 1]).toMatchObject({ type: 'failed', reason: 'transcription' });
            expect(await fs.readdir(audioDirectory)).toEqual([`${handle.sessionId}.wav`]);
            expect(generate).not.toHaveBeenCalled();
            expect(orchestrator.getState()).toBe('idle');
        });

        it('should treat an empty transcript as a transcription failure', async () => {
            transcribe.mockResolvedValue('   ');
            const { orchestrator } = build();

            await orchestrator.startCapture();
            source.frame(0.5);
            const outcome = await (await orchestrator.stopCapture()).result;

            expect(outcome).toMatchObject({ status: 'failed', reason: 'transcription', message: 'Transcription returned no text' });
        });

        it('should keep the raw transcript when generation fails', async () => {
            generate.mockRejectedValue(new GenerationError('All generation backends failed after 4 attempts', { exhausted: true }));
            const { orchestrator, store } = build();

            await orchestrator.startCapture();
            source.frame(0.5);
            const handle = await orchestrator.stopCapture();
            const outcome = await handle.result;

            const transcriptPath = path.join(dataDirectory, '.transcript', `${handle.sessionId}.json`);
            expect(outcome).toMatchObject({
                status: 'failed',
                reason: 'generation',
                message: 'All generation backends failed after 4 attempts',
                audioPath: handle.audioPath,
                transcriptPath,
            });
            const kept = JSON.parse(await fs.readFile(transcriptPath, 'utf-8'));
            expect(kept).toMatchObject({ sessionId: handle.sessionId, text: TRANSCRIPT, reason: 'generation', failedAt: NOW.toISOString() });
            expect(await store.listAll()).toEqual([]);
        });

        it('should attribute unexpected errors to the stage that raised them', async () => {
            generate.mockRejectedValue(new Error('socket hang up'));
            const { orchestrator } = build();

            await orchestrator.startCapture();
            source.frame(0.5);
            const outcome = await (await orchestrator.stopCapture()).result;

            expect(outcome).toMatchObject({ status: 'failed', reason: 'generation', message: 'socket hang up' });
        });

        it('should report storage failures with the transcript kept', async () => {
            const { orchestrator, store } = build();
            vi.spyOn(store, 'save').mockRejectedValue(new StorageError('disk full'));

            await orchestrator.startCapture();
            source.frame(0.5);
            const outcome = await (await orchestrator.stopCapture()).result;

            expect(outcome).toMatchObject({ status: 'failed', reason: 'storage', message: 'disk full' });
            expect(outcome.status === 'failed' && outcome.transcriptPath).toMatch(/\.transcript/);
        });

        it('should keep the insight when indexing fails', async () => {
            embed.mockRejectedValue(new EmbeddingError('provider down'));
            const { orchestrator, store, events, settle } = build();

            await orchestrator.startCapture();
            source.frame(0.5);
            const outcome = await (await orchestrator.stopCapture()).result;
            await settle();

            expect(outcome.status).toBe('complete');
            if (outcome.status !== 'complete') return;
            await expect(store.load(outcome.insight.id)).resolves.toEqual(outcome.insight);
            expect(events[events.length - 1]).toEqual({ type: 'indexed', insightId: outcome.insight.id, ok: false, error: 'provider down' });
        });

        it('should accept new work after a failed run', async () => {
            transcribe.mockRejectedValueOnce(new TranscriptionError('temporary'));
            const { orchestrator } = build();

            await orchestrator.startCapture();
            source.frame(0.5);
            await (await orchestrator.stopCapture()).result;

            await orchestrator.startCapture();
            source.frame(0.5);
            const outcome = await (await orchestrator.stopCapture()).result;
            expect(outcome.status).toBe('complete');
        });

        it('should not let a broken listener stop the run', async () => {
            const { orchestrator } = build();
            orchestrator.subscribe(() => {
                throw new Error('listener bug');
            });

            await orchestrator.startCapture();
            source.frame(0.5);
            const outcome = await (await orchestrator.stopCapture()).result;
            await orchestrator.flushEvents();

            expect(outcome.status).toBe('complete');
        });
    });

    describe('processFile', () => {
        it('should process an existing file and never delete it', async () => {
            const memo = path.join(dataDirectory, 'memo.wav');
            await fs.writeFile(memo, Buffer.alloc(64));
            const { orchestrator, events } = build({ retainAudio: false });

            const outcome = await orchestrator.processFile(memo);
            await orchestrator.flushEvents();

            expect(outcome.status).toBe('complete');
            if (outcome.status !== 'complete') return;
            expect(outcome.insight.sourceAudioPath).toBe(memo);
            await expect(fs.stat(memo)).resolves.toBeDefined();
            expect(events.some((event) => event.type === 'recordingStarted')).toBe(false);
            expect(events[0]).toEqual({ type: 'processingStageChanged', runId: outcome.runId, stage: 'transcribing' });
        });
    });

    describe('remote fallback', () => {
        it('should fall back to the remote model when the local one keeps failing', async () => {
            const fetchMock = vi.fn(async (url: string) => {
                if (url.endsWith('/api/tags')) {
                    return new Response(JSON.stringify({ models: [{ name: 'llama3.2' }] }), { status: 200 });
                }
                throw new TypeError('fetch failed');
            });
            vi.stubGlobal('fetch', fetchMock);
            const create = vi.fn().mockResolvedValue({ choices: [{ message: { content: 'Remote capsule.' } }] });
            const generation = Generation.create({
                useLocalLlm: true,
                localLlmUrl: 'http://localhost:11434',
                localLlmModel: 'llama3.2',
                remoteModel: 'gpt-4o-mini',
                temperature: 0.7,
                localAttempts: 3,
                remoteAttempts: 1,
                backoffInitialMs: 500,
                backoffMultiplier: 2,
                backoffMaxMs: 8000,
                openaiClient: { chat: { completions: { create } } } as unknown as OpenAI,
                sleep: async () => undefined,
            });
            const { orchestrator } = build({ generation });

            await orchestrator.startCapture();
            source.frame(0.5);
            const outcome = await (await orchestrator.stopCapture()).result;

            expect(outcome.status === 'complete' && outcome.insight.capsule).toBe('Remote capsule.');
            expect(fetchMock.mock.calls.filter(([url]) => url.endsWith('/api/generate'))).toHaveLength(3);
            expect(create).toHaveBeenCalledTimes(1);
        });
    });

    describe('requestAction', () => {
        it('should generate an outline and append it to the insight', async () => {
            const { orchestrator, store } = build();
            await store.save(gardening);
            generate.mockResolvedValue('1. Plant\n2. Wait');

            const draft = await orchestrator.requestAction(gardening.id, 'outline');

            expect(draft).toEqual({ kind: 'outline', text: '1. Plant\n2. Wait', createdAt: NOW.toISOString() });
            expect((await store.load(gardening.id)).drafts).toEqual([draft]);
            expect(generate).toHaveBeenCalledWith(expect.objectContaining({ role: 'outline' }));
            expect(generate.mock.calls[0][0].prompt).toContain(gardening.capsule);
        });

        it('should build the draft on the latest outline', async () => {
            const { orchestrator, store } = build();
            await store.save(gardening);
            generate.mockResolvedValueOnce('1. Plant\n2. Wait').mockResolvedValueOnce('A full draft.');

            await orchestrator.requestAction(gardening.id, 'outline');
            await orchestrator.requestAction(gardening.id, 'draft', { preferLocal: false });

            expect(generate.mock.calls[1][0]).toMatchObject({ role: 'draft', preferLocal: false });
            expect(generate.mock.calls[1][0].prompt).toContain('Outline to follow:\n1. Plant\n2. Wait');
            expect((await store.load(gardening.id)).drafts.map((draft) => draft.kind)).toEqual(['outline', 'draft']);
        });

        it('should expand a named section', async () => {
            const { orchestrator, store } = build();
            await store.save(gardening);
            generate.mockResolvedValue('Waiting is work.');

            const draft = await orchestrator.requestAction(gardening.id, 'expand', { sectionTitle: '  Wait ' });

            expect(draft).toMatchObject({ kind: 'expand', sectionTitle: 'Wait', text: 'Waiting is work.' });
            expect(generate.mock.calls[0][0].prompt).toContain('for the section "Wait"');
        });

        it('should need a section title to expand', async () => {
            const { orchestrator, store } = build();
            await store.save(gardening);

            await expect(orchestrator.requestAction(gardening.id, 'expand')).rejects.toThrow(InvalidRequestError);
            expect(generate).not.toHaveBeenCalled();
        });

        it('should fail for an unknown insight', async () => {
            const { orchestrator } = build();
            await expect(orchestrator.requestAction('20990101-000000-000000', 'takeaways')).rejects.toThrow(NotFoundError);
        });
    });
});
