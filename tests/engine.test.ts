import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import OpenAI from 'openai';
import * as Engine from '../src/engine';
import { LoadOptions, loadConfig } from '../src/config';

vi.mock('../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('engine', () => {
    let dataDirectory: string;

    beforeEach(async () => {
        dataDirectory = await fs.mkdtemp(path.join(os.tmpdir(), 'capsule-engine-'));
    });

    afterEach(async () => {
        await fs.rm(dataDirectory, { recursive: true, force: true });
    });

    const configure = (overrides: LoadOptions = {}) =>
        loadConfig({
            configFile: path.join(dataDirectory, 'config.yaml'),
            env: {},
            ...overrides,
            overrides: { dataDirectory, useLocalLlm: false, ...overrides.overrides },
        });

    describe('embeddingModelFor', () => {
        it('should switch the default model for local embeddings', async () => {
            const [config] = await configure({ overrides: { embeddingProvider: 'local' } });
            expect(Engine.embeddingModelFor(config)).toBe('nomic-embed-text');
        });

        it('should keep an explicit model', async () => {
            const [local] = await configure({ overrides: { embeddingProvider: 'local', embeddingModel: 'mxbai-embed-large' } });
            const [remote] = await configure();

            expect(Engine.embeddingModelFor(local)).toBe('mxbai-embed-large');
            expect(Engine.embeddingModelFor(remote)).toBe('text-embedding-3-small');
        });
    });

    describe('create', () => {
        it('should list the generation backends in order', async () => {
            const [config, secure] = await configure();
            const engine = Engine.create(config, secure);

            expect(engine.generation.backends()).toEqual(['ollama:llama3.2', 'openai:gpt-4o-mini']);
            expect(engine.orchestrator.getState()).toBe('idle');
        });

        it('should wire a file through to a searchable insight', async () => {
            const client = {
                audio: { transcriptions: { create: vi.fn().mockResolvedValue({ text: 'Morning pages clear the head #writing' }) } },
                chat: { completions: { create: vi.fn().mockResolvedValue({ choices: [{ message: { content: 'Write first, think later.' } }] }) } },
                embeddings: { create: vi.fn().mockResolvedValue({ data: [{ embedding: [0.6, 0.8] }] }) },
            };
            const [config, secure] = await configure();
            const engine = Engine.create(config, secure, {
                openaiClient: client as unknown as OpenAI,
                now: () => new Date('2024-05-01T07:30:00.000Z'),
            });
            const memo = path.join(dataDirectory, 'memo.wav');
            await fs.writeFile(memo, Buffer.alloc(64));

            const outcome = await engine.orchestrator.processFile(memo);
            await engine.shutdown();

            expect(outcome.status).toBe('complete');
            if (outcome.status !== 'complete') return;
            expect(outcome.insight.capsule).toBe('Write first, think later.');
            expect(outcome.insight.tags).toEqual(['writing']);
            expect(await engine.store.exists(outcome.insight.id)).toBe(true);
            await expect(engine.index.has(outcome.insight.id)).resolves.toBe(true);
            await expect(fs.stat(path.join(dataDirectory, 'vectors.json'))).resolves.toBeDefined();

            const hits = await engine.search.search('clear head');
            expect(hits.map((hit) => hit.insightId)).toEqual([outcome.insight.id]);
            await expect(engine.search.stats()).resolves.toMatchObject({ totalInsights: 1, searchable: true });
        });
    });
});
