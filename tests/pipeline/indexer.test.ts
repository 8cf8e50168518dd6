import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import * as Pipeline from '../../src/pipeline';
import * as Store from '../../src/store';
import * as Vector from '../../src/vector';
import { EmbeddingError } from '../../src/errors';
import { coffee, gardening } from '../store/fixtures';

vi.mock('../../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('indexer', () => {
    let dataDirectory: string;
    let store: Store.InsightStoreInstance;
    let index: Vector.VectorIndexInstance;
    const embed = vi.fn();

    beforeEach(async () => {
        dataDirectory = await fs.mkdtemp(path.join(os.tmpdir(), 'capsule-indexer-'));
        store = Store.create({ dataDirectory });
        index = Vector.create({ filePath: path.join(dataDirectory, 'vectors.json') });
        embed.mockReset();
    });

    afterEach(async () => {
        await fs.rm(dataDirectory, { recursive: true, force: true });
    });

    it('should embed title, capsule and transcript together', () => {
        expect(Pipeline.Indexer.embeddingText(coffee)).toBe(
            'Cold [brew] notes\n\nSlow extraction gives a smoother cup.\n\nCold brew needs twelve hours.',
        );
    });

    it('should store the vector with the insight metadata', async () => {
        embed.mockResolvedValue([0.1, 0.9]);
        const indexer = Pipeline.Indexer.create({ embeddings: { embed }, index, store });

        await indexer.index(gardening);

        await expect(index.get(gardening.id)).resolves.toEqual({
            insightId: gardening.id,
            embedding: [0.1, 0.9],
            metadata: { title: gardening.title, tags: gardening.tags, createdAt: gardening.createdAt },
        });
    });

    it('should report background results through the callback', async () => {
        embed.mockResolvedValueOnce([1, 0]).mockRejectedValueOnce(new EmbeddingError('provider down'));
        const indexer = Pipeline.Indexer.create({ embeddings: { embed }, index, store });
        const onDone = vi.fn();

        indexer.schedule(gardening, onDone);
        indexer.schedule(coffee, onDone);
        expect(indexer.pending()).toBe(2);
        await indexer.drain();

        expect(indexer.pending()).toBe(0);
        expect(onDone).toHaveBeenCalledWith(gardening.id, true);
        expect(onDone).toHaveBeenCalledWith(coffee.id, false, 'provider down');
        await expect(index.size()).resolves.toBe(1);
    });

    it('should reindex every stored insight and count failures', async () => {
        await store.save(gardening);
        await store.save(coffee);
        embed.mockImplementation(async (text: string) => {
            if (text.startsWith('Cold')) {
                throw new EmbeddingError('too cold');
            }
            return [1, 0];
        });
        const indexer = Pipeline.Indexer.create({ embeddings: { embed }, index, store });

        await expect(indexer.reindexAll()).resolves.toEqual({ indexed: 1, failed: 1 });
        await expect(index.has(gardening.id)).resolves.toBe(true);
    });
});
