/**
 * Vector Index
 *
 * Embeddings keyed by insight id, persisted as a single JSON file. Writers
 * take a lock, build a new map, persist it atomically and only then swap it
 * in; readers work on whichever map was current when they started.
 */

import { z } from 'zod';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import * as Mutex from '../util/mutex';
import { DEFAULT_CHARACTER_ENCODING, SCORE_TIE_EPSILON } from '../constants';
import { IndexError, errorMessage, isNotFoundOnDisk } from '../errors';
import { compareHits, cosineSimilarity } from './similarity';
import { VectorHit, VectorIndexConfig, VectorIndexInstance, VectorMetadata, VectorRecord } from './types';

const FORMAT_VERSION = 1;

const VectorFileSchema = z.object({
    version: z.literal(FORMAT_VERSION),
    records: z.array(z.object({
        insightId: z.string(),
        embedding: z.array(z.number()),
        metadata: z.object({
            title: z.string(),
            tags: z.array(z.string()),
            createdAt: z.string(),
        }),
    })),
});

type RecordMap = ReadonlyMap<string, VectorRecord>;

const dimensionOf = (records: RecordMap): number | null => {
    for (const record of records.values()) {
        return record.embedding.length;
    }
    return null;
};

// Records in a snapshot are shared; callers only ever see copies
const copyMetadata = (metadata: VectorMetadata): VectorMetadata => ({ ...metadata, tags: [...metadata.tags] });

const copyRecord = (record: VectorRecord): VectorRecord => ({
    insightId: record.insightId,
    embedding: [...record.embedding],
    metadata: copyMetadata(record.metadata),
});

const assertUsableVector = (embedding: readonly number[], label: string): void => {
    if (embedding.length === 0) {
        throw new IndexError(`${label} is empty`);
    }
    if (!embedding.every((value) => Number.isFinite(value))) {
        throw new IndexError(`${label} contains non-finite values`);
    }
};

export const create = (config: VectorIndexConfig): VectorIndexInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });
    const writeLock = Mutex.create();
    const epsilon = config.tieEpsilon ?? SCORE_TIE_EPSILON;

    let records: RecordMap = new Map();
    let loading: Promise<number> | null = null;

    const readFromDisk = async (): Promise<number> => {
        let content: string;
        try {
            content = await storage.readFile(config.filePath, DEFAULT_CHARACTER_ENCODING);
        } catch (error) {
            if (isNotFoundOnDisk(error)) {
                records = new Map();
                return 0;
            }
            throw new IndexError(`Could not read vector index ${config.filePath}: ${errorMessage(error)}`, { cause: error });
        }

        let parsed: z.infer<typeof VectorFileSchema>;
        try {
            parsed = VectorFileSchema.parse(JSON.parse(content));
        } catch (error) {
            throw new IndexError(`Vector index ${config.filePath} is corrupt: ${errorMessage(error)}`, { cause: error });
        }

        records = new Map(parsed.records.map((record) => [record.insightId, record]));
        logger.debug('Loaded %d vectors from %s', records.size, config.filePath);
        return records.size;
    };

    const load = (): Promise<number> => {
        if (!loading) {
            loading = readFromDisk().catch((error: unknown) => {
                loading = null;
                throw error;
            });
        }
        return loading;
    };

    const snapshot = async (): Promise<RecordMap> => {
        await load();
        return records;
    };

    const persist = async (next: RecordMap): Promise<void> => {
        const body = { version: FORMAT_VERSION, records: [...next.values()] };
        try {
            await storage.writeFileAtomic(config.filePath, JSON.stringify(body), DEFAULT_CHARACTER_ENCODING);
        } catch (error) {
            throw new IndexError(`Could not write vector index ${config.filePath}: ${errorMessage(error)}`, { cause: error });
        }
        records = next;
    };

    const add = async (insightId: string, embedding: number[], metadata: VectorMetadata): Promise<void> => {
        assertUsableVector(embedding, `Embedding for ${insightId}`);
        await load();
        await writeLock.runExclusive(async () => {
            const current = records;
            const others = new Map(current);
            others.delete(insightId);
            const dimension = dimensionOf(others);
            if (dimension !== null && dimension !== embedding.length) {
                throw new IndexError(`Embedding for ${insightId} has ${embedding.length} dimensions, index uses ${dimension}`);
            }
            const next = new Map(current);
            next.set(insightId, {
                insightId,
                embedding: [...embedding],
                metadata: copyMetadata(metadata),
            });
            await persist(next);
        });
        logger.debug('Indexed vector for %s', insightId);
    };

    const query = async (embedding: number[], k: number): Promise<VectorHit[]> => {
        const current = await snapshot();
        if (k <= 0 || current.size === 0) {
            return [];
        }
        assertUsableVector(embedding, 'Query embedding');
        const dimension = dimensionOf(current);
        if (dimension !== embedding.length) {
            throw new IndexError(`Query embedding has ${embedding.length} dimensions, index uses ${dimension}`);
        }

        const hits: VectorHit[] = [];
        for (const record of current.values()) {
            hits.push({
                insightId: record.insightId,
                score: cosineSimilarity(embedding, record.embedding),
                metadata: copyMetadata(record.metadata),
            });
        }
        return hits.sort(compareHits(epsilon)).slice(0, k);
    };

    const remove = async (insightId: string): Promise<boolean> => {
        await load();
        return writeLock.runExclusive(async () => {
            if (!records.has(insightId)) {
                return false;
            }
            const next = new Map(records);
            next.delete(insightId);
            await persist(next);
            return true;
        });
    };

    const clear = async (): Promise<void> => {
        await load();
        await writeLock.runExclusive(() => persist(new Map()));
    };

    return {
        load,
        add,
        query,
        remove,
        clear,
        has: async (insightId) => (await snapshot()).has(insightId),
        get: async (insightId) => {
            const record = (await snapshot()).get(insightId);
            return record ? copyRecord(record) : null;
        },
        size: async () => (await snapshot()).size,
        dimension: async () => dimensionOf(await snapshot()),
    };
};
