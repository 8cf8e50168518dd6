/**
 * Insight Store
 *
 * Records live in `<dataDir>/insights/<id>.md` and are written atomically.
 * `index.md` is derived data: it is upserted after each save under a single
 * lock and can always be regenerated from the records. Draft appends are
 * serialized per insight and run in parallel across insights.
 */

import * as path from 'node:path';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import * as Mutex from '../util/mutex';
import {
    DEFAULT_CHARACTER_ENCODING,
    INDEX_FILE_NAME,
    INSIGHTS_SUBDIRECTORY,
    RAW_TRANSCRIPT_SUBDIRECTORY,
} from '../constants';
import { NotFoundError, StorageError, errorMessage, isCapsuleError, isNotFoundOnDisk } from '../errors';
import { isValidId } from '../util/ids';
import { parseInsight, serializeInsight } from './record';
import { parseIndex, renderIndex, toIndexEntry, upsertEntry } from './index-file';
import { uniqueTags } from './text';
import {
    Draft,
    IndexCheck,
    IndexEntry,
    Insight,
    InsightStoreInstance,
    RawTranscriptData,
    StoreConfig,
} from './types';

const ENCODING = DEFAULT_CHARACTER_ENCODING;

const compareNewestFirst = (a: Insight, b: Insight): number => {
    if (a.createdAt !== b.createdAt) {
        return a.createdAt < b.createdAt ? 1 : -1;
    }
    if (a.id === b.id) {
        return 0;
    }
    return a.id < b.id ? 1 : -1;
};

const sameDraft = (a: Draft, b: Draft): boolean =>
    a.kind === b.kind && a.text === b.text && (a.sectionTitle ?? '') === (b.sectionTitle ?? '');

export const create = (config: StoreConfig): InsightStoreInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });
    const indexLock = Mutex.create();
    const recordLocks = Mutex.createKeyed();

    const insightsDirectory = path.join(config.dataDirectory, INSIGHTS_SUBDIRECTORY);
    const rawTranscriptDirectory = path.join(config.dataDirectory, RAW_TRANSCRIPT_SUBDIRECTORY);

    const recordPath = (id: string): string => path.join(insightsDirectory, `${id}.md`);
    const indexPath = (): string => path.join(config.dataDirectory, INDEX_FILE_NAME);

    const readRecord = async (id: string): Promise<Insight> => {
        if (!isValidId(id)) {
            throw new NotFoundError(`No insight with id "${id}"`);
        }

        let content: string;
        try {
            content = await storage.readFile(recordPath(id), ENCODING);
        } catch (error) {
            if (isNotFoundOnDisk(error)) {
                throw new NotFoundError(`No insight with id "${id}"`);
            }
            throw new StorageError(`Could not read insight ${id}: ${errorMessage(error)}`, { cause: error });
        }

        try {
            return parseInsight(content);
        } catch (error) {
            throw new StorageError(`Insight ${id} is not a valid record: ${errorMessage(error)}`, { cause: error });
        }
    };

    const writeRecord = async (insight: Insight): Promise<void> => {
        try {
            await storage.writeFileAtomic(recordPath(insight.id), serializeInsight(insight), ENCODING);
        } catch (error) {
            throw new StorageError(`Could not write insight ${insight.id}: ${errorMessage(error)}`, { cause: error });
        }
    };

    const listAll = async (): Promise<Insight[]> => {
        const files = await storage.listFiles(insightsDirectory, '*.md');
        const insights: Insight[] = [];
        for (const file of files) {
            const id = path.basename(file, '.md');
            try {
                insights.push(await readRecord(id));
            } catch (error) {
                if (!isCapsuleError(error)) {
                    throw error;
                }
                logger.warn('Skipping unreadable insight record %s: %s', file, error.message);
            }
        }
        return insights.sort(compareNewestFirst);
    };

    const renderFromRecords = async (): Promise<{ content: string; entries: number }> => {
        const insights = await listAll();
        return { content: renderIndex(insights.map(toIndexEntry)), entries: insights.length };
    };

    // Callers hold indexLock
    const rebuildUnlocked = async (): Promise<number> => {
        const { content, entries } = await renderFromRecords();
        await storage.writeFileAtomic(indexPath(), content, ENCODING);
        logger.info('Rebuilt %s with %d entries', indexPath(), entries);
        return entries;
    };

    const readIndexUnlocked = async (): Promise<IndexEntry[]> => {
        try {
            return parseIndex(await storage.readFile(indexPath(), ENCODING));
        } catch (error) {
            if (isNotFoundOnDisk(error)) {
                return [];
            }
            throw error;
        }
    };

    const upsertIndex = async (insight: Insight): Promise<void> => {
        const entries = upsertEntry(await readIndexUnlocked(), toIndexEntry(insight));
        await storage.writeFileAtomic(indexPath(), renderIndex(entries), ENCODING);
    };

    const save = async (insight: Insight): Promise<string> => {
        if (!isValidId(insight.id)) {
            throw new StorageError(`Invalid insight id "${insight.id}"`);
        }
        const record: Insight = {
            ...insight,
            tags: uniqueTags(insight.tags),
            drafts: [...insight.drafts],
        };

        await recordLocks.runExclusive(record.id, async () => {
            if (await storage.exists(recordPath(record.id))) {
                throw new StorageError(`Insight ${record.id} already exists`);
            }
            await writeRecord(record);
        });
        logger.debug('Saved insight %s to %s', record.id, recordPath(record.id));

        try {
            await indexLock.runExclusive(() => upsertIndex(record));
        } catch (error) {
            logger.warn('Index update for %s failed, rebuilding: %s', record.id, errorMessage(error));
            try {
                await indexLock.runExclusive(rebuildUnlocked);
            } catch (rebuildError) {
                // The record is durable; verify-index or rebuild-index repairs index.md later
                logger.error('Insight %s was saved but %s could not be updated: %s', record.id, indexPath(), errorMessage(rebuildError));
            }
        }

        return record.id;
    };

    const appendDraft = async (id: string, draft: Draft): Promise<Insight> => {
        return recordLocks.runExclusive(id, async () => {
            const insight = await readRecord(id);
            if (insight.drafts.some((existing) => sameDraft(existing, draft))) {
                logger.debug('Draft of kind %s is already recorded on %s', draft.kind, id);
                return insight;
            }
            const updated: Insight = { ...insight, drafts: [...insight.drafts, { ...draft }] };
            await writeRecord(updated);
            logger.info('Appended %s draft to insight %s', draft.kind, id);
            return updated;
        });
    };

    const exists = async (id: string): Promise<boolean> =>
        isValidId(id) && storage.isFile(recordPath(id));

    const listRecent = async (limit: number): Promise<Insight[]> => {
        if (limit <= 0) {
            return [];
        }
        return (await listAll()).slice(0, limit);
    };

    const rebuildIndex = async (): Promise<number> => {
        try {
            return await indexLock.runExclusive(rebuildUnlocked);
        } catch (error) {
            throw new StorageError(`Could not rebuild the index: ${errorMessage(error)}`, { cause: error });
        }
    };

    const readIndex = async (): Promise<IndexEntry[]> => {
        try {
            return await indexLock.runExclusive(readIndexUnlocked);
        } catch (error) {
            throw new StorageError(`Could not read the index: ${errorMessage(error)}`, { cause: error });
        }
    };

    const verifyIndex = async (): Promise<IndexCheck> => {
        try {
            return await indexLock.runExclusive(async () => {
                const expected = await renderFromRecords();
                let current: string | null = null;
                try {
                    current = await storage.readFile(indexPath(), ENCODING);
                } catch (error) {
                    if (!isNotFoundOnDisk(error)) {
                        throw error;
                    }
                }
                if (current === expected.content) {
                    return { consistent: true, entries: expected.entries };
                }
                logger.warn('Index at %s does not match the stored insights, rebuilding', indexPath());
                await storage.writeFileAtomic(indexPath(), expected.content, ENCODING);
                return { consistent: false, entries: expected.entries };
            });
        } catch (error) {
            throw new StorageError(`Could not verify the index: ${errorMessage(error)}`, { cause: error });
        }
    };

    const writeRawTranscript = async (data: RawTranscriptData): Promise<string> => {
        const target = path.join(rawTranscriptDirectory, `${data.sessionId}.json`);
        try {
            await storage.writeFileAtomic(target, `${JSON.stringify(data, null, 2)}\n`, ENCODING);
        } catch (error) {
            throw new StorageError(`Could not write raw transcript ${target}: ${errorMessage(error)}`, { cause: error });
        }
        logger.info('Raw transcript kept at %s', target);
        return target;
    };

    return {
        save,
        appendDraft,
        load: readRecord,
        exists,
        listRecent,
        listAll,
        rebuildIndex,
        readIndex,
        verifyIndex,
        writeRawTranscript,
        recordPath,
        indexPath,
    };
};
