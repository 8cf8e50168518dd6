/**
 * Background indexing of saved insights into the vector index.
 */

import * as Logging from '../logging';
import { errorMessage } from '../errors';
import { Insight } from '../store';
import { IndexedCallback, IndexerConfig, IndexerInstance, ReindexSummary } from './types';

export const embeddingText = (insight: Insight): string =>
    [insight.title, insight.capsule, insight.transcript]
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
        .join('\n\n');

export const create = (config: IndexerConfig): IndexerInstance => {
    const logger = Logging.getLogger();
    const inFlight = new Set<Promise<void>>();

    const index = async (insight: Insight): Promise<void> => {
        const embedding = await config.embeddings.embed(embeddingText(insight));
        await config.index.add(insight.id, embedding, {
            title: insight.title,
            tags: insight.tags,
            createdAt: insight.createdAt,
        });
        logger.debug('Insight %s is searchable', insight.id);
    };

    const schedule = (insight: Insight, onDone?: IndexedCallback): void => {
        const job = index(insight).then(
            () => {
                onDone?.(insight.id, true);
            },
            (error: unknown) => {
                logger.warn('Indexing insight %s failed, run reindex to repair: %s', insight.id, errorMessage(error));
                onDone?.(insight.id, false, errorMessage(error));
            },
        );
        inFlight.add(job);
        job.finally(() => inFlight.delete(job)).catch((error: unknown) => {
            logger.error('Indexing bookkeeping failed: %s', errorMessage(error));
        });
    };

    const drain = async (): Promise<void> => {
        while (inFlight.size > 0) {
            await Promise.all([...inFlight]);
        }
    };

    const reindexAll = async (): Promise<ReindexSummary> => {
        const insights = await config.store.listAll();
        const summary: ReindexSummary = { indexed: 0, failed: 0 };
        for (const insight of insights) {
            try {
                await index(insight);
                summary.indexed++;
            } catch (error) {
                summary.failed++;
                logger.warn('Could not reindex insight %s: %s', insight.id, errorMessage(error));
            }
        }
        logger.info('Reindexed %d insights (%d failed)', summary.indexed, summary.failed);
        return summary;
    };

    return {
        index,
        schedule,
        drain,
        reindexAll,
        pending: () => inFlight.size,
    };
};
