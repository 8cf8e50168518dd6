/**
 * Search Synthesizer
 *
 * Retrieval-augmented answers over the insight library: embed the question,
 * pull the nearest insights, pack them into a bounded context and ask the
 * generation gateway to answer from that context only.
 */

import * as Logging from '../logging';
import {
    NoResultsError,
    SearchError,
    errorMessage,
    isCapsuleError,
} from '../errors';
import { Prompts } from '../generation';
import { Insight } from '../store';
import { VectorHit } from '../vector';
import { AnswerOptions, SearchAnswer, SearchConfig, SearchInstance, SearchSource, SearchStats } from './types';

export interface ContextEntry {
    hit: VectorHit;
    insight: Insight;
}

const TRUNCATION_MARK = ' [...]';

const entryText = (insight: Insight): string =>
    (insight.capsule.trim() || insight.transcript.trim());

const entryHeading = (position: number, insight: Insight): string =>
    `[Insight ${position}] ${insight.title} (${insight.createdAt.slice(0, 10)})`;

/**
 * Packs entries, most similar first, until the character budget is spent.
 * Entries that no longer fit are dropped; a first entry that alone exceeds
 * the budget is truncated so the context is never empty.
 */
export const buildContext = (entries: readonly ContextEntry[], maxChars: number): { context: string; included: ContextEntry[] } => {
    const blocks: string[] = [];
    const included: ContextEntry[] = [];
    let used = 0;

    for (const entry of entries) {
        const separator = blocks.length > 0 ? 2 : 0;
        const block = `${entryHeading(blocks.length + 1, entry.insight)}\n${entryText(entry.insight)}`;

        if (used + separator + block.length <= maxChars) {
            blocks.push(block);
            included.push(entry);
            used += separator + block.length;
            continue;
        }

        if (blocks.length === 0) {
            const room = Math.max(0, maxChars - TRUNCATION_MARK.length);
            blocks.push(`${block.slice(0, room)}${TRUNCATION_MARK}`);
            included.push(entry);
        }
        break;
    }

    return { context: blocks.join('\n\n'), included };
};

export const formatSources = (sources: readonly SearchSource[]): string =>
    sources.map((source, i) => `- Insight ${i + 1}: ${source.title} (${source.createdAt.slice(0, 10)})`).join('\n');

export const create = (config: SearchConfig): SearchInstance => {
    const logger = Logging.getLogger();

    const indexSize = async (): Promise<number> => {
        try {
            return await config.index.size();
        } catch (error) {
            throw new SearchError(`Vector index is unavailable: ${errorMessage(error)}`, { cause: error });
        }
    };

    const embedQuery = async (query: string): Promise<number[]> => {
        try {
            return await config.embeddings.embed(query);
        } catch (error) {
            throw new SearchError(`Could not embed the search query: ${errorMessage(error)}`, { cause: error });
        }
    };

    const search = async (query: string, k: number = config.defaultResults): Promise<VectorHit[]> => {
        if (!query.trim()) {
            throw new SearchError('Search query is empty');
        }
        if (await indexSize() === 0) {
            return [];
        }
        const embedding = await embedQuery(query);
        try {
            return await config.index.query(embedding, k);
        } catch (error) {
            throw new SearchError(`Vector lookup failed: ${errorMessage(error)}`, { cause: error });
        }
    };

    const loadEntries = async (hits: readonly VectorHit[]): Promise<ContextEntry[]> => {
        const entries: ContextEntry[] = [];
        for (const hit of hits) {
            try {
                entries.push({ hit, insight: await config.store.load(hit.insightId) });
            } catch (error) {
                if (isCapsuleError(error) && error.code === 'not-found') {
                    logger.warn('Indexed insight %s has no record, skipping', hit.insightId);
                    continue;
                }
                throw new SearchError(`Could not load insight ${hit.insightId}: ${errorMessage(error)}`, { cause: error });
            }
        }
        return entries;
    };

    const answer = async (query: string, options: AnswerOptions = {}): Promise<SearchAnswer> => {
        if (await indexSize() === 0) {
            throw new NoResultsError();
        }

        const hits = await search(query, options.k ?? config.defaultResults);
        if (hits.length === 0) {
            throw new NoResultsError('No insights matched the query');
        }

        const entries = await loadEntries(hits);
        if (entries.length === 0) {
            throw new NoResultsError('None of the matching insights could be loaded');
        }

        const { context, included } = buildContext(entries, config.maxContextChars);
        if (included.length < entries.length) {
            logger.debug('Context budget kept %d of %d insights', included.length, entries.length);
        }

        logger.info('Answering "%s" from %d insights', query, included.length);
        let generated: string;
        try {
            generated = await config.generation.generate({
                role: 'search-answer',
                prompt: Prompts.searchAnswerPrompt(query, context),
                temperature: config.temperature,
                preferLocal: options.preferLocal,
            });
        } catch (error) {
            throw new SearchError(`Could not generate an answer: ${errorMessage(error)}`, { cause: error });
        }

        const sources: SearchSource[] = included.map(({ hit, insight }) => ({
            insightId: insight.id,
            title: insight.title,
            createdAt: insight.createdAt,
            score: hit.score,
        }));

        return {
            answerText: `${generated}\n\nSources:\n${formatSources(sources)}`,
            citedInsightIds: sources.map((source) => source.insightId),
            sources,
        };
    };

    const stats = async (): Promise<SearchStats> => {
        const totalInsights = await indexSize();
        return { totalInsights, searchable: totalInsights > 0 };
    };

    return { answer, search, stats };
};
