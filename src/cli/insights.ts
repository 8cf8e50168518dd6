/**
 * Insight CLI Commands
 *
 * Browse stored insights, ask for follow-up drafts and repair the indexes.
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { InvalidRequestError } from '../errors';
import { DRAFT_KINDS, DraftKind, Insight, serializeInsight } from '../store';
import { fail, formatDate, openEngine, print } from './shared';

const isDraftKind = (value: string): value is DraftKind =>
    DRAFT_KINDS.some((kind) => kind === value);

export const insightTable = (insights: readonly Insight[]): string => {
    const table = new Table({
        head: ['ID', 'Created', 'Title', 'Tags', 'Drafts'],
        colWidths: [24, 22, 40, 24, 8],
        style: { head: ['cyan', 'bold'] },
        wordWrap: true,
    });
    for (const insight of insights) {
        table.push([
            insight.id,
            formatDate(insight.createdAt),
            insight.title,
            insight.tags.map((tag) => `#${tag}`).join(' '),
            String(insight.drafts.length),
        ]);
    }
    return table.toString();
};

export const registerInsightCommands = (program: Command): void => {
    program
        .command('list')
        .description('List recent insights, newest first')
        .option('-n, --limit <count>', 'Number of insights to show', (value) => parseInt(value, 10), 20)
        .action(async (options: { limit: number }, command: Command) => {
            try {
                const { store } = await openEngine(command);
                const insights = await store.listRecent(options.limit);
                if (insights.length === 0) {
                    print('No insights yet. Try: insight-capsule record');
                    return;
                }
                print(insightTable(insights));
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('show <id>')
        .description('Print a stored insight as Markdown')
        .action(async (id: string, _options: unknown, command: Command) => {
            try {
                const { store } = await openEngine(command);
                print(serializeInsight(await store.load(id)));
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('draft <id> <kind>')
        .description(`Generate a follow-up for an insight (${DRAFT_KINDS.join(', ')})`)
        .option('-s, --section <title>', 'Section to expand (required for expand)')
        .option('--remote', 'Use the remote model first')
        .addHelpText('after', `
Examples:
  insight-capsule draft 20261018-093000-a1b2c3 outline
  insight-capsule draft 20261018-093000-a1b2c3 expand --section "Why it matters"
`)
        .action(async (id: string, kind: string, options: { section?: string; remote?: boolean }, command: Command) => {
            try {
                if (!isDraftKind(kind)) {
                    throw new InvalidRequestError(`Unknown draft kind "${kind}", expected one of: ${DRAFT_KINDS.join(', ')}`);
                }
                const engine = await openEngine(command);
                const draft = await engine.orchestrator.requestAction(id, kind, {
                    sectionTitle: options.section,
                    ...(options.remote ? { preferLocal: false } : {}),
                });
                print(draft.text);
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('rebuild-index')
        .description('Regenerate index.md from the stored insights')
        .action(async (_options: unknown, command: Command) => {
            try {
                const { store } = await openEngine(command);
                const count = await store.rebuildIndex();
                print(`Index rebuilt with ${count} insights: ${store.indexPath()}`);
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('verify-index')
        .description('Check index.md against the stored insights and repair it if needed')
        .action(async (_options: unknown, command: Command) => {
            try {
                const { store } = await openEngine(command);
                const check = await store.verifyIndex();
                print(check.consistent
                    ? `Index is consistent (${check.entries} insights)`
                    : `Index was out of date and has been rebuilt (${check.entries} insights)`);
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('reindex')
        .description('Re-embed every stored insight into the search index')
        .action(async (_options: unknown, command: Command) => {
            try {
                const { indexer } = await openEngine(command);
                const summary = await indexer.reindexAll();
                print(`Indexed ${summary.indexed} insights${summary.failed > 0 ? `, ${summary.failed} failed` : ''}`);
                if (summary.failed > 0) {
                    process.exit(1);
                }
            } catch (error) {
                fail(error);
            }
        });
};
