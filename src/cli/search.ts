/**
 * Search CLI Commands
 */

import { Command } from 'commander';
import Table from 'cli-table3';
import { fail, formatDate, openEngine, print } from './shared';

export const registerSearchCommands = (program: Command): void => {
    program
        .command('ask <question...>')
        .description('Answer a question from your past insights, with sources')
        .option('-k, --results <count>', 'Insights to draw on', (value) => parseInt(value, 10))
        .option('--remote', 'Use the remote model first')
        .action(async (words: string[], options: { results?: number; remote?: boolean }, command: Command) => {
            try {
                const { search } = await openEngine(command);
                const answer = await search.answer(words.join(' '), {
                    k: options.results,
                    ...(options.remote ? { preferLocal: false } : {}),
                });
                print(answer.answerText);
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('search <query...>')
        .description('List the insights closest to a query, without generating an answer')
        .option('-k, --results <count>', 'Number of matches', (value) => parseInt(value, 10))
        .action(async (words: string[], options: { results?: number }, command: Command) => {
            try {
                const { search } = await openEngine(command);
                const hits = await search.search(words.join(' '), options.results);
                if (hits.length === 0) {
                    print('No matching insights');
                    return;
                }
                const table = new Table({
                    head: ['Score', 'ID', 'Created', 'Title'],
                    colWidths: [8, 24, 22, 44],
                    style: { head: ['cyan', 'bold'] },
                    wordWrap: true,
                });
                for (const hit of hits) {
                    table.push([hit.score.toFixed(3), hit.insightId, formatDate(hit.metadata.createdAt), hit.metadata.title]);
                }
                print(table.toString());
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('stats')
        .description('Show how many insights are searchable')
        .action(async (_options: unknown, command: Command) => {
            try {
                const { search } = await openEngine(command);
                const stats = await search.stats();
                print(`${stats.totalInsights} insights indexed${stats.searchable ? '' : ' (search unavailable until one is indexed)'}`);
            } catch (error) {
                fail(error);
            }
        });
};
