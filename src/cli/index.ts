/**
 * CLI Entry Point
 *
 * Builds the commander program with the global options every command shares.
 */

import { Command } from 'commander';
import { PROGRAM_NAME, VERSION } from '../constants';
import { registerCaptureCommands } from './capture';
import { registerInsightCommands } from './insights';
import { registerSearchCommands } from './search';

export const createProgram = (): Command => {
    const program = new Command();

    program
        .name(PROGRAM_NAME)
        .version(VERSION)
        .description('Speak an idea, get back a titled, tagged and searchable insight')
        .option('-c, --config <file>', 'Config file (default: ./.insight-capsule/config.yaml)')
        .option('-d, --data-dir <dir>', 'Where insights, audio and indexes are kept')
        .option('--local-llm', 'Try the local Ollama model before the remote one')
        .option('--no-local-llm', 'Skip the local Ollama model')
        .option('-v, --verbose', 'Verbose logging')
        .option('--debug', 'Debug logging')
        .option('--silent', 'No sound cues');

    registerCaptureCommands(program);
    registerInsightCommands(program);
    registerSearchCommands(program);

    program.addHelpText('after', `
Capture:
  ${PROGRAM_NAME} record                   Record from stdin until Ctrl-C or silence
  ${PROGRAM_NAME} process <file>           Turn an existing recording into an insight

Browse and develop:
  ${PROGRAM_NAME} list                     Recent insights
  ${PROGRAM_NAME} show <id>                One insight as Markdown
  ${PROGRAM_NAME} draft <id> <kind>        outline, draft, takeaways or expand

Search:
  ${PROGRAM_NAME} ask <question>           Answer from past insights, with sources
  ${PROGRAM_NAME} search <query>           Closest insights by meaning

Maintenance:
  ${PROGRAM_NAME} rebuild-index            Regenerate index.md
  ${PROGRAM_NAME} verify-index             Repair index.md if it drifted
  ${PROGRAM_NAME} reindex                  Re-embed every insight
`);

    return program;
};

export const runCLI = async (argv: string[] = process.argv): Promise<void> => {
    await createProgram().parseAsync(argv);
};
