/**
 * Capture CLI Commands
 *
 * `record` captures raw PCM from stdin until Ctrl-C, end of input or a
 * stretch of silence. `process` runs an existing audio file through the same
 * stages.
 */

import { Command } from 'commander';
import * as path from 'node:path';
import * as Pipeline from '../pipeline';
import { StdinSource } from '../capture';
import { Insight } from '../store';
import * as Sound from '../util/sound';
import { fail, openEngine, print } from './shared';

export const describeEvent = (event: Pipeline.PipelineEvent): string | null => {
    switch (event.type) {
        case 'recordingStarted':
            return 'Recording... press Ctrl-C to stop';
        case 'recordingStopped':
            return event.reason === 'aborted'
                ? 'Recording aborted'
                : `Recording stopped (${event.reason})`;
        case 'autoStopSuggested':
            return 'Silence detected; press Ctrl-C to finish';
        case 'processingStageChanged':
            return `  ${event.stage}...`;
        case 'failed': {
            const kept = [event.audioPath, event.transcriptPath].filter((p): p is string => p !== null);
            return `Failed (${event.reason}): ${event.message}${kept.length > 0 ? `\nKept: ${kept.join(', ')}` : ''}`;
        }
        case 'indexed':
            return event.ok ? null : `Insight ${event.insightId} is saved but not searchable yet: ${event.error ?? 'unknown error'}`;
        case 'complete':
            return null;
    }
};

const printInsight = (insight: Insight): void => {
    print('');
    print(`# ${insight.title}`);
    if (insight.tags.length > 0) {
        print(insight.tags.map((tag) => `#${tag}`).join(' '));
    }
    print('');
    print(insight.capsule);
    print('');
    print(`Saved as ${insight.id}`);
};

const onEvent = (event: Pipeline.PipelineEvent): void => {
    const line = describeEvent(event);
    if (line) {
        print(line);
    }
    if (event.type === 'complete') {
        printInsight(event.insight);
    }
};

/** Resolves with the exit code once the run reaches a terminal event. */
const waitForOutcome = (orchestrator: Pipeline.OrchestratorInstance): Promise<number> =>
    new Promise((resolve) => {
        const unsubscribe = orchestrator.subscribe((event) => {
            if (event.type === 'complete') {
                unsubscribe();
                resolve(0);
            } else if (event.type === 'failed') {
                unsubscribe();
                resolve(1);
            } else if (event.type === 'recordingStopped' && event.reason === 'aborted') {
                unsubscribe();
                resolve(130);
            }
        });
    });

export const registerCaptureCommands = (program: Command): void => {
    program
        .command('record')
        .description('Record from stdin (16-bit little-endian PCM) and turn it into an insight')
        .option('--sample-rate <hz>', 'Sample rate of the incoming audio', (value) => parseInt(value, 10))
        .option('--no-auto-stop', 'Only suggest stopping when silence is detected')
        .option('--discard-audio', 'Delete the recording once the insight is saved')
        .addHelpText('after', `
Examples:
  arecord -f S16_LE -r 16000 -c 1 -t raw | insight-capsule record
  sox -d -t raw -b 16 -e signed -c 1 -r 16000 - | insight-capsule record --no-auto-stop
`)
        .action(async (options: { sampleRate?: number; autoStop: boolean; discardAudio?: boolean }, command: Command) => {
            try {
                const engine = await openEngine(command, {
                    audioSource: StdinSource.create(),
                    extra: {
                        ...(options.sampleRate ? { sampleRate: options.sampleRate } : {}),
                        ...(options.autoStop ? {} : { autoStopOnSilence: false }),
                        ...(options.discardAudio ? { retainAudio: false } : {}),
                    },
                });
                const { orchestrator } = engine;
                const sound = Sound.create({ silent: engine.config.silent });
                orchestrator.subscribe(onEvent);
                orchestrator.subscribe(sound.listener);
                const outcome = waitForOutcome(orchestrator);

                let interrupts = 0;
                process.on('SIGINT', () => {
                    interrupts++;
                    const request = interrupts === 1 && orchestrator.getState() === 'recording'
                        ? orchestrator.stopCapture()
                        : orchestrator.abortCapture();
                    request.catch((error: unknown) => fail(error));
                });

                await orchestrator.startCapture();
                const code = await outcome;
                await engine.shutdown();
                process.exit(code);
            } catch (error) {
                fail(error);
            }
        });

    program
        .command('process <audioFile>')
        .description('Transcribe an existing audio file and turn it into an insight')
        .action(async (audioFile: string, _options: unknown, command: Command) => {
            try {
                const engine = await openEngine(command);
                engine.orchestrator.subscribe(onEvent);
                const outcome = await engine.orchestrator.processFile(path.resolve(audioFile));
                await engine.shutdown();
                if (outcome.status === 'failed') {
                    process.exit(1);
                }
            } catch (error) {
                fail(error);
            }
        });
};
