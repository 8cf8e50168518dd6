/**
 * Audible cues for the pipeline
 *
 * Plays a short system sound when recording starts or stops and when a
 * capsule is ready or a run fails, so a speaker does not need to watch the
 * terminal.
 *
 * - macOS: afplay with a system sound per cue
 * - Windows: PowerShell SystemSounds
 * - Linux/Other: terminal bell
 */

import { spawn } from 'node:child_process';
import * as Logging from '../logging';
import { errorMessage } from '../errors';
import type { PipelineEvent, PipelineListener } from '../pipeline/types';

export type Cue = 'start' | 'stop' | 'ready' | 'failure';

export interface SoundConfig {
    silent: boolean;
}

export interface SoundInstance {
    play(cue: Cue): Promise<void>;
    isEnabled(): boolean;
    /** Subscribe this to an orchestrator. */
    listener: PipelineListener;
}

const MACOS_SOUNDS: Record<Cue, string> = {
    start: '/System/Library/Sounds/Tink.aiff',
    stop: '/System/Library/Sounds/Pop.aiff',
    ready: '/System/Library/Sounds/Glass.aiff',
    failure: '/System/Library/Sounds/Basso.aiff',
};

const WINDOWS_SOUNDS: Record<Cue, string> = {
    start: 'Asterisk',
    stop: 'Asterisk',
    ready: 'Exclamation',
    failure: 'Hand',
};

export const cueFor = (event: PipelineEvent): Cue | null => {
    switch (event.type) {
        case 'recordingStarted':
            return 'start';
        case 'recordingStopped':
            return 'stop';
        case 'complete':
            return 'ready';
        case 'failed':
            return 'failure';
        default:
            return null;
    }
};

// Resolves once the player has spawned; the sound itself is not awaited
const spawnDetached = (command: string, args: string[], shell = false): Promise<boolean> => {
    return new Promise((resolve) => {
        const child = spawn(command, args, { stdio: 'ignore', detached: true, shell });
        child.on('error', () => resolve(false));
        child.on('close', (code) => resolve(code === 0));
        child.unref();
        setTimeout(() => resolve(true), 50);
    });
};

const playTerminalBell = (): void => {
    process.stdout.write('\x07');
};

export const create = (config: SoundConfig): SoundInstance => {
    const logger = Logging.getLogger();

    const play = async (cue: Cue): Promise<void> => {
        if (config.silent) {
            logger.debug('Sound cue %s skipped (silent mode)', cue);
            return;
        }

        try {
            if (process.platform === 'darwin' && await spawnDetached('afplay', [MACOS_SOUNDS[cue]])) {
                logger.debug('Played %s cue: %s', cue, MACOS_SOUNDS[cue]);
                return;
            }
            if (process.platform === 'win32') {
                const command = `[System.Media.SystemSounds]::${WINDOWS_SOUNDS[cue]}.Play()`;
                if (await spawnDetached('powershell', ['-NoProfile', '-NonInteractive', '-Command', command], true)) {
                    logger.debug('Played %s cue via PowerShell', cue);
                    return;
                }
            }
            playTerminalBell();
            logger.debug('Played terminal bell for %s cue', cue);
        } catch (error) {
            logger.debug('Failed to play %s cue: %s', cue, errorMessage(error));
        }
    };

    const listener: PipelineListener = async (event) => {
        const cue = cueFor(event);
        if (cue) {
            await play(cue);
        }
    };

    return {
        play,
        isEnabled: () => !config.silent,
        listener,
    };
};
