/**
 * Helpers shared by the CLI commands: global options, engine bootstrap and
 * output.
 */

import { Command } from 'commander';
import { Config, SecureConfig, loadConfig } from '../config';
import * as Engine from '../engine';
import { AudioSource } from '../capture';
import { errorMessage, isCapsuleError } from '../errors';
import * as Logging from '../logging';

export interface GlobalOptions {
    config?: string;
    dataDir?: string;
    verbose?: boolean;
    debug?: boolean;
    silent?: boolean;
    localLlm?: boolean;
}

export const print = (text: string) => process.stdout.write(text + '\n');

export const toOverrides = (options: GlobalOptions): Partial<Config> => ({
    ...(options.dataDir ? { dataDirectory: options.dataDir } : {}),
    ...(options.verbose ? { verbose: true } : {}),
    ...(options.debug ? { debug: true } : {}),
    ...(options.silent ? { silent: true } : {}),
    ...(options.localLlm !== undefined ? { useLocalLlm: options.localLlm } : {}),
});

export const configure = async (command: Command, extra: Partial<Config> = {}): Promise<[Config, SecureConfig]> => {
    const options = command.optsWithGlobals<GlobalOptions>();
    if (options.debug) {
        Logging.setLogLevel('debug');
    } else if (options.verbose) {
        Logging.setLogLevel('verbose');
    }

    const [config, secureConfig] = await loadConfig({
        configFile: options.config,
        overrides: { ...toOverrides(options), ...extra },
    });
    if (config.debug) {
        Logging.setLogLevel('debug');
    } else if (config.verbose) {
        Logging.setLogLevel('verbose');
    }
    return [config, secureConfig];
};

export const openEngine = async (
    command: Command,
    options: { extra?: Partial<Config>; audioSource?: AudioSource } = {},
): Promise<Engine.EngineInstance> => {
    const [config, secureConfig] = await configure(command, options.extra);
    return Engine.create(config, secureConfig, { audioSource: options.audioSource });
};

export const fail = (error: unknown): never => {
    const prefix = isCapsuleError(error) ? `Error (${error.code})` : 'Error';
    // eslint-disable-next-line no-console
    console.error(`${prefix}: ${errorMessage(error)}`);
    process.exit(1);
};

export const formatDate = (iso: string): string => iso.replace('T', ' ').replace(/\.\d+Z$/, 'Z');
