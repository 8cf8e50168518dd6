/**
 * Configuration
 *
 * Values are merged in increasing precedence: built-in defaults, the YAML
 * config file, environment variables, then explicit overrides (CLI flags).
 * The merged result is validated once with zod; every problem surfaces as a
 * ConfigError. The API key is kept apart from the rest so the config can be
 * logged.
 */

import * as os from 'node:os';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { CAPSULE_DEFAULTS, DEFAULT_CHARACTER_ENCODING, DEFAULT_CONFIG_FILE_NAME } from './constants';
import { ConfigError, errorMessage, isNotFoundOnDisk } from './errors';
import * as Logging from './logging';
import * as Storage from './util/storage';

export const ConfigSchema = z.object({
    verbose: z.boolean(),
    debug: z.boolean(),
    silent: z.boolean(),
    dataDirectory: z.string().min(1),
    configDirectory: z.string().min(1),
    sampleRate: z.number().int().positive(),
    channels: z.number().int().positive(),
    silenceDetection: z.boolean(),
    silenceThreshold: z.number().min(0).max(1),
    silenceDurationMs: z.number().int().positive(),
    autoStopOnSilence: z.boolean(),
    retainAudio: z.boolean(),
    useLocalLlm: z.boolean(),
    localLlmUrl: z.string().url(),
    localLlmModel: z.string().min(1),
    remoteModel: z.string().min(1),
    temperature: z.number().min(0).max(2),
    localAttempts: z.number().int().positive(),
    remoteAttempts: z.number().int().positive(),
    backoffInitialMs: z.number().int().nonnegative(),
    backoffMultiplier: z.number().min(1),
    backoffMaxMs: z.number().int().nonnegative(),
    transcriptionModel: z.enum(['whisper-1', 'gpt-4o-mini-transcribe', 'gpt-4o-transcribe']),
    embeddingProvider: z.enum(['openai', 'local']),
    embeddingModel: z.string().min(1),
    searchResults: z.number().int().positive(),
    maxContextChars: z.number().int().positive(),
});

export type Config = z.infer<typeof ConfigSchema>;

export interface SecureConfig {
    openaiApiKey?: string;
}

const FileSchema = ConfigSchema.partial().strict();

export interface LoadOptions {
    /** Explicit config file; defaults to `<configDirectory>/config.yaml`. */
    configFile?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: Partial<Config>;
}

const describeIssues = (error: z.ZodError): string =>
    error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');

export const expandHome = (value: string): string => {
    if (value === '~') {
        return os.homedir();
    }
    if (value.startsWith('~/')) {
        return path.join(os.homedir(), value.slice(2));
    }
    return value;
};

const parseBoolean = (name: string, value: string): boolean => {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) {
        return true;
    }
    if (['0', 'false', 'no', 'off'].includes(normalized)) {
        return false;
    }
    throw new ConfigError(`${name} must be true or false, got "${value}"`);
};

export const readConfigFile = async (filePath: string): Promise<Partial<Config>> => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: logger.debug });

    let content: string;
    try {
        content = await storage.readFile(filePath, DEFAULT_CHARACTER_ENCODING);
    } catch (error) {
        if (isNotFoundOnDisk(error)) {
            logger.debug('No config file at %s, using defaults', filePath);
            return {};
        }
        throw new ConfigError(`Could not read config file ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = yaml.load(content);
    } catch (error) {
        throw new ConfigError(`Config file ${filePath} is not valid YAML: ${errorMessage(error)}`, { cause: error });
    }
    if (parsed === undefined || parsed === null) {
        return {};
    }

    const result = FileSchema.safeParse(parsed);
    if (!result.success) {
        throw new ConfigError(`Invalid config file ${filePath}: ${describeIssues(result.error)}`, { cause: result.error });
    }
    logger.debug('Loaded config file %s', filePath);
    return result.data;
};

export const fromEnvironment = (env: NodeJS.ProcessEnv): [Partial<Config>, SecureConfig] => {
    const values: Partial<Config> = {};
    if (env.CAPSULE_DATA_DIR) values.dataDirectory = env.CAPSULE_DATA_DIR;
    if (env.LOCAL_LLM_URL) values.localLlmUrl = env.LOCAL_LLM_URL;
    if (env.LOCAL_LLM_MODEL) values.localLlmModel = env.LOCAL_LLM_MODEL;
    if (env.USE_LOCAL_LLM) values.useLocalLlm = parseBoolean('USE_LOCAL_LLM', env.USE_LOCAL_LLM);

    const secure: SecureConfig = {
        ...(env.OPENAI_API_KEY ? { openaiApiKey: env.OPENAI_API_KEY } : {}),
    };
    return [values, secure];
};

export const loadConfig = async (options: LoadOptions = {}): Promise<[Config, SecureConfig]> => {
    const logger = Logging.getLogger();
    const overrides = options.overrides ?? {};
    const configDirectory = overrides.configDirectory ?? CAPSULE_DEFAULTS.configDirectory;
    const configFile = options.configFile ?? path.join(configDirectory, DEFAULT_CONFIG_FILE_NAME);

    const fileValues = await readConfigFile(configFile);
    const [envValues, secureConfig] = fromEnvironment(options.env ?? process.env);

    const merged = {
        ...CAPSULE_DEFAULTS,
        ...fileValues,
        ...envValues,
        ...overrides,
    };

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
        throw new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`, { cause: result.error });
    }

    const config: Config = {
        ...result.data,
        dataDirectory: path.resolve(expandHome(result.data.dataDirectory)),
    };
    logger.debug('Final configuration: %s', JSON.stringify(config, null, 2));
    return [config, secureConfig];
};
