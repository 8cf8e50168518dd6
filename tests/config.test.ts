import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { expandHome, fromEnvironment, loadConfig, readConfigFile } from '../src/config';
import { DEFAULT_DATA_DIR } from '../src/constants';
import { ConfigError } from '../src/errors';

vi.mock('../src/logging', () => ({
    getLogger: () => ({
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    }),
}));

describe('config', () => {
    let tempDir: string;
    let configFile: string;

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'capsule-config-'));
        configFile = path.join(tempDir, 'config.yaml');
    });

    afterEach(async () => {
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    describe('loadConfig', () => {
        it('should fall back to defaults without a config file', async () => {
            const [config, secure] = await loadConfig({ configFile, env: {} });

            expect(config.dataDirectory).toBe(DEFAULT_DATA_DIR);
            expect(config.localLlmModel).toBe('llama3.2');
            expect(config.localAttempts).toBe(3);
            expect(config.remoteAttempts).toBe(1);
            expect(config.silenceDurationMs).toBe(2000);
            expect(config.retainAudio).toBe(true);
            expect(secure).toEqual({});
        });

        it('should read values from the YAML file', async () => {
            await fs.writeFile(configFile, 'remoteModel: gpt-4o\nsilenceDurationMs: 1500\nretainAudio: false\n');

            const [config] = await loadConfig({ configFile, env: {} });

            expect(config.remoteModel).toBe('gpt-4o');
            expect(config.silenceDurationMs).toBe(1500);
            expect(config.retainAudio).toBe(false);
        });

        it('should look for config.yaml in the config directory by default', async () => {
            await fs.writeFile(configFile, 'searchResults: 8\n');

            const [config] = await loadConfig({ env: {}, overrides: { configDirectory: tempDir } });

            expect(config.searchResults).toBe(8);
        });

        it('should let the environment override the file and overrides beat both', async () => {
            await fs.writeFile(configFile, 'localLlmModel: mistral\nuseLocalLlm: true\n');
            const env = { LOCAL_LLM_MODEL: 'qwen2', USE_LOCAL_LLM: 'off' };

            const [fromEnv] = await loadConfig({ configFile, env });
            const [fromFlags] = await loadConfig({ configFile, env, overrides: { localLlmModel: 'phi3' } });

            expect(fromEnv.localLlmModel).toBe('qwen2');
            expect(fromEnv.useLocalLlm).toBe(false);
            expect(fromFlags.localLlmModel).toBe('phi3');
        });

        it('should expand and resolve the data directory', async () => {
            const [home] = await loadConfig({ configFile, env: { CAPSULE_DATA_DIR: '~/capsules' } });
            const [relative] = await loadConfig({ configFile, env: {}, overrides: { dataDirectory: 'notes' } });

            expect(home.dataDirectory).toBe(path.join(os.homedir(), 'capsules'));
            expect(relative.dataDirectory).toBe(path.resolve('notes'));
        });

        it('should keep the API key out of the config', async () => {
            const [config, secure] = await loadConfig({ configFile, env: { OPENAI_API_KEY: 'test-secret' } });

            expect(secure).toEqual({ openaiApiKey: 'test-secret' });
            expect(JSON.stringify(config)).not.toContain('test-secret');
        });

        it('should reject values outside their range', async () => {
            await expect(loadConfig({ configFile, env: {}, overrides: { temperature: 3 } }))
                .rejects.toThrow(/^Invalid configuration: temperature: /);
        });
    });

    describe('readConfigFile', () => {
        it('should treat an empty file as no settings', async () => {
            await fs.writeFile(configFile, '');
            await expect(readConfigFile(configFile)).resolves.toEqual({});
        });

        it('should reject unknown keys', async () => {
            await fs.writeFile(configFile, 'colour: blue\n');
            await expect(readConfigFile(configFile)).rejects.toThrow(ConfigError);
            await expect(readConfigFile(configFile)).rejects.toThrow(`Invalid config file ${configFile}`);
        });

        it('should reject values of the wrong type', async () => {
            await fs.writeFile(configFile, 'sampleRate: fast\n');
            await expect(readConfigFile(configFile)).rejects.toThrow(/sampleRate: /);
        });

        it('should reject malformed YAML', async () => {
            await fs.writeFile(configFile, 'models: [llama3.2, mistral\n');
            await expect(readConfigFile(configFile)).rejects.toThrow(`Config file ${configFile} is not valid YAML`);
        });
    });

    describe('fromEnvironment', () => {
        it('should map the known variables', () => {
            const [values, secure] = fromEnvironment({
                CAPSULE_DATA_DIR: '/data/capsules',
                LOCAL_LLM_URL: 'http://ollama:11434',
                LOCAL_LLM_MODEL: 'mistral',
                USE_LOCAL_LLM: 'Yes',
                OPENAI_API_KEY: 'test-secret',
                UNRELATED: 'ignored',
            });

            expect(values).toEqual({
                dataDirectory: '/data/capsules',
                localLlmUrl: 'http://ollama:11434',
                localLlmModel: 'mistral',
                useLocalLlm: true,
            });
            expect(secure).toEqual({ openaiApiKey: 'test-secret' });
        });

        it('should reject a flag that is not a boolean', () => {
            expect(() => fromEnvironment({ USE_LOCAL_LLM: 'maybe' }))
                .toThrow('USE_LOCAL_LLM must be true or false, got "maybe"');
        });
    });

    describe('expandHome', () => {
        it('should expand a leading tilde only', () => {
            expect(expandHome('~')).toBe(os.homedir());
            expect(expandHome('~/notes')).toBe(path.join(os.homedir(), 'notes'));
            expect(expandHome('/srv/~notes')).toBe('/srv/~notes');
        });
    });
});
