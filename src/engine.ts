/**
 * Engine
 *
 * Composition root: builds every subsystem from one validated Config and
 * hands back the orchestrator, search and store the CLI drives.
 */

import * as path from 'node:path';
import OpenAI from 'openai';
import {
    AUDIO_SUBDIRECTORY,
    DEFAULT_EMBEDDING_ATTEMPTS,
    DEFAULT_EMBEDDING_MODEL,
    DEFAULT_LOCAL_EMBEDDING_MODEL,
    SCORE_TIE_EPSILON,
    VECTOR_INDEX_FILE_NAME,
} from './constants';
import { Config, SecureConfig } from './config';
import * as Logging from './logging';
import { AudioSource } from './capture';
import * as Embedding from './embedding';
import * as Generation from './generation';
import * as Pipeline from './pipeline';
import * as Search from './search';
import * as Store from './store';
import * as Transcription from './transcription';
import * as Vector from './vector';
import { Sleep } from './util/retry';

export interface EngineOptions {
    audioSource?: AudioSource;
    /** Shared by transcription, generation and embeddings when set. */
    openaiClient?: OpenAI;
    sleep?: Sleep;
    now?: () => Date;
}

export interface EngineInstance {
    config: Config;
    orchestrator: Pipeline.OrchestratorInstance;
    search: Search.SearchInstance;
    store: Store.InsightStoreInstance;
    index: Vector.VectorIndexInstance;
    indexer: Pipeline.IndexerInstance;
    generation: Generation.GatewayInstance;
    /** Waits for the pipeline to go idle and for background indexing to finish. */
    shutdown(): Promise<void>;
}

export const embeddingModelFor = (config: Config): string =>
    config.embeddingProvider === 'local' && config.embeddingModel === DEFAULT_EMBEDDING_MODEL
        ? DEFAULT_LOCAL_EMBEDDING_MODEL
        : config.embeddingModel;

export const create = (config: Config, secureConfig: SecureConfig, options: EngineOptions = {}): EngineInstance => {
    const logger = Logging.getLogger();
    const apiKey = secureConfig.openaiApiKey;

    const store = Store.create({ dataDirectory: config.dataDirectory });
    const index = Vector.create({
        filePath: path.join(config.dataDirectory, VECTOR_INDEX_FILE_NAME),
        tieEpsilon: SCORE_TIE_EPSILON,
    });

    const generation = Generation.create({
        useLocalLlm: config.useLocalLlm,
        localLlmUrl: config.localLlmUrl,
        localLlmModel: config.localLlmModel,
        remoteModel: config.remoteModel,
        apiKey,
        temperature: config.temperature,
        localAttempts: config.localAttempts,
        remoteAttempts: config.remoteAttempts,
        backoffInitialMs: config.backoffInitialMs,
        backoffMultiplier: config.backoffMultiplier,
        backoffMaxMs: config.backoffMaxMs,
        openaiClient: options.openaiClient,
        sleep: options.sleep,
    });

    const embeddings = Embedding.create({
        provider: config.embeddingProvider,
        model: embeddingModelFor(config),
        apiKey,
        localLlmUrl: config.localLlmUrl,
        policy: {
            attempts: DEFAULT_EMBEDDING_ATTEMPTS,
            initialDelayMs: config.backoffInitialMs,
            multiplier: config.backoffMultiplier,
            maxDelayMs: config.backoffMaxMs,
        },
        openaiClient: options.openaiClient,
        sleep: options.sleep,
    });

    const transcription = Transcription.create({
        apiKey,
        model: config.transcriptionModel,
        openaiClient: options.openaiClient,
    });

    const indexer = Pipeline.Indexer.create({ embeddings, index, store });

    const search = Search.create({
        embeddings,
        index,
        store,
        generation,
        defaultResults: config.searchResults,
        maxContextChars: config.maxContextChars,
        temperature: config.temperature,
    });

    const orchestrator = Pipeline.create({
        transcription,
        generation,
        store,
        indexer,
        capture: {
            audioDirectory: path.join(config.dataDirectory, AUDIO_SUBDIRECTORY),
            sampleRate: config.sampleRate,
            channels: config.channels,
            silenceDetection: config.silenceDetection,
            silenceThreshold: config.silenceThreshold,
            silenceDurationMs: config.silenceDurationMs,
        },
        audioSource: options.audioSource,
        autoStopOnSilence: config.autoStopOnSilence,
        retainAudio: config.retainAudio,
        temperature: config.temperature,
        now: options.now,
    });

    logger.debug('Engine ready, data in %s', config.dataDirectory);

    const shutdown = async (): Promise<void> => {
        await orchestrator.whenIdle();
        await indexer.drain();
        await orchestrator.flushEvents();
    };

    return {
        config,
        orchestrator,
        search,
        store,
        index,
        indexer,
        generation,
        shutdown,
    };
};
