import os from 'node:os';
import path from 'node:path';

export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_TAGS__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'insight-capsule';
export const DEFAULT_CHARACTER_ENCODING = 'utf-8';

export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;
export const DEFAULT_CONFIG_FILE_NAME = 'config.yaml';
export const DEFAULT_DATA_DIR = path.join(os.homedir(), `.${PROGRAM_NAME}`, 'data');

// Persisted layout, relative to the data directory
export const INSIGHTS_SUBDIRECTORY = 'insights';
export const AUDIO_SUBDIRECTORY = 'audio';
export const RAW_TRANSCRIPT_SUBDIRECTORY = '.transcript';
export const INDEX_FILE_NAME = 'index.md';
export const VECTOR_INDEX_FILE_NAME = 'vectors.json';
export const INDEX_HEADER = '# Capsule Log Index';

// Audio capture
export const DEFAULT_SAMPLE_RATE = 16000;
export const DEFAULT_CHANNELS = 1;
export const DEFAULT_SILENCE_DETECTION = true;
export const DEFAULT_SILENCE_THRESHOLD = 0.01;
export const DEFAULT_SILENCE_DURATION_MS = 2000;
export const DEFAULT_AUTO_STOP_ON_SILENCE = true;
export const DEFAULT_RETAIN_AUDIO = true;

// Generation
export const DEFAULT_USE_LOCAL_LLM = true;
export const DEFAULT_LOCAL_LLM_URL = 'http://localhost:11434';
export const DEFAULT_LOCAL_LLM_MODEL = 'llama3.2';
export const DEFAULT_REMOTE_MODEL = 'gpt-4o-mini';
export const DEFAULT_TEMPERATURE = 0.7;
export const DEFAULT_LOCAL_ATTEMPTS = 3;
export const DEFAULT_REMOTE_ATTEMPTS = 1;
export const DEFAULT_BACKOFF_INITIAL_MS = 500;
export const DEFAULT_BACKOFF_MULTIPLIER = 2;
export const DEFAULT_BACKOFF_MAX_MS = 8000;
export const LOCAL_LLM_TIMEOUT_MS = 120000;
export const LOCAL_LLM_PROBE_TIMEOUT_MS = 5000;
export const MAX_CAPSULE_WORDS = 400;

// Transcription and embeddings
export const DEFAULT_TRANSCRIPTION_MODEL = 'whisper-1';
export const DEFAULT_EMBEDDING_PROVIDER = 'openai';
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_LOCAL_EMBEDDING_MODEL = 'nomic-embed-text';
export const DEFAULT_EMBEDDING_ATTEMPTS = 3;

// Retrieval
export const DEFAULT_SEARCH_RESULTS = 5;
export const DEFAULT_MAX_CONTEXT_CHARS = 12000;
// Scores closer than this are treated as equal and ordered by recency
export const SCORE_TIE_EPSILON = 1e-9;

export const DEFAULT_TITLE_WORDS = 5;
export const UNTITLED_INSIGHT = 'Untitled Insight';

export const CAPSULE_DEFAULTS = {
    verbose: false,
    debug: false,
    silent: false,
    dataDirectory: DEFAULT_DATA_DIR,
    configDirectory: DEFAULT_CONFIG_DIR,
    sampleRate: DEFAULT_SAMPLE_RATE,
    channels: DEFAULT_CHANNELS,
    silenceDetection: DEFAULT_SILENCE_DETECTION,
    silenceThreshold: DEFAULT_SILENCE_THRESHOLD,
    silenceDurationMs: DEFAULT_SILENCE_DURATION_MS,
    autoStopOnSilence: DEFAULT_AUTO_STOP_ON_SILENCE,
    retainAudio: DEFAULT_RETAIN_AUDIO,
    useLocalLlm: DEFAULT_USE_LOCAL_LLM,
    localLlmUrl: DEFAULT_LOCAL_LLM_URL,
    localLlmModel: DEFAULT_LOCAL_LLM_MODEL,
    remoteModel: DEFAULT_REMOTE_MODEL,
    temperature: DEFAULT_TEMPERATURE,
    localAttempts: DEFAULT_LOCAL_ATTEMPTS,
    remoteAttempts: DEFAULT_REMOTE_ATTEMPTS,
    backoffInitialMs: DEFAULT_BACKOFF_INITIAL_MS,
    backoffMultiplier: DEFAULT_BACKOFF_MULTIPLIER,
    backoffMaxMs: DEFAULT_BACKOFF_MAX_MS,
    transcriptionModel: DEFAULT_TRANSCRIPTION_MODEL,
    embeddingProvider: DEFAULT_EMBEDDING_PROVIDER,
    embeddingModel: DEFAULT_EMBEDDING_MODEL,
    searchResults: DEFAULT_SEARCH_RESULTS,
    maxContextChars: DEFAULT_MAX_CONTEXT_CHARS,
} as const;
