/**
 * Pipeline Types
 *
 * State, events and collaborators of the capture-to-insight pipeline.
 */

import { ErrorCode } from '../errors';
import { AudioSource, CaptureConfig } from '../capture';
import { GatewayInstance } from '../generation';
import { Draft, DraftKind, Insight, InsightStoreInstance } from '../store';
import { TranscriptionGateway } from '../transcription';
import { EmbeddingGateway } from '../embedding';
import { VectorIndexInstance } from '../vector';

export type PipelineState = 'idle' | 'recording' | 'processing' | 'error';

export type ProcessingStage = 'transcribing' | 'generating' | 'storing';

export type StopReason = 'manual' | 'silence' | 'aborted';

export type PipelineEvent =
    | { type: 'recordingStarted'; sessionId: string }
    | { type: 'recordingStopped'; sessionId: string; reason: StopReason; audioPath: string | null }
    | { type: 'autoStopSuggested'; sessionId: string }
    | { type: 'processingStageChanged'; runId: string; stage: ProcessingStage }
    | { type: 'complete'; runId: string; insight: Insight }
    | {
        type: 'failed';
        runId: string;
        reason: ErrorCode;
        message: string;
        audioPath: string | null;
        transcriptPath: string | null;
    }
    | { type: 'indexed'; insightId: string; ok: boolean; error?: string };

export type PipelineEventType = PipelineEvent['type'];

export type PipelineListener = (event: PipelineEvent) => void | Promise<void>;

export interface FailedOutcome {
    status: 'failed';
    runId: string;
    reason: ErrorCode;
    message: string;
    audioPath: string | null;
    transcriptPath: string | null;
}

export type RunOutcome = { status: 'complete'; runId: string; insight: Insight } | FailedOutcome;

export interface StopHandle {
    sessionId: string;
    /** Null when the capture could not be finalized. */
    audioPath: string | null;
    /** Settles when processing ends; never rejects. */
    result: Promise<RunOutcome>;
}

export interface ActionOptions {
    /** Required for `expand`. */
    sectionTitle?: string;
    preferLocal?: boolean;
}

export interface IndexerConfig {
    embeddings: EmbeddingGateway;
    index: VectorIndexInstance;
    store: InsightStoreInstance;
}

export type IndexedCallback = (insightId: string, ok: boolean, error?: string) => void;

export interface ReindexSummary {
    indexed: number;
    failed: number;
}

export interface IndexerInstance {
    /** Embeds and stores one insight; rejects with EmbeddingError or IndexError. */
    index(insight: Insight): Promise<void>;
    /** Runs `index` in the background; failures are logged and reported through `onDone`. */
    schedule(insight: Insight, onDone?: IndexedCallback): void;
    /** Resolves once every scheduled job has finished. */
    drain(): Promise<void>;
    /** Re-embeds every stored insight. */
    reindexAll(): Promise<ReindexSummary>;
    pending(): number;
}

export interface OrchestratorConfig {
    transcription: TranscriptionGateway;
    generation: GatewayInstance;
    store: InsightStoreInstance;
    indexer: IndexerInstance;
    capture: CaptureConfig;
    audioSource?: AudioSource;
    autoStopOnSilence: boolean;
    retainAudio: boolean;
    temperature?: number;
    maxCapsuleWords?: number;
    now?: () => Date;
}

export interface OrchestratorInstance {
    startCapture(): Promise<{ sessionId: string }>;
    stopCapture(): Promise<StopHandle>;
    abortCapture(): Promise<void>;
    /** Runs the processing stages on an existing audio file, which is never deleted. */
    processFile(audioPath: string): Promise<RunOutcome>;
    requestAction(insightId: string, kind: DraftKind, options?: ActionOptions): Promise<Draft>;
    subscribe(listener: PipelineListener): () => void;
    getState(): PipelineState;
    /** Resolves the next time the pipeline is idle, immediately if it already is. */
    whenIdle(): Promise<void>;
    /** Resolves once every event emitted so far has been delivered. */
    flushEvents(): Promise<void>;
}
