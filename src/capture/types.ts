/**
 * Capture Types
 */

export type SessionState = 'idle' | 'recording' | 'finalizing' | 'closed';

export interface FrameResult {
    /** True once per quiet run that reaches the configured silence duration. */
    autoStop: boolean;
}

export interface AudioSink {
    onFrame(samples: Float32Array): void;
    onError(error: Error): void;
    /** The source ran out of input, such as EOF on a pipe. */
    onEnd?(): void;
}

/**
 * Produces mono float frames in [-1, 1]. Frames are delivered synchronously
 * and in order through the sink passed to `start`.
 */
export interface AudioSource {
    start(sink: AudioSink): Promise<void>;
    stop(): Promise<void>;
}

export interface CaptureConfig {
    audioDirectory: string;
    sampleRate: number;
    channels: number;
    silenceDetection: boolean;
    silenceThreshold: number;
    silenceDurationMs: number;
}

export interface CaptureSessionInstance {
    readonly id: string;
    getState(): SessionState;
    getStartedAt(): Date | null;
    begin(): void;
    appendFrame(samples: Float32Array): FrameResult;
    /** Writes the buffered audio as a WAV file and returns its path. */
    finalize(): Promise<string>;
    abort(): Promise<void>;
    sampleCount(): number;
    durationMs(): number;
}
