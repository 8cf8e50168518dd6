/**
 * Silence detection over a rolling window of frame amplitudes.
 *
 * Everything here is pure: the session feeds one AmplitudeSample per frame
 * and asks whether the trailing run of quiet frames is long enough.
 */

export interface AmplitudeSample {
    rms: number;
    durationMs: number;
}

export interface SilenceConfig {
    /** RMS below this counts as silence. */
    threshold: number;
    /** How long the quiet run must last before it counts. */
    durationMs: number;
}

export const rms = (samples: Float32Array): number => {
    if (samples.length === 0) {
        return 0;
    }
    let sum = 0;
    for (let i = 0; i < samples.length; i++) {
        sum += samples[i] * samples[i];
    }
    return Math.sqrt(sum / samples.length);
};

/**
 * Length of the quiet run at the end of the window, in milliseconds.
 */
export const trailingSilenceMs = (window: readonly AmplitudeSample[], threshold: number): number => {
    let total = 0;
    for (let i = window.length - 1; i >= 0; i--) {
        if (window[i].rms >= threshold) {
            break;
        }
        total += window[i].durationMs;
    }
    return total;
};

export const isSilent = (window: readonly AmplitudeSample[], config: SilenceConfig): boolean =>
    window.length > 0 && trailingSilenceMs(window, config.threshold) >= config.durationMs;

/**
 * Append a sample and drop the oldest entries that are no longer needed to
 * decide `isSilent`. Returns a new window.
 */
export const pushAmplitude = (
    window: readonly AmplitudeSample[],
    sample: AmplitudeSample,
    config: SilenceConfig,
): AmplitudeSample[] => {
    const next = [...window, sample];
    let covered = 0;
    let keepFrom = next.length;
    while (keepFrom > 0 && covered < config.durationMs) {
        keepFrom--;
        covered += next[keepFrom].durationMs;
    }
    return next.slice(keepFrom);
};
