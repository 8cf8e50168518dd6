const WAV_HEADER_BYTES = 44;

/**
 * Encode float samples in [-1, 1] as a 16-bit PCM WAV file.
 */
export const encodePcm16Wav = (samples: Float32Array, sampleRate: number, channels: number): Buffer => {
    const bytesPerSample = 2;
    const blockAlign = channels * bytesPerSample;
    const byteRate = sampleRate * blockAlign;
    const dataSize = samples.length * bytesPerSample;
    const buffer = Buffer.alloc(WAV_HEADER_BYTES + dataSize);

    buffer.write('RIFF', 0, 'ascii');
    buffer.writeUInt32LE(36 + dataSize, 4);
    buffer.write('WAVE', 8, 'ascii');
    buffer.write('fmt ', 12, 'ascii');
    buffer.writeUInt32LE(16, 16);
    buffer.writeUInt16LE(1, 20);
    buffer.writeUInt16LE(channels, 22);
    buffer.writeUInt32LE(sampleRate, 24);
    buffer.writeUInt32LE(byteRate, 28);
    buffer.writeUInt16LE(blockAlign, 32);
    buffer.writeUInt16LE(16, 34);
    buffer.write('data', 36, 'ascii');
    buffer.writeUInt32LE(dataSize, 40);

    for (let i = 0; i < samples.length; i++) {
        const clamped = Math.max(-1, Math.min(1, samples[i]));
        const int16 = clamped < 0 ? Math.round(clamped * 0x8000) : Math.round(clamped * 0x7fff);
        buffer.writeInt16LE(int16, WAV_HEADER_BYTES + i * 2);
    }

    return buffer;
};

/**
 * Decode signed 16-bit little-endian PCM into float samples. A trailing odd
 * byte is ignored.
 */
export const pcm16ToFloat32 = (chunk: Buffer): Float32Array => {
    const count = Math.floor(chunk.length / 2);
    const samples = new Float32Array(count);
    for (let i = 0; i < count; i++) {
        samples[i] = chunk.readInt16LE(i * 2) / 0x8000;
    }
    return samples;
};

export const concatFrames = (frames: readonly Float32Array[]): Float32Array => {
    const total = frames.reduce((sum, frame) => sum + frame.length, 0);
    const out = new Float32Array(total);
    let offset = 0;
    for (const frame of frames) {
        out.set(frame, offset);
        offset += frame.length;
    }
    return out;
};
