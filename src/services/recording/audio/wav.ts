/**
 * WAV Audio Format Constants
 */
const WAV_CONSTANTS = {
    RIFF_HEADER_SIZE: 44,
    SAMPLE_SIZE: 16, // 16-bit audio
    FORMAT_PCM: 1,
    BYTES_PER_SAMPLE: 2
} as const;

export interface PcmFormat {
    sampleRate: number;
    channels: number;
}

/** What the opus decoder hands us: 48kHz stereo, signed 16-bit little-endian. */
export const DISCORD_PCM_FORMAT: PcmFormat = {
    sampleRate: 48000,
    channels: 2
};

export function createWavHeader(dataSize: number, format: PcmFormat = DISCORD_PCM_FORMAT): Buffer {
    const header = Buffer.alloc(WAV_CONSTANTS.RIFF_HEADER_SIZE);
    let offset = 0;

    // RIFF chunk descriptor
    header.write('RIFF', offset); offset += 4;
    header.writeUInt32LE(dataSize + WAV_CONSTANTS.RIFF_HEADER_SIZE - 8, offset); offset += 4;
    header.write('WAVE', offset); offset += 4;

    // Format chunk
    header.write('fmt ', offset); offset += 4;
    header.writeUInt32LE(16, offset); offset += 4;
    header.writeUInt16LE(WAV_CONSTANTS.FORMAT_PCM, offset); offset += 2;
    header.writeUInt16LE(format.channels, offset); offset += 2;
    header.writeUInt32LE(format.sampleRate, offset); offset += 4;

    const blockAlign = bytesPerFrame(format);
    header.writeUInt32LE(format.sampleRate * blockAlign, offset); offset += 4; // Byte rate
    header.writeUInt16LE(blockAlign, offset); offset += 2;
    header.writeUInt16LE(WAV_CONSTANTS.SAMPLE_SIZE, offset); offset += 2;

    // Data chunk header
    header.write('data', offset); offset += 4;
    header.writeUInt32LE(dataSize, offset);

    return header;
}

/**
 * Wraps raw PCM in a RIFF container. A trailing partial frame is padded with
 * silence so the data length stays a multiple of the block size.
 */
export function encodeWav(pcm: Buffer, format: PcmFormat = DISCORD_PCM_FORMAT): Buffer {
    const frameSize = bytesPerFrame(format);
    const remainder = pcm.length % frameSize;
    const data = remainder === 0 ? pcm : Buffer.concat([pcm, Buffer.alloc(frameSize - remainder)]);
    return Buffer.concat([createWavHeader(data.length, format), data]);
}

export function pcmDurationSeconds(byteLength: number, format: PcmFormat = DISCORD_PCM_FORMAT): number {
    return byteLength / (format.sampleRate * bytesPerFrame(format));
}

function bytesPerFrame(format: PcmFormat): number {
    return format.channels * WAV_CONSTANTS.BYTES_PER_SAMPLE;
}
