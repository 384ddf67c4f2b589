// Fixed track format: RIFF/WAVE, PCM, mono, 16-bit, 8000 Hz.
export const WAV_HEADER_SIZE = 44;
export const WAV_SAMPLE_RATE = 8000;
export const WAV_CHANNELS = 1;
export const WAV_BITS_PER_SAMPLE = 16;
export const WAV_BYTES_PER_SAMPLE = WAV_BITS_PER_SAMPLE / 8;
export const WAV_FORMAT_PCM = 1;
export const WAV_FMT_CHUNK_SIZE = 16;

export const CODEC_ERR = {
    TRUNCATED_HEADER: 1,
    BAD_MAGIC: 2,
    TRUNCATED_SAMPLE: 3,
    IO: 4
} as const;

export type CodecErrorCode = (typeof CODEC_ERR)[keyof typeof CODEC_ERR];
