import {
    WAV_HEADER_SIZE,
    WAV_SAMPLE_RATE,
    WAV_CHANNELS,
    WAV_BITS_PER_SAMPLE,
    WAV_BYTES_PER_SAMPLE,
    WAV_FORMAT_PCM,
    WAV_FMT_CHUNK_SIZE,
    CODEC_ERR
} from './constants';
import { DecodeError } from './errors';

/**
 * Encode samples as a 16-bit PCM mono 8 kHz WAV byte stream.
 * The header is fully determined by the sample count.
 */
export function encodeWav(samples: Int16Array): Uint8Array {
    const dataSize = samples.length * WAV_BYTES_PER_SAMPLE;
    const blockAlign = WAV_CHANNELS * WAV_BYTES_PER_SAMPLE;
    const arrayBuffer = new ArrayBuffer(WAV_HEADER_SIZE + dataSize);
    const view = new DataView(arrayBuffer);

    function writeString(offset: number, str: string) {
        for (let i = 0; i < str.length; i++) {
            view.setUint8(offset + i, str.charCodeAt(i));
        }
    }

    writeString(0, 'RIFF');
    view.setUint32(4, 36 + dataSize, true);
    writeString(8, 'WAVE');
    writeString(12, 'fmt ');
    view.setUint32(16, WAV_FMT_CHUNK_SIZE, true);
    view.setUint16(20, WAV_FORMAT_PCM, true);
    view.setUint16(22, WAV_CHANNELS, true);
    view.setUint32(24, WAV_SAMPLE_RATE, true);
    view.setUint32(28, WAV_SAMPLE_RATE * blockAlign, true); // byte rate
    view.setUint16(32, blockAlign, true);
    view.setUint16(34, WAV_BITS_PER_SAMPLE, true);
    writeString(36, 'data');
    view.setUint32(40, dataSize, true);

    let offset = WAV_HEADER_SIZE;
    for (let i = 0; i < samples.length; i++) {
        view.setInt16(offset, samples[i], true);
        offset += WAV_BYTES_PER_SAMPLE;
    }

    return new Uint8Array(arrayBuffer);
}

/**
 * Decode the samples following a 44-byte WAV header.
 *
 * Only the RIFF and WAVE tags are checked; the remaining header fields are
 * assumed to describe the fixed format and every byte after the header is
 * sample data.
 */
export function decodeWav(bytes: Uint8Array): Int16Array {
    if (bytes.length < WAV_HEADER_SIZE) {
        throw new DecodeError(
            CODEC_ERR.TRUNCATED_HEADER,
            `WAV header needs ${WAV_HEADER_SIZE} bytes, got ${bytes.length}`
        );
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

    function readString(offset: number, length: number): string {
        let out = '';
        for (let i = 0; i < length; i++) {
            out += String.fromCharCode(view.getUint8(offset + i));
        }
        return out;
    }

    if (readString(0, 4) !== 'RIFF' || readString(8, 4) !== 'WAVE') {
        throw new DecodeError(CODEC_ERR.BAD_MAGIC, 'Missing RIFF/WAVE tags');
    }

    const dataSize = bytes.length - WAV_HEADER_SIZE;
    if (dataSize % WAV_BYTES_PER_SAMPLE !== 0) {
        throw new DecodeError(
            CODEC_ERR.TRUNCATED_SAMPLE,
            `Sample data ends mid-sample (${dataSize} bytes)`
        );
    }

    const samples = new Int16Array(dataSize / WAV_BYTES_PER_SAMPLE);
    let offset = WAV_HEADER_SIZE;
    for (let i = 0; i < samples.length; i++) {
        samples[i] = view.getInt16(offset, true);
        offset += WAV_BYTES_PER_SAMPLE;
    }
    return samples;
}
