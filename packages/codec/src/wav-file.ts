import * as fs from 'fs';
import { decodeWav, encodeWav } from './wav';
import { WavIOError } from './errors';

function describeError(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

/**
 * Read and decode a WAV file.
 * Filesystem failures become WavIOError; decode failures propagate as DecodeError.
 */
export function readWavFile(path: string): Int16Array {
    let bytes: Uint8Array;
    try {
        bytes = fs.readFileSync(path);
    } catch (e) {
        throw new WavIOError(path, `Failed to read ${path}: ${describeError(e)}`, e);
    }
    return decodeWav(bytes);
}

/**
 * Encode samples and write them to a WAV file, replacing any existing file.
 */
export function writeWavFile(path: string, samples: Int16Array): void {
    const bytes = encodeWav(samples);
    try {
        fs.writeFileSync(path, bytes);
    } catch (e) {
        throw new WavIOError(path, `Failed to write ${path}: ${describeError(e)}`, e);
    }
}
