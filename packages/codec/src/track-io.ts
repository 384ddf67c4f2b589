import type { ISampleChain } from '@seqtape/kernel';
import { readWavFile, writeWavFile } from './wav-file';
import { decodeWav, encodeWav } from './wav';

/**
 * Write decoded samples into a chain from logical position 0, overwriting
 * what is there and extending as needed. Decoding happens first, so a
 * failure leaves the chain untouched.
 *
 * @returns Number of samples loaded
 */
export function loadTrackBytes(chain: ISampleChain, bytes: Uint8Array): number {
    const samples = decodeWav(bytes);
    chain.write(samples, 0);
    return samples.length;
}

export function saveTrackBytes(chain: ISampleChain): Uint8Array {
    return encodeWav(chain.toArray());
}

/**
 * Write the samples of a WAV file into a chain from logical position 0.
 *
 * @returns Number of samples loaded
 */
export function loadTrack(chain: ISampleChain, path: string): number {
    const samples = readWavFile(path);
    chain.write(samples, 0);
    return samples.length;
}

/**
 * Write the whole chain to a WAV file.
 *
 * @returns Number of samples saved
 */
export function saveTrack(chain: ISampleChain, path: string): number {
    const samples = chain.toArray();
    writeWavFile(path, samples);
    return samples.length;
}
