export * from './constants';
export { CodecError, DecodeError, WavIOError } from './errors';
export { encodeWav, decodeWav } from './wav';
export { readWavFile, writeWavFile } from './wav-file';
export { loadTrack, saveTrack, loadTrackBytes, saveTrackBytes } from './track-io';
