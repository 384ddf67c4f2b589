import { CODEC_ERR } from './constants';
import type { CodecErrorCode } from './constants';

export class CodecError extends Error {
    public readonly code: CodecErrorCode;

    constructor(code: CodecErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CodecError';
        this.code = code;
    }
}

/**
 * Bytes that are not a track in the fixed WAV format.
 */
export class DecodeError extends CodecError {
    constructor(code: CodecErrorCode, message: string) {
        super(code, message);
        this.name = 'DecodeError';
    }
}

/**
 * Filesystem failure while reading or writing a WAV file.
 * The underlying error is kept as `cause`.
 */
export class WavIOError extends CodecError {
    public readonly path: string;

    constructor(path: string, message: string, cause: unknown) {
        super(CODEC_ERR.IO, message, { cause });
        this.name = 'WavIOError';
        this.path = path;
    }
}
