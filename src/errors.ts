type DecodeErrorKind = 'format' | 'unsupported' | 'decompression';

// base class for all failures raised while decoding splat data
class DecodeError extends Error {
    readonly kind: DecodeErrorKind;

    constructor(kind: DecodeErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DecodeError';
        this.kind = kind;
    }
}

// structurally invalid input
class FormatError extends DecodeError {
    constructor(message: string) {
        super('format', message);
        this.name = 'FormatError';
    }
}

// valid input using a feature or version that isn't implemented
class UnsupportedFormatError extends DecodeError {
    constructor(message: string) {
        super('unsupported', message);
        this.name = 'UnsupportedFormatError';
    }
}

// corrupt or truncated compressed payload
class DecompressionError extends DecodeError {
    constructor(message: string, cause: unknown) {
        super('decompression', message, { cause });
        this.name = 'DecompressionError';
    }
}

const isDecodeError = (err: unknown): err is DecodeError => err instanceof DecodeError;

export type { DecodeErrorKind };
export { DecodeError, FormatError, UnsupportedFormatError, DecompressionError, isDecodeError };
