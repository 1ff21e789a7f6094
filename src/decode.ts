import { type DecodeError, isDecodeError } from './errors';
import { readPly } from './readers/read-ply';
import { readSplat } from './readers/read-splat';
import { readSpz } from './readers/read-spz';
import type { ReadOptions, ReadResult, Reader } from './readers/types';

type InputFormat = 'splat' | 'ply' | 'spz';

type DecodeResult = ReadResult | {
    status: 'failed';
    error: DecodeError;
};

const readers: Record<InputFormat, Reader> = {
    splat: readSplat,
    ply: readPly,
    spz: readSpz
};

// select the format by filename suffix. anything unrecognized is treated as .splat.
const getInputFormat = (filename: string): InputFormat => {
    const lowerFilename = filename.toLowerCase();

    if (lowerFilename.endsWith('.ply')) {
        return 'ply';
    } else if (lowerFilename.endsWith('.spz')) {
        return 'spz';
    }

    return 'splat';
};

// display name for a file path or url: the last path segment without format extensions
const deriveName = (source: string) => {
    const segments = source.split('/');
    return segments[segments.length - 1].replace(/\.(splat|ply|spz)/g, '');
};

// decode data using the reader selected by filename. decode failures are returned
// rather than thrown, any other error propagates.
const decodeSplat = (filename: string, data: Uint8Array, options: ReadOptions): DecodeResult => {
    const reader = readers[getInputFormat(filename)];

    try {
        return reader(data, options);
    } catch (err) {
        if (isDecodeError(err)) {
            return { status: 'failed', error: err };
        }
        throw err;
    }
};

export type { InputFormat, DecodeResult };
export { getInputFormat, deriveName, decodeSplat };
