import { gunzipSync } from 'fflate';

import { DecompressionError, FormatError, UnsupportedFormatError } from '../errors';
import { getSHCoeffsCount, isSHDegree, PointCloud, type SHDegree } from '../point-cloud';
import { transformPosition, validateTransform } from '../transform';
import { ByteReader } from '../utils/byte-reader';
import { decodeQuatInt8, decodeQuatSmallestThree } from '../utils/quat-codecs';
import { ABORTED, type ReadOptions, type ReadResult, notCancelled } from './types';

// See https://github.com/nianticlabs/spz for the container layout

const SPZ_MAGIC = 0x5053474e;   // NGSP
const HEADER_SIZE = 16;

// number of points decoded between cancellation checks
const BATCH_SIZE = 1024;

const HARMONICS_COMPONENT_COUNT = [0, 9, 24, 45];

type SpzHeader = {
    magic: number;
    version: 2 | 3;
    numPoints: number;
    shDegree: SHDegree;
    fractionalBits: number;
    antialiased: boolean;
};

const isSupportedVersion = (version: number): version is 2 | 3 => version === 2 || version === 3;

const hex32 = (value: number) => `0x${value.toString(16).toUpperCase().padStart(8, '0')}`;

const decompress = (data: Uint8Array) => {
    try {
        return gunzipSync(data);
    } catch (err) {
        throw new DecompressionError(`Failed to decompress SPZ file: ${err instanceof Error ? err.message : String(err)}`, err);
    }
};

const readSpzHeader = (reader: ByteReader): SpzHeader => {
    if (reader.remaining < HEADER_SIZE) {
        throw new FormatError(`Invalid SPZ file: too small for header (got ${reader.remaining} bytes, expected ${HEADER_SIZE})`);
    }

    const magic = reader.readUint32();
    const version = reader.readUint32();
    const numPoints = reader.readUint32();
    const shDegree = reader.readUint8();
    const fractionalBits = reader.readUint8();
    const flags = reader.readUint8();   // bit 0: trained with antialiasing
    reader.skip(1);                     // reserved

    if (magic !== SPZ_MAGIC) {
        throw new FormatError(`Invalid SPZ file: bad magic number (got ${hex32(magic)}, expected ${hex32(SPZ_MAGIC)})`);
    }

    if (!isSupportedVersion(version)) {
        throw new UnsupportedFormatError(`Unsupported SPZ version: ${version}`);
    }

    if (numPoints === 0) {
        throw new FormatError('Invalid SPZ file: contains no points');
    }

    if (!isSHDegree(shDegree)) {
        throw new UnsupportedFormatError(`Unsupported SPZ spherical harmonics degree: ${shDegree}`);
    }

    return {
        magic,
        version,
        numPoints,
        shDegree,
        fractionalBits,
        antialiased: (flags & 0x1) !== 0
    };
};

// run fn over [0, count) in batches, checking for cancellation before each batch.
// returns false if cancelled.
const forEachBatch = (count: number, isCancelled: () => boolean, fn: (index: number) => void) => {
    for (let start = 0; start < count; start += BATCH_SIZE) {
        if (isCancelled()) {
            return false;
        }
        const end = Math.min(count, start + BATCH_SIZE);
        for (let i = start; i < end; ++i) {
            fn(i);
        }
    }
    return true;
};

const readSpz = (data: Uint8Array, options: ReadOptions): ReadResult => {
    const { transform, crs, name, isCancelled = notCancelled, onProgress } = options;

    validateTransform(transform);

    const decompressed = decompress(data);
    const reader = new ByteReader(decompressed);
    const header = readSpzHeader(reader);

    const { version, numPoints, shDegree, fractionalBits } = header;
    const coeffsPerPoint = HARMONICS_COMPONENT_COUNT[shDegree];

    // check we have data for every section
    const positionsByteSize = numPoints * 3 * 3;    // 3 * 24bit values
    const alphasByteSize = numPoints;               // u8
    const colorsByteSize = numPoints * 3;           // u8 * 3
    const scalesByteSize = numPoints * 3;           // i8 * 3
    const rotationsByteSize = numPoints * (version === 3 ? 4 : 3);
    const shByteSize = numPoints * coeffsPerPoint;

    const expectedSize = HEADER_SIZE + positionsByteSize + alphasByteSize + colorsByteSize + scalesByteSize + rotationsByteSize + shByteSize;
    if (decompressed.byteLength < expectedSize) {
        throw new FormatError(`Invalid SPZ file: insufficient data (got ${decompressed.byteLength} bytes, expected ${expectedSize})`);
    }

    onProgress?.(0, `Parsing ${numPoints} splats (SPZ v${version})...`);

    const positions = new Float64Array(numPoints * 3);
    const colors = new Uint8Array(numPoints * 4);
    const scales = new Float32Array(numPoints * 3);
    const rotations = new Float32Array(numPoints * 4);
    const numCoeffs = getSHCoeffsCount(shDegree);
    const shCoeffs = shDegree > 0 ? new Float32Array(numPoints * numCoeffs) : null;

    // positions (24 bit fixed point)
    const fixedScale = Math.pow(2, -fractionalBits);
    const positionsDone = forEachBatch(numPoints, isCancelled, (i) => {
        const x = reader.readInt24() * fixedScale;
        const y = reader.readInt24() * fixedScale;
        const z = reader.readInt24() * fixedScale;
        transformPosition(transform, x, y, z, positions, i);
    });
    if (!positionsDone) {
        return ABORTED;
    }

    onProgress?.(0.2, 'Parsing alphas...');
    if (!forEachBatch(numPoints, isCancelled, (i) => {
        colors[i * 4 + 3] = reader.readUint8();
    })) {
        return ABORTED;
    }

    onProgress?.(0.3, 'Parsing colors...');
    if (!forEachBatch(numPoints, isCancelled, (i) => {
        colors[i * 4 + 0] = reader.readUint8();
        colors[i * 4 + 1] = reader.readUint8();
        colors[i * 4 + 2] = reader.readUint8();
    })) {
        return ABORTED;
    }

    // scales (log encoded signed bytes)
    onProgress?.(0.4, 'Parsing scales...');
    if (!forEachBatch(numPoints, isCancelled, (i) => {
        scales[i * 3 + 0] = Math.exp(reader.readInt8() / 16.0);
        scales[i * 3 + 1] = Math.exp(reader.readInt8() / 16.0);
        scales[i * 3 + 2] = Math.exp(reader.readInt8() / 16.0);
    })) {
        return ABORTED;
    }

    onProgress?.(0.5, 'Parsing rotations...');
    const rotationsDone = version === 3 ?
        forEachBatch(numPoints, isCancelled, (i) => {
            decodeQuatSmallestThree(reader.readUint32(), rotations, i * 4);
        }) :
        forEachBatch(numPoints, isCancelled, (i) => {
            decodeQuatInt8(reader.readInt8(), reader.readInt8(), reader.readInt8(), rotations, i * 4);
        });
    if (!rotationsDone) {
        return ABORTED;
    }

    // spherical harmonics: the first 3 stored values are the DC term, the rest follow
    // in stored order. coefficients past coeffsPerPoint stay zero.
    if (shCoeffs) {
        onProgress?.(0.7, 'Parsing spherical harmonics...');
        if (!forEachBatch(numPoints, isCancelled, (i) => {
            const base = i * numCoeffs;
            for (let c = 0; c < coeffsPerPoint; ++c) {
                shCoeffs[base + c] = reader.readInt8() / 127.0;
            }
        })) {
            return ABORTED;
        }
    }

    onProgress?.(1, 'Complete');

    return {
        status: 'complete',
        pointCloud: new PointCloud({
            positions,
            colors,
            scales,
            rotations,
            shCoeffs,
            shDegree,
            crs,
            name
        })
    };
};

export type { SpzHeader };
export { SPZ_MAGIC, readSpzHeader, readSpz };
