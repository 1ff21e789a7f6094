import { Quat } from 'playcanvas';

import { FormatError, UnsupportedFormatError } from '../errors';
import { calcStride, parsePlyHeader, type PlyScalarKind, shNames } from '../ply';
import { getSHCoeffsCount, PointCloud, type SHDegree } from '../point-cloud';
import { SH_C0 } from '../sh';
import { transformPosition, validateTransform } from '../transform';
import { ByteReader } from '../utils/byte-reader';
import { ABORTED, PROGRESS_INTERVAL, type ReadOptions, type ReadResult, notCancelled } from './types';

const magicBytes = new Uint8Array([112, 108, 121]);                                              // ply
const endHeaderBytes = new Uint8Array([101, 110, 100, 95, 104, 101, 97, 100, 101, 114, 10]);   // end_header\n

const cmp = (a: Uint8Array, b: Uint8Array, aOffset = 0) => {
    for (let i = 0; i < b.length; ++i) {
        if (a[aOffset + i] !== b[i]) {
            return false;
        }
    }
    return true;
};

// return the offset just past 'end_header\n', or -1
const findHeaderEnd = (data: Uint8Array) => {
    const last = data.length - endHeaderBytes.length;
    for (let i = 0; i <= last; ++i) {
        if (data[i] === endHeaderBytes[0] && cmp(data, endHeaderBytes, i)) {
            return i + endHeaderBytes.length;
        }
    }
    return -1;
};

// bind the cursor method that reads one value of the given kind
const makeValueReader = (reader: ByteReader, kind: PlyScalarKind): () => number => {
    switch (kind) {
        case 'int8': return () => reader.readInt8();
        case 'uint8': return () => reader.readUint8();
        case 'int16': return () => reader.readInt16();
        case 'uint16': return () => reader.readUint16();
        case 'int32': return () => reader.readInt32();
        case 'uint32': return () => reader.readUint32();
        case 'float32': return () => reader.readFloat32();
        case 'float64': return () => reader.readFloat64();
    }
};

// SH degree implied by the highest f_rest_<k> index present
const degreeFromRestIndex = (maxRest: number): SHDegree => {
    if (maxRest >= 44) return 3;
    if (maxRest >= 23) return 2;
    if (maxRest >= 8) return 1;
    return 0;
};

const clampByte = (value: number) => Math.trunc(Math.min(255, Math.max(0, value)));

const sigmoid = (v: number) => 1.0 / (1.0 + Math.exp(-v));

const q = new Quat();

const readPly = (data: Uint8Array, options: ReadOptions): ReadResult => {
    const { transform, crs, name, isCancelled = notCancelled, onProgress } = options;

    validateTransform(transform);

    if (!cmp(data, magicBytes)) {
        throw new FormatError('Invalid PLY file: missing ply magic');
    }

    const headerSize = findHeaderEnd(data);
    if (headerSize === -1) {
        throw new FormatError('Invalid PLY file: no end_header found');
    }

    // parse the header
    const header = parsePlyHeader(new TextDecoder('ascii').decode(data.subarray(0, headerSize)));

    if (header.format === 'ascii') {
        throw new UnsupportedFormatError('ASCII PLY format is not supported');
    }

    const vertexIndex = header.elements.findIndex(element => element.name === 'vertex');
    if (vertexIndex === -1) {
        throw new FormatError('Invalid PLY file: no vertex element found');
    }

    const vertex = header.elements[vertexIndex];
    const numPoints = vertex.count;
    if (numPoints === 0) {
        throw new FormatError('Invalid PLY file: no vertices found');
    }

    // skip the data of any elements stored before the vertices
    let dataOffset = headerSize;
    for (let i = 0; i < vertexIndex; ++i) {
        dataOffset += calcStride(header.elements[i]) * header.elements[i].count;
    }

    const stride = calcStride(vertex);
    const expectedSize = dataOffset + stride * numPoints;
    if (data.byteLength < expectedSize) {
        throw new FormatError(`Invalid PLY file: insufficient data (got ${data.byteLength} bytes, expected ${expectedSize})`);
    }

    // build the property lookup once
    const reader = new ByteReader(data, dataOffset, header.format === 'binary_little_endian');
    const valueReaders = vertex.properties.map(property => makeValueReader(reader, property.kind));
    const indices = new Map<string, number>();
    vertex.properties.forEach((property, index) => indices.set(property.name, index));

    const has = (names: string[]) => names.every(n => indices.has(n));
    const get = (names: string[]) => names.map((n) => {
        const index = indices.get(n);
        if (index === undefined) {
            throw new FormatError(`Invalid PLY file: missing vertex property '${n}'`);
        }
        return index;
    });

    const [ix, iy, iz] = get(['x', 'y', 'z']);

    const hasSH = has(['f_dc_0', 'f_dc_1', 'f_dc_2']);
    const hasRGB = has(['red', 'green', 'blue']);

    // present f_rest_<k> fields and the degree they imply
    let maxRest = -1;
    for (let k = 0; k < shNames.length; ++k) {
        if (indices.has(shNames[k])) {
            maxRest = k;
        }
    }
    const shDegree = hasSH ? degreeFromRestIndex(maxRest) : 0;
    const numCoeffs = getSHCoeffsCount(shDegree);
    const rest: { coeff: number, index: number }[] = [];
    shNames.forEach((n, k) => {
        const index = indices.get(n);
        if (hasSH && index !== undefined && 3 + k < numCoeffs) {
            rest.push({ coeff: 3 + k, index });
        }
    });

    const dc = hasSH ? get(['f_dc_0', 'f_dc_1', 'f_dc_2']) : null;
    const rgb = !hasSH && hasRGB ? get(['red', 'green', 'blue']) : null;
    const opacity = indices.get('opacity');
    const scale = has(['scale_0', 'scale_1', 'scale_2']) ? get(['scale_0', 'scale_1', 'scale_2']) : null;
    const rot = has(['rot_0', 'rot_1', 'rot_2', 'rot_3']) ? get(['rot_0', 'rot_1', 'rot_2', 'rot_3']) : null;

    const values = new Float64Array(valueReaders.length);

    onProgress?.(0, `Parsing ${numPoints} vertices...`);

    const positions = new Float64Array(numPoints * 3);
    const colors = new Uint8Array(numPoints * 4);
    const scales = new Float32Array(numPoints * 3);
    const rotations = new Float32Array(numPoints * 4);
    const shCoeffs = hasSH ? new Float32Array(numPoints * numCoeffs) : null;

    for (let i = 0; i < numPoints; ++i) {
        if (isCancelled()) {
            return ABORTED;
        }

        if (onProgress && i > 0 && i % PROGRESS_INTERVAL === 0) {
            onProgress(i / numPoints, `Parsing vertex ${i}/${numPoints}`);
        }

        // read the whole record
        reader.offset = dataOffset + i * stride;
        for (let p = 0; p < valueReaders.length; ++p) {
            values[p] = valueReaders[p]();
        }

        transformPosition(transform, values[ix], values[iy], values[iz], positions, i);

        // color from spherical harmonics or direct rgb
        if (shCoeffs && dc) {
            const base = i * numCoeffs;
            for (let c = 0; c < 3; ++c) {
                const value = values[dc[c]];
                shCoeffs[base + c] = value;
                colors[i * 4 + c] = clampByte((0.5 + SH_C0 * value) * 255);
            }
            for (let r = 0; r < rest.length; ++r) {
                shCoeffs[base + rest[r].coeff] = values[rest[r].index];
            }
        } else if (rgb) {
            for (let c = 0; c < 3; ++c) {
                colors[i * 4 + c] = clampByte(values[rgb[c]]);
            }
        } else {
            // default gray
            colors[i * 4 + 0] = 128;
            colors[i * 4 + 1] = 128;
            colors[i * 4 + 2] = 128;
        }

        colors[i * 4 + 3] = opacity === undefined ? 255 : clampByte(sigmoid(values[opacity]) * 255);

        // log encoded scale
        for (let c = 0; c < 3; ++c) {
            scales[i * 3 + c] = scale ? Math.exp(values[scale[c]]) : 1.0;
        }

        if (rot) {
            // zero length quaternions normalize to identity
            q.set(values[rot[1]], values[rot[2]], values[rot[3]], values[rot[0]]).normalize();
            rotations[i * 4 + 0] = q.w;
            rotations[i * 4 + 1] = q.x;
            rotations[i * 4 + 2] = q.y;
            rotations[i * 4 + 3] = q.z;
        } else {
            rotations[i * 4 + 0] = 1.0;
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

export { readPly };
