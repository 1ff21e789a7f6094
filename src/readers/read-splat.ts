import { FormatError } from '../errors';
import { PointCloud } from '../point-cloud';
import { transformPosition, validateTransform } from '../transform';
import { ByteReader } from '../utils/byte-reader';
import { decodeQuatUint8 } from '../utils/quat-codecs';
import { ABORTED, PROGRESS_INTERVAL, type ReadOptions, type ReadResult, notCancelled } from './types';

// Each splat is 32 bytes
const BYTES_PER_SPLAT = 32;

const readSplat = (data: Uint8Array, options: ReadOptions): ReadResult => {
    const { transform, crs, name, isCancelled = notCancelled, onProgress } = options;

    validateTransform(transform);

    if (data.byteLength % BYTES_PER_SPLAT !== 0) {
        throw new FormatError(`Invalid .splat file: size ${data.byteLength} is not a multiple of ${BYTES_PER_SPLAT} bytes`);
    }

    const numSplats = data.byteLength / BYTES_PER_SPLAT;

    if (numSplats === 0) {
        throw new FormatError('Invalid .splat file: file is empty');
    }

    onProgress?.(0, `Parsing ${numSplats} splats...`);

    const positions = new Float64Array(numSplats * 3);
    const colors = new Uint8Array(numSplats * 4);
    const scales = new Float32Array(numSplats * 3);
    const rotations = new Float32Array(numSplats * 4);

    const reader = new ByteReader(data);

    for (let splatIndex = 0; splatIndex < numSplats; ++splatIndex) {
        if (isCancelled()) {
            return ABORTED;
        }

        if (onProgress && splatIndex > 0 && splatIndex % PROGRESS_INTERVAL === 0) {
            onProgress(splatIndex / numSplats, `Parsing splat ${splatIndex}/${numSplats}`);
        }

        // Read position (3 × float32)
        const x = reader.readFloat32();
        const y = reader.readFloat32();
        const z = reader.readFloat32();
        transformPosition(transform, x, y, z, positions, splatIndex);

        // Read scale (3 × float32), stored linear
        scales[splatIndex * 3 + 0] = reader.readFloat32();
        scales[splatIndex * 3 + 1] = reader.readFloat32();
        scales[splatIndex * 3 + 2] = reader.readFloat32();

        // Read color and opacity (4 × uint8)
        colors[splatIndex * 4 + 0] = reader.readUint8();
        colors[splatIndex * 4 + 1] = reader.readUint8();
        colors[splatIndex * 4 + 2] = reader.readUint8();
        colors[splatIndex * 4 + 3] = reader.readUint8();

        // Read rotation quaternion (4 × uint8). Not renormalized, consumers must
        // tolerate slightly non-unit values.
        decodeQuatUint8(
            reader.readUint8(),
            reader.readUint8(),
            reader.readUint8(),
            reader.readUint8(),
            rotations,
            splatIndex * 4
        );
    }

    onProgress?.(1, 'Complete');

    return {
        status: 'complete',
        pointCloud: new PointCloud({
            positions,
            colors,
            scales,
            rotations,
            shCoeffs: null,
            shDegree: 0,
            crs,
            name
        })
    };
};

export { readSplat };
