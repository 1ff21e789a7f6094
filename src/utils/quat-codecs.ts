import { unpackInt10 } from './byte-reader';

// Quaternion decoders. All write (w, x, y, z) into `result` starting at `offset`.

type QuatArray = number[] | Float32Array;

// 4 x uint8, each mapped to (b - 128) / 128. the result is not renormalized.
const decodeQuatUint8 = (b0: number, b1: number, b2: number, b3: number, result: QuatArray, offset = 0) => {
    result[offset + 0] = (b0 - 128) / 128.0;
    result[offset + 1] = (b1 - 128) / 128.0;
    result[offset + 2] = (b2 - 128) / 128.0;
    result[offset + 3] = (b3 - 128) / 128.0;
};

// 3 x int8 holding x, y, z scaled by 127. w is rebuilt from the unit length constraint.
const decodeQuatInt8 = (x8: number, y8: number, z8: number, result: QuatArray, offset = 0) => {
    const x = x8 / 127.0;
    const y = y8 / 127.0;
    const z = z8 / 127.0;

    result[offset + 0] = Math.sqrt(Math.max(0.0, 1.0 - x * x - y * y - z * z));
    result[offset + 1] = x;
    result[offset + 2] = y;
    result[offset + 3] = z;
};

const SMALLEST_THREE_SCALE = 1.0 / 511.0;

/**
 * Decode a "smallest-three" packed quaternion.
 *
 * Bit layout of the u32, starting at the least significant bit:
 *
 *   bits  0..1   index of the omitted component (0 = w, 1 = x, 2 = y, 3 = z)
 *   bits  2..11  c0, 10 bit two's complement
 *   bits 12..21  c1
 *   bits 22..31  c2
 *
 * c0, c1 and c2 are scaled by 1/511 and fill the remaining slots in order. The
 * omitted component is sqrt(max(0, 1 - c0² - c1² - c2²)).
 */
const decodeQuatSmallestThree = (packed: number, result: QuatArray, offset = 0) => {
    const largest = packed & 0x3;

    const c0 = unpackInt10(packed, 2) * SMALLEST_THREE_SCALE;
    const c1 = unpackInt10(packed, 12) * SMALLEST_THREE_SCALE;
    const c2 = unpackInt10(packed, 22) * SMALLEST_THREE_SCALE;

    const omitted = Math.sqrt(Math.max(0.0, 1.0 - c0 * c0 - c1 * c1 - c2 * c2));

    let c = 0;
    const components = [c0, c1, c2];
    for (let i = 0; i < 4; ++i) {
        result[offset + i] = i === largest ? omitted : components[c++];
    }
};

export type { QuatArray };
export { decodeQuatUint8, decodeQuatInt8, decodeQuatSmallestThree };
