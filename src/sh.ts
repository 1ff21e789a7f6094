import { Vec3 } from 'playcanvas';

import { getSHCoeffsCount, type PointCloud, type SHDegree } from './point-cloud';

// Real spherical harmonics basis normalization constants
const SH_C0 = 0.28209479177387814;      // 1 / (2 * sqrt(pi))
const SH_C1 = 0.4886025119029199;       // sqrt(3) / (2 * sqrt(pi))
const SH_C2 = [
    1.0925484305920792,                 // sqrt(15) / (2 * sqrt(pi))
    -1.0925484305920792,
    0.31539156525252005,                // sqrt(5) / (4 * sqrt(pi))
    -1.0925484305920792,
    0.5462742152960396                  // sqrt(15) / (4 * sqrt(pi))
];
const SH_C3 = [
    -0.5900435899266435,
    2.890611442640554,
    -0.4570457994644658,
    0.3731763325901154,
    -0.4570457994644658,
    1.445305721320277,
    -0.5900435899266435
];

type RGB = [number, number, number];

type SHCoeffs = ArrayLike<number>;

// missing coefficients count as zero
const coeff = (coeffs: SHCoeffs, index: number) => (index < coeffs.length ? coeffs[index] : 0);

// add weight * coeffs[first..first+3) to result
const accumulate = (result: RGB, coeffs: SHCoeffs, first: number, weight: number) => {
    result[0] += weight * coeff(coeffs, first + 0);
    result[1] += weight * coeff(coeffs, first + 1);
    result[2] += weight * coeff(coeffs, first + 2);
};

// Each band function adds its contribution to result. dir must be normalized.

const evalSHBand0 = (coeffs: SHCoeffs, result: RGB) => {
    accumulate(result, coeffs, 0, SH_C0);
};

// coeffs 3..11, basis -x, y, -z
const evalSHBand1 = (coeffs: SHCoeffs, dir: Vec3, result: RGB) => {
    const { x, y, z } = dir;
    accumulate(result, coeffs, 3, -SH_C1 * x);
    accumulate(result, coeffs, 6, SH_C1 * y);
    accumulate(result, coeffs, 9, -SH_C1 * z);
};

// coeffs 12..26
const evalSHBand2 = (coeffs: SHCoeffs, dir: Vec3, result: RGB) => {
    const { x, y, z } = dir;
    const xx = x * x, yy = y * y, zz = z * z;
    accumulate(result, coeffs, 12, SH_C2[0] * x * y);
    accumulate(result, coeffs, 15, SH_C2[1] * y * z);
    accumulate(result, coeffs, 18, SH_C2[2] * (2.0 * zz - xx - yy));
    accumulate(result, coeffs, 21, SH_C2[3] * x * z);
    accumulate(result, coeffs, 24, SH_C2[4] * (xx - yy));
};

// coeffs 27..47
const evalSHBand3 = (coeffs: SHCoeffs, dir: Vec3, result: RGB) => {
    const { x, y, z } = dir;
    const xx = x * x, yy = y * y, zz = z * z;
    accumulate(result, coeffs, 27, SH_C3[0] * y * (3.0 * xx - yy));
    accumulate(result, coeffs, 30, SH_C3[1] * x * y * z);
    accumulate(result, coeffs, 33, SH_C3[2] * y * (4.0 * zz - xx - yy));
    accumulate(result, coeffs, 36, SH_C3[3] * z * (2.0 * zz - 3.0 * xx - 3.0 * yy));
    accumulate(result, coeffs, 39, SH_C3[4] * x * (4.0 * zz - xx - yy));
    accumulate(result, coeffs, 42, SH_C3[5] * z * (xx - yy));
    accumulate(result, coeffs, 45, SH_C3[6] * x * (xx - 3.0 * yy));
};

// lenient fallback for out of range degrees: infer from the number of coefficients
const inferSHDegree = (numCoeffs: number): SHDegree => {
    if (numCoeffs <= 3) return 0;
    if (numCoeffs <= 12) return 1;
    if (numCoeffs <= 27) return 2;
    return 3;
};

const FORWARD = new Vec3(0, 0, 1);
const dir = new Vec3();

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

/**
 * Evaluate view dependent color.
 *
 * @param coeffs - DC rgb followed by the rest terms, band by band, rgb contiguous.
 * @param direction - View direction, need not be normalized. A zero vector is treated
 * as looking down +z.
 * @param degree - 0..3. Any other value infers the degree from `coeffs.length`.
 * @param result - Optional array to receive the color.
 * @returns rgb, each channel clipped to [0, 1].
 */
const evalSH = (coeffs: SHCoeffs, direction: Vec3, degree: number, result: RGB = [0, 0, 0]): RGB => {
    dir.copy(direction).normalize();
    if (dir.lengthSq() === 0) {
        dir.copy(FORWARD);
    }

    const bands = (degree === 0 || degree === 1 || degree === 2 || degree === 3) ? degree : inferSHDegree(coeffs.length);

    result[0] = result[1] = result[2] = 0;

    evalSHBand0(coeffs, result);
    if (bands >= 1) evalSHBand1(coeffs, dir, result);
    if (bands >= 2) evalSHBand2(coeffs, dir, result);
    if (bands >= 3) evalSHBand3(coeffs, dir, result);

    // coefficients are centered on mid gray
    result[0] = clamp01(0.5 + result[0]);
    result[1] = clamp01(0.5 + result[1]);
    result[2] = clamp01(0.5 + result[2]);

    return result;
};

const toByte = (value: number) => Math.trunc(Math.min(255, Math.max(0, value * 255)));

// color seen looking down +z, as 0..255 integers
const shCoeffsToRgb = (coeffs: SHCoeffs, degree: number = 0): RGB => {
    const rgb = evalSH(coeffs, FORWARD, degree);
    return [toByte(rgb[0]), toByte(rgb[1]), toByte(rgb[2])];
};

/**
 * Evaluate SH colors for points [start, end) of a point cloud. Points are independent
 * of each other, so a large cloud can be split into ranges and evaluated in parallel.
 *
 * Writes rgb triples (0..1) for each point into result, starting at result[0] for
 * point `start`. Clouds without SH get their stored colors.
 */
const evalSHColors = (pointCloud: PointCloud, direction: Vec3, start = 0, end = pointCloud.numPoints, result = new Float32Array((end - start) * 3)) => {
    const { colors, shCoeffs, shDegree } = pointCloud;
    const numCoeffs = getSHCoeffsCount(shDegree);
    const rgb: RGB = [0, 0, 0];

    for (let i = start; i < end; ++i) {
        const o = (i - start) * 3;
        if (shCoeffs) {
            evalSH(shCoeffs.subarray(i * numCoeffs, (i + 1) * numCoeffs), direction, shDegree, rgb);
            result[o + 0] = rgb[0];
            result[o + 1] = rgb[1];
            result[o + 2] = rgb[2];
        } else {
            result[o + 0] = colors[i * 4 + 0] / 255;
            result[o + 1] = colors[i * 4 + 1] / 255;
            result[o + 2] = colors[i * 4 + 2] / 255;
        }
    }

    return result;
};

export type { RGB, SHCoeffs };
export {
    SH_C0,
    SH_C1,
    SH_C2,
    SH_C3,
    evalSHBand0,
    evalSHBand1,
    evalSHBand2,
    evalSHBand3,
    inferSHDegree,
    evalSH,
    shCoeffsToRgb,
    evalSHColors
};
