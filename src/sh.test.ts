import { Vec3 } from 'playcanvas';
import { describe, it, expect } from 'vitest';

import { PointCloud } from './point-cloud';
import { SH_C0, SH_C1, SH_C2, SH_C3, evalSH, evalSHColors, inferSHDegree, shCoeffsToRgb } from './sh';

// coefficient array of the given length with a single red entry set
const single = (length: number, index: number, value: number) => {
    const coeffs = new Array<number>(length).fill(0);
    coeffs[index] = value;
    return coeffs;
};

describe('evalSH', () => {
    it('should ignore direction for degree 0', () => {
        const coeffs = [0.1, 0.2, 0.3];
        const a = evalSH(coeffs, new Vec3(0, 0, 1), 0);
        const b = evalSH(coeffs, new Vec3(1, -1, 0), 0);

        expect(a).toEqual(b);
        expect(a[0]).toBeCloseTo(0.5 + SH_C0 * 0.1, 10);
        expect(a[1]).toBeCloseTo(0.5 + SH_C0 * 0.2, 10);
        expect(a[2]).toBeCloseTo(0.5 + SH_C0 * 0.3, 10);
    });

    it('should clip channels to [0, 1]', () => {
        expect(evalSH([10, -10, 5], new Vec3(0, 0, 1), 0)).toEqual([1, 0, 1]);
    });

    it('should evaluate the linear band', () => {
        const coeffs = single(12, 9, -0.5);
        expect(evalSH(coeffs, new Vec3(0, 0, 1), 1)[0]).toBeCloseTo(0.5 + SH_C1 * 0.5, 10);
        expect(evalSH(coeffs, new Vec3(0, 0, -1), 1)[0]).toBeCloseTo(0.5 - SH_C1 * 0.5, 10);

        const x = single(12, 3, 0.2);
        expect(evalSH(x, new Vec3(1, 0, 0), 1)[0]).toBeCloseTo(0.5 - SH_C1 * 0.2, 10);
    });

    it('should evaluate the quadratic band', () => {
        const coeffs = single(27, 18, 0.1);
        expect(evalSH(coeffs, new Vec3(0, 0, 1), 2)[0]).toBeCloseTo(0.5 + SH_C2[2] * 2 * 0.1, 10);

        const xy = single(27, 12, 0.1);
        const d = Math.SQRT1_2;
        expect(evalSH(xy, new Vec3(1, 1, 0), 2)[0]).toBeCloseTo(0.5 + SH_C2[0] * d * d * 0.1, 10);
    });

    it('should evaluate the cubic band', () => {
        const coeffs = single(48, 36, 0.1);
        expect(evalSH(coeffs, new Vec3(0, 0, 1), 3)[0]).toBeCloseTo(0.5 + SH_C3[3] * 2 * 0.1, 10);

        const x3 = single(48, 45, 0.1);
        expect(evalSH(x3, new Vec3(1, 0, 0), 3)[0]).toBeCloseTo(0.5 + SH_C3[6] * 0.1, 10);
    });

    it('should sum every band for degree 3', () => {
        const coeffs = new Array<number>(48).fill(0).map((_, i) => ((i % 7) - 3) * 0.01);
        const dir = new Vec3(0.3, -0.5, 0.8).normalize();
        const { x, y, z } = dir;
        const xx = x * x, yy = y * y, zz = z * z;

        const basis = [
            SH_C0,
            -SH_C1 * x, SH_C1 * y, -SH_C1 * z,
            SH_C2[0] * x * y,
            SH_C2[1] * y * z,
            SH_C2[2] * (2 * zz - xx - yy),
            SH_C2[3] * x * z,
            SH_C2[4] * (xx - yy),
            SH_C3[0] * y * (3 * xx - yy),
            SH_C3[1] * x * y * z,
            SH_C3[2] * y * (4 * zz - xx - yy),
            SH_C3[3] * z * (2 * zz - 3 * xx - 3 * yy),
            SH_C3[4] * x * (4 * zz - xx - yy),
            SH_C3[5] * z * (xx - yy),
            SH_C3[6] * x * (xx - 3 * yy)
        ];

        const expected = [0.5, 0.5, 0.5];
        basis.forEach((b, k) => {
            for (let c = 0; c < 3; ++c) {
                expected[c] += b * coeffs[k * 3 + c];
            }
        });

        const result = evalSH(coeffs, new Vec3(0.3, -0.5, 0.8), 3);
        for (let c = 0; c < 3; ++c) {
            expect(result[c]).toBeCloseTo(Math.min(1, Math.max(0, expected[c])), 10);
        }
    });

    it('should normalize the direction', () => {
        const coeffs = single(12, 9, -0.5);
        expect(evalSH(coeffs, new Vec3(0, 0, 5), 1)).toEqual(evalSH(coeffs, new Vec3(0, 0, 1), 1));
    });

    it('should treat a zero direction as +z', () => {
        const coeffs = single(12, 9, -0.5);
        expect(evalSH(coeffs, new Vec3(0, 0, 0), 1)).toEqual(evalSH(coeffs, new Vec3(0, 0, 1), 1));
    });

    it('should infer the degree when it is out of range', () => {
        const coeffs = single(12, 9, -0.5);
        expect(evalSH(coeffs, new Vec3(0, 0, 1), 7)).toEqual(evalSH(coeffs, new Vec3(0, 0, 1), 1));
        expect(evalSH(coeffs, new Vec3(0, 0, 1), -1)).toEqual(evalSH(coeffs, new Vec3(0, 0, 1), 1));
    });

    it('should treat missing coefficients as zero', () => {
        expect(evalSH([0.1, 0.2, 0.3], new Vec3(1, 0, 0), 3)).toEqual(evalSH([0.1, 0.2, 0.3], new Vec3(1, 0, 0), 0));
    });

    it('should write into the result array', () => {
        const result: [number, number, number] = [9, 9, 9];
        expect(evalSH([0, 0, 0], new Vec3(0, 0, 1), 0, result)).toBe(result);
        expect(result).toEqual([0.5, 0.5, 0.5]);
    });
});

describe('inferSHDegree', () => {
    it('should map coefficient counts to degrees', () => {
        expect(inferSHDegree(0)).toBe(0);
        expect(inferSHDegree(3)).toBe(0);
        expect(inferSHDegree(4)).toBe(1);
        expect(inferSHDegree(12)).toBe(1);
        expect(inferSHDegree(27)).toBe(2);
        expect(inferSHDegree(28)).toBe(3);
        expect(inferSHDegree(100)).toBe(3);
    });
});

describe('shCoeffsToRgb', () => {
    it('should convert the DC term to bytes', () => {
        expect(shCoeffsToRgb([1, 0.5, 0])).toEqual([199, 163, 127]);
    });

    it('should clip to the byte range', () => {
        expect(shCoeffsToRgb([10, -10, 0])).toEqual([255, 0, 127]);
    });
});

describe('evalSHColors', () => {
    it('should return stored colors for clouds without SH', () => {
        const pc = new PointCloud({
            positions: new Float64Array(3),
            colors: new Uint8Array([255, 0, 51, 255]),
            scales: new Float32Array(3),
            rotations: new Float32Array(4),
            shCoeffs: null,
            shDegree: 0,
            crs: 'EPSG:4326',
            name: 'test'
        });

        expect(Array.from(evalSHColors(pc, new Vec3(0, 0, 1)))).toEqual([1, 0, Math.fround(0.2)]);
    });

    it('should evaluate a range of points', () => {
        const shCoeffs = new Float32Array(36);
        shCoeffs[12 + 9] = -0.5;
        shCoeffs[24 + 9] = 0.5;

        const pc = new PointCloud({
            positions: new Float64Array(9),
            colors: new Uint8Array(12),
            scales: new Float32Array(9),
            rotations: new Float32Array(12),
            shCoeffs,
            shDegree: 1,
            crs: 'EPSG:4326',
            name: 'test'
        });

        const result = evalSHColors(pc, new Vec3(0, 0, 1), 1, 3);
        expect(result.length).toBe(6);
        expect(result[0]).toBeCloseTo(0.5 + SH_C1 * 0.5, 6);
        expect(result[1]).toBeCloseTo(0.5, 6);
        expect(result[3]).toBeCloseTo(0.5 - SH_C1 * 0.5, 6);
    });
});
