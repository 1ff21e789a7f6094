import { Vec3 } from 'playcanvas';
import { describe, it, expect } from 'vitest';

import { FormatError } from '../errors';
import { IDENTITY_TRANSFORM } from '../transform';
import { readSplat } from './read-splat';
import type { ReadOptions } from './types';

type SplatRecord = {
    position: [number, number, number];
    scale: [number, number, number];
    color: [number, number, number, number];
    rotation: [number, number, number, number];
};

const encodeSplats = (records: SplatRecord[]) => {
    const data = new Uint8Array(records.length * 32);
    const view = new DataView(data.buffer);
    records.forEach((record, i) => {
        const o = i * 32;
        record.position.forEach((v, c) => view.setFloat32(o + c * 4, v, true));
        record.scale.forEach((v, c) => view.setFloat32(o + 12 + c * 4, v, true));
        data.set(record.color, o + 24);
        data.set(record.rotation, o + 28);
    });
    return data;
};

const record: SplatRecord = {
    position: [1, 2, 3],
    scale: [0.5, 1, 2],
    color: [10, 20, 30, 40],
    rotation: [255, 128, 128, 128]
};

const options: ReadOptions = {
    transform: IDENTITY_TRANSFORM,
    crs: 'EPSG:4326',
    name: 'test'
};

describe('readSplat', () => {
    it('should decode a single record', () => {
        const result = readSplat(encodeSplats([record]), options);
        if (result.status !== 'complete') throw new Error('expected a complete read');

        const pc = result.pointCloud;
        expect(pc.numPoints).toBe(1);
        expect(pc.shDegree).toBe(0);
        expect(pc.shCoeffs).toBeNull();
        expect(pc.crs).toBe('EPSG:4326');
        expect(pc.name).toBe('test');
        expect(pc.getPoint(0)).toEqual({
            x: 1, y: 2, z: 3,
            red: 10, green: 20, blue: 30, alpha: 40,
            scale_0: 0.5, scale_1: 1, scale_2: 2,
            rot_0: 0.9921875, rot_1: 0, rot_2: 0, rot_3: 0
        });
    });

    it('should apply scale then origin to positions', () => {
        const result = readSplat(encodeSplats([record]), {
            ...options,
            transform: { origin: new Vec3(10, 0, 0), scale: 2 }
        });
        if (result.status !== 'complete') throw new Error('expected a complete read');

        expect(Array.from(result.pointCloud.positions)).toEqual([12, 4, 6]);
    });

    it('should keep the stored rotation bytes without renormalizing', () => {
        const result = readSplat(encodeSplats([{ ...record, rotation: [0, 0, 0, 0] }]), options);
        if (result.status !== 'complete') throw new Error('expected a complete read');

        expect(Array.from(result.pointCloud.rotations)).toEqual([-1, -1, -1, -1]);
    });

    it('should reject data that is not a multiple of 32 bytes', () => {
        expect(() => readSplat(new Uint8Array(33), options))
        .toThrow('Invalid .splat file: size 33 is not a multiple of 32 bytes');
    });

    it('should reject empty data', () => {
        expect(() => readSplat(new Uint8Array(0), options)).toThrow(FormatError);
    });

    it('should reject an invalid transform', () => {
        expect(() => readSplat(encodeSplats([record]), {
            ...options,
            transform: { origin: new Vec3(), scale: 0 }
        })).toThrow('Invalid transform scale: 0, must be a finite number greater than 0');
    });

    it('should report progress', () => {
        const calls: [number, string][] = [];
        readSplat(encodeSplats([record, record, record]), {
            ...options,
            onProgress: (progress, message) => calls.push([progress, message])
        });

        expect(calls).toEqual([[0, 'Parsing 3 splats...'], [1, 'Complete']]);
    });

    it('should abort when cancelled', () => {
        let polls = 0;
        const result = readSplat(new Uint8Array(1000000 * 32), {
            ...options,
            isCancelled: () => ++polls > 100
        });

        expect(result).toEqual({ status: 'aborted' });
        expect(polls).toBe(101);
    });
});
