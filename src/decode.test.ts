import { describe, it, expect } from 'vitest';

import { decodeSplat, deriveName, getInputFormat } from './decode';
import { FormatError, UnsupportedFormatError } from './errors';
import type { ReadOptions } from './readers/types';
import { IDENTITY_TRANSFORM } from './transform';

const options: ReadOptions = {
    transform: IDENTITY_TRANSFORM,
    crs: 'EPSG:4326',
    name: 'test'
};

describe('getInputFormat', () => {
    it('should select the format by extension', () => {
        expect(getInputFormat('scene.ply')).toBe('ply');
        expect(getInputFormat('SCENE.SPZ')).toBe('spz');
        expect(getInputFormat('scene.splat')).toBe('splat');
        expect(getInputFormat('scene.bin')).toBe('splat');
    });
});

describe('deriveName', () => {
    it('should strip the path and format extensions', () => {
        expect(deriveName('/data/scenes/garden.ply')).toBe('garden');
        expect(deriveName('https://example.com/a/b/room.splat')).toBe('room');
        expect(deriveName('plain')).toBe('plain');
        expect(deriveName('cloud.spz.bin')).toBe('cloud.bin');
    });
});

describe('decodeSplat', () => {
    it('should decode with the reader selected by filename', () => {
        const result = decodeSplat('points.splat', new Uint8Array(64), options);

        expect(result.status).toBe('complete');
        if (result.status === 'complete') {
            expect(result.pointCloud.numPoints).toBe(2);
        }
    });

    it('should return format failures', () => {
        const result = decodeSplat('points.splat', new Uint8Array(31), options);

        expect(result.status).toBe('failed');
        if (result.status === 'failed') {
            expect(result.error).toBeInstanceOf(FormatError);
            expect(result.error.kind).toBe('format');
        }
    });

    it('should return unsupported failures', () => {
        const data = new TextEncoder().encode('ply\nformat ascii 1.0\nelement vertex 1\nproperty float x\nend_header\n');
        const result = decodeSplat('points.ply', data, options);

        expect(result.status).toBe('failed');
        if (result.status === 'failed') {
            expect(result.error).toBeInstanceOf(UnsupportedFormatError);
            expect(result.error.kind).toBe('unsupported');
        }
    });

    it('should return decompression failures', () => {
        const result = decodeSplat('points.spz', new Uint8Array([1, 2, 3]), options);

        expect(result.status).toBe('failed');
        if (result.status === 'failed') {
            expect(result.error.kind).toBe('decompression');
        }
    });

    it('should propagate errors that are not decode failures', () => {
        expect(() => decodeSplat('points.splat', new Uint8Array(32), { ...options, transform: { ...IDENTITY_TRANSFORM, scale: -1 } }))
        .toThrow('Invalid transform scale');
    });
});
