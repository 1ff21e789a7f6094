import { Vec3 } from 'playcanvas';

// uniform scale followed by a translation: world = raw * scale + origin
type Transform = {
    origin: Vec3;
    scale: number;
};

const IDENTITY_TRANSFORM: Readonly<Transform> = Object.freeze({
    origin: Vec3.ZERO,
    scale: 1
});

const validateTransform = (transform: Transform) => {
    const { origin, scale } = transform;
    if (![origin.x, origin.y, origin.z].every(Number.isFinite)) {
        throw new Error(`Invalid transform origin: ${origin.x},${origin.y},${origin.z}`);
    }
    if (!Number.isFinite(scale) || scale <= 0) {
        throw new Error(`Invalid transform scale: ${scale}, must be a finite number greater than 0`);
    }
};

// apply the transform to a raw position and store the result at positions[index * 3]
const transformPosition = (transform: Transform, x: number, y: number, z: number, positions: Float64Array, index: number) => {
    const { origin, scale } = transform;
    positions[index * 3 + 0] = x * scale + origin.x;
    positions[index * 3 + 1] = y * scale + origin.y;
    positions[index * 3 + 2] = z * scale + origin.z;
};

export type { Transform };
export { IDENTITY_TRANSFORM, validateTransform, transformPosition };
