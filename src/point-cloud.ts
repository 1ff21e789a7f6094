type SHDegree = 0 | 1 | 2 | 3;

const isSHDegree = (value: number): value is SHDegree => value === 0 || value === 1 || value === 2 || value === 3;

// number of floats stored per point for the given degree (3 channels per basis function)
const getSHCoeffsCount = (degree: SHDegree) => 3 * (degree + 1) * (degree + 1);

type PointCloudData = {
    positions: Float64Array;            // x, y, z in world space
    colors: Uint8Array;                 // r, g, b, a
    scales: Float32Array;               // sx, sy, sz
    rotations: Float32Array;            // w, x, y, z
    shCoeffs: Float32Array | null;      // getSHCoeffsCount(shDegree) per point
    shDegree: SHDegree;
    crs: string;
    name: string;
};

type Point = {
    x: number;
    y: number;
    z: number;
    red: number;
    green: number;
    blue: number;
    alpha: number;
    scale_0: number;
    scale_1: number;
    scale_2: number;
    rot_0: number;
    rot_1: number;
    rot_2: number;
    rot_3: number;
};

const createPoint = (): Point => ({
    x: 0, y: 0, z: 0,
    red: 0, green: 0, blue: 0, alpha: 0,
    scale_0: 0, scale_1: 0, scale_2: 0,
    rot_0: 0, rot_1: 0, rot_2: 0, rot_3: 0
});

// canonical decoded splats, stored as parallel typed arrays
class PointCloud {
    readonly positions: Float64Array;
    readonly colors: Uint8Array;
    readonly scales: Float32Array;
    readonly rotations: Float32Array;
    readonly shCoeffs: Float32Array | null;
    readonly shDegree: SHDegree;
    readonly crs: string;
    readonly name: string;
    readonly numPoints: number;

    constructor(data: PointCloudData) {
        const numPoints = data.positions.length / 3;

        if (!Number.isInteger(numPoints)) {
            throw new Error(`Array 'positions' has invalid length ${data.positions.length}, expected a multiple of 3`);
        }

        const check = (name: string, length: number, stride: number) => {
            if (length !== numPoints * stride) {
                throw new Error(`Array '${name}' has inconsistent number of points: expected ${numPoints}, got ${length / stride}`);
            }
        };

        check('colors', data.colors.length, 4);
        check('scales', data.scales.length, 3);
        check('rotations', data.rotations.length, 4);

        if (data.shCoeffs) {
            check('shCoeffs', data.shCoeffs.length, getSHCoeffsCount(data.shDegree));
        } else if (data.shDegree !== 0) {
            throw new Error(`SH degree ${data.shDegree} requires coefficients`);
        }

        this.positions = data.positions;
        this.colors = data.colors;
        this.scales = data.scales;
        this.rotations = data.rotations;
        this.shCoeffs = data.shCoeffs;
        this.shDegree = data.shDegree;
        this.crs = data.crs;
        this.name = data.name;
        this.numPoints = numPoints;
    }

    get hasSH() {
        return this.shCoeffs !== null;
    }

    get numSHCoeffs() {
        return this.shCoeffs ? getSHCoeffsCount(this.shDegree) : 0;
    }

    getPoint(index: number, point: Point = createPoint()): Point {
        const { positions, colors, scales, rotations } = this;
        point.x = positions[index * 3 + 0];
        point.y = positions[index * 3 + 1];
        point.z = positions[index * 3 + 2];
        point.red = colors[index * 4 + 0];
        point.green = colors[index * 4 + 1];
        point.blue = colors[index * 4 + 2];
        point.alpha = colors[index * 4 + 3];
        point.scale_0 = scales[index * 3 + 0];
        point.scale_1 = scales[index * 3 + 1];
        point.scale_2 = scales[index * 3 + 2];
        point.rot_0 = rotations[index * 4 + 0];
        point.rot_1 = rotations[index * 4 + 1];
        point.rot_2 = rotations[index * 4 + 2];
        point.rot_3 = rotations[index * 4 + 3];
        return point;
    }

    /**
     * A single point's coefficients, or null when the cloud has no SH.
     *
     * The result is a view onto the cloud's storage, not a copy. Callers must not
     * write through it; take `slice()` of it to get a mutable copy.
     */
    getSHCoeffs(index: number): Float32Array | null {
        if (!this.shCoeffs) {
            return null;
        }
        const count = getSHCoeffsCount(this.shDegree);
        return this.shCoeffs.subarray(index * count, (index + 1) * count);
    }
}

export type { SHDegree, Point, PointCloudData };
export { PointCloud, isSHDegree, getSHCoeffsCount };
