import { Vec3 } from 'playcanvas';

import type { PointCloud } from './point-cloud';
import { evalSHColors } from './sh';

type ShadeOptions = {
    // direction the cloud is viewed from
    direction: Vec3;

    // when false, or when the cloud has no view dependent terms, stored colors are used
    useSH: boolean;
};

const DEFAULT_SHADE_OPTIONS: Readonly<ShadeOptions> = Object.freeze({
    direction: new Vec3(0, 0, 1),
    useSH: true
});

// display rgba for every point of the cloud
const shadePointCloud = (pointCloud: PointCloud, options: ShadeOptions = DEFAULT_SHADE_OPTIONS) => {
    const { numPoints, colors, shDegree } = pointCloud;

    if (!options.useSH || shDegree === 0) {
        return colors.slice();
    }

    const rgb = evalSHColors(pointCloud, options.direction);
    const result = new Uint8Array(numPoints * 4);
    for (let i = 0; i < numPoints; ++i) {
        result[i * 4 + 0] = Math.trunc(rgb[i * 3 + 0] * 255);
        result[i * 4 + 1] = Math.trunc(rgb[i * 3 + 1] * 255);
        result[i * 4 + 2] = Math.trunc(rgb[i * 3 + 2] * 255);
        result[i * 4 + 3] = colors[i * 4 + 3];
    }
    return result;
};

export type { ShadeOptions };
export { DEFAULT_SHADE_OPTIONS, shadePointCloud };
