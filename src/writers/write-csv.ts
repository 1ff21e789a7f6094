import type { FileHandle } from 'node:fs/promises';

import type { PointCloud } from '../point-cloud';
import { shadePointCloud, type ShadeOptions } from '../shade';

const columnNames = [
    'x', 'y', 'z',
    'red', 'green', 'blue', 'alpha',
    'scale_0', 'scale_1', 'scale_2',
    'rot_0', 'rot_1', 'rot_2', 'rot_3'
];

// format one csv row per point. colors are shaded for the given view.
const formatCsvRows = (pointCloud: PointCloud, shadeOptions?: ShadeOptions) => {
    const { numPoints, positions, scales, rotations } = pointCloud;
    const colors = shadePointCloud(pointCloud, shadeOptions);

    const rows: string[] = [];
    for (let i = 0; i < numPoints; ++i) {
        rows.push([
            positions[i * 3 + 0], positions[i * 3 + 1], positions[i * 3 + 2],
            colors[i * 4 + 0], colors[i * 4 + 1], colors[i * 4 + 2], colors[i * 4 + 3],
            scales[i * 3 + 0], scales[i * 3 + 1], scales[i * 3 + 2],
            rotations[i * 4 + 0], rotations[i * 4 + 1], rotations[i * 4 + 2], rotations[i * 4 + 3]
        ].join(','));
    }
    return rows;
};

const writeCsv = async (fileHandle: FileHandle, pointCloud: PointCloud, shadeOptions?: ShadeOptions) => {
    // write header
    await fileHandle.write(`${columnNames.join(',')}\n`);

    // write rows
    for (const row of formatCsvRows(pointCloud, shadeOptions)) {
        await fileHandle.write(`${row}\n`);
    }
};

export { columnNames, formatCsvRows, writeCsv };
