import { randomBytes } from 'crypto';
import { lstat, open, readFile, rename } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { exit, hrtime } from 'node:process';
import { parseArgs } from 'node:util';

import { Vec3 } from 'playcanvas';

import { version } from '../package.json';
import { decodeSplat, deriveName, getInputFormat } from './decode';
import type { PointCloud } from './point-cloud';
import type { ShadeOptions } from './shade';
import type { Transform } from './transform';
import { writeCsv } from './writers/write-csv';

type Options = {
    overwrite: boolean,
    help: boolean,
    version: boolean,
    verbose: boolean,
    transform: Transform,
    crs: string,
    shade: ShadeOptions
};

const fileExists = async (filename: string) => {
    try {
        await lstat(filename);
        return true;
    } catch (e: unknown) {
        if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
            return false;
        }
        throw e; // real error (permissions, etc)
    }
};

const readPointCloud = async (filename: string, options: Options): Promise<PointCloud> => {
    console.log(`reading '${filename}' as ${getInputFormat(filename)}...`);

    const data = await readFile(filename);

    const result = decodeSplat(filename, data, {
        transform: options.transform,
        crs: options.crs,
        name: deriveName(filename),
        onProgress: options.verbose ?
            (progress, message) => console.log(`[${Math.round(progress * 100)}%] ${message}`) :
            undefined
    });

    switch (result.status) {
        case 'complete':
            return result.pointCloud;
        case 'aborted':
            throw new Error(`Reading '${filename}' was cancelled`);
        case 'failed':
            throw result.error;
    }
};

const writeFile = async (filename: string, pointCloud: PointCloud, options: Options) => {
    if (!filename.toLowerCase().endsWith('.csv')) {
        throw new Error(`Unsupported output file type: ${filename}`);
    }

    console.log(`writing '${filename}'...`);

    // write to a temporary file and rename on success
    const tmpFilename = `.${basename(filename)}.${process.pid}.${Date.now()}.${randomBytes(6).toString('hex')}.tmp`;
    const tmpPathname = join(dirname(filename), tmpFilename);

    // open the tmp output file
    const outputFile = await open(tmpPathname, 'wx');

    try {
        await writeCsv(outputFile, pointCloud, options.shade);

        // flush to disk
        await outputFile.sync();
    } finally {
        await outputFile.close();
    }

    // atomically rename to target filename
    await rename(tmpPathname, filename);
};

const logSummary = (pointCloud: PointCloud) => {
    const { numPoints, positions, shDegree, name, crs } = pointCloud;

    const min = new Vec3(Infinity, Infinity, Infinity);
    const max = new Vec3(-Infinity, -Infinity, -Infinity);
    const p = new Vec3();
    for (let i = 0; i < numPoints; ++i) {
        p.set(positions[i * 3 + 0], positions[i * 3 + 1], positions[i * 3 + 2]);
        min.min(p);
        max.max(p);
    }

    console.log(`name: ${name}`);
    console.log(`crs: ${crs}`);
    console.log(`points: ${numPoints}`);
    console.log(`sh degree: ${shDegree}`);
    console.log(`bounds: [${min.x}, ${min.y}, ${min.z}] - [${max.x}, ${max.y}, ${max.z}]`);
};

const parseArguments = () => {
    const { values: v, positionals } = parseArgs({
        strict: true,
        allowPositionals: true,
        options: {
            overwrite: { type: 'boolean', short: 'w' },
            help: { type: 'boolean', short: 'h' },
            version: { type: 'boolean', short: 'v' },
            verbose: { type: 'boolean', short: 'V' },
            origin: { type: 'string', short: 'o' },
            scale: { type: 'string', short: 's' },
            crs: { type: 'string', short: 'c' },
            direction: { type: 'string', short: 'd' },
            'no-sh': { type: 'boolean', short: 'n' }
        }
    });

    const parseNumber = (value: string): number => {
        const result = Number(value);
        if (isNaN(result)) {
            throw new Error(`Invalid number value: ${value}`);
        }
        return result;
    };

    const parseVec3 = (value: string): Vec3 => {
        const parts = value.split(',').map(Number);
        if (parts.length !== 3 || parts.some(isNaN)) {
            throw new Error(`Invalid Vec3 value: ${value}`);
        }
        return new Vec3(parts[0], parts[1], parts[2]);
    };

    const options: Options = {
        overwrite: v.overwrite ?? false,
        help: v.help ?? false,
        version: v.version ?? false,
        verbose: v.verbose ?? false,
        transform: {
            origin: parseVec3(v.origin ?? '0,0,0'),
            scale: parseNumber(v.scale ?? '1')
        },
        crs: v.crs ?? 'EPSG:4326',
        shade: {
            direction: parseVec3(v.direction ?? '0,0,1'),
            useSH: !(v['no-sh'] ?? false)
        }
    };

    return { files: positionals, options };
};

const usage = `
Decode Gaussian-splat point clouds
==================================

USAGE
  splat-decode [OPTIONS] <input.{ply|splat|spz}> [output.csv]

  • The input is decoded and a summary is printed.
  • When an output file is given, every point is written to it as csv.
  • The input format is chosen by extension; unknown extensions are read as .splat.

OPTIONS
    -o, --origin     x,y,z                  Offset added to every position. Default is 0,0,0.
    -s, --scale      x                      Uniform scale applied to positions before the offset. Default is 1.
    -c, --crs        token                  Coordinate reference passed through to the output. Default is EPSG:4326.
    -d, --direction  x,y,z                  View direction used to evaluate spherical harmonics. Default is 0,0,1.
    -n, --no-sh                             Write stored colors instead of evaluating spherical harmonics.
    -w, --overwrite                         Overwrite output file if it already exists. Default is false.
    -V, --verbose                           Log decoding progress.
    -h, --help                              Show this help and exit.
    -v, --version                           Show version and exit.

EXAMPLES
    # Print a summary
    splat-decode bunny.ply

    # Place the cloud at a projected origin and export it
    splat-decode -o 500000,4000000,0 -s 0.5 -c EPSG:32633 scene.spz scene.csv

    # Export colors as seen looking along -x
    splat-decode -d -1,0,0 bunny.ply bunny.csv
`;

const main = async () => {
    console.log(`splat-decode v${version}`);

    const startTime = hrtime();

    try {
        // read args
        const { files, options } = parseArguments();

        // show version and exit
        if (options.version) {
            exit(0);
        }

        // invalid args or show help
        if (files.length < 1 || files.length > 2 || options.help) {
            console.error(usage);
            exit(1);
        }

        const [inputFilename, outputFilename] = files;

        // check overwrite before doing any work
        if (outputFilename && !options.overwrite && await fileExists(outputFilename)) {
            console.error(`File '${outputFilename}' already exists. Use -w option to overwrite.`);
            exit(1);
        }

        const pointCloud = await readPointCloud(resolve(inputFilename), options);

        logSummary(pointCloud);

        if (outputFilename) {
            await writeFile(resolve(outputFilename), pointCloud, options);
        }
    } catch (err) {
        // handle errors
        console.error(err);
        exit(1);
    }

    const endTime = hrtime(startTime);

    console.log(`done in ${endTime[0] + endTime[1] / 1e9}s`);
};

export { main };
