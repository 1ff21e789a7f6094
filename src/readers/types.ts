import type { PointCloud } from '../point-cloud';
import type { Transform } from '../transform';

type ProgressCallback = (progress: number, message: string) => void;

type ReadOptions = {
    transform: Transform;
    crs: string;
    name: string;

    // polled between records (or batches of records). returning true stops the read.
    isCancelled?: () => boolean;

    // progress is in the range 0..1
    onProgress?: ProgressCallback;
};

type ReadResult = {
    status: 'complete';
    pointCloud: PointCloud;
} | {
    status: 'aborted';
};

type Reader = (data: Uint8Array, options: ReadOptions) => ReadResult;

const ABORTED: ReadResult = Object.freeze({ status: 'aborted' });

// number of records between progress notifications
const PROGRESS_INTERVAL = 10000;

const notCancelled = () => false;

export type { ProgressCallback, ReadOptions, ReadResult, Reader };
export { ABORTED, PROGRESS_INTERVAL, notCancelled };
