export { decodeSplat, deriveName, getInputFormat } from './decode';
export type { DecodeResult, InputFormat } from './decode';
export { DecodeError, DecompressionError, FormatError, UnsupportedFormatError, isDecodeError } from './errors';
export type { DecodeErrorKind } from './errors';
export { parsePlyHeader } from './ply';
export type { PlyElement, PlyFormat, PlyHeader, PlyProperty, PlyScalarKind } from './ply';
export { PointCloud, getSHCoeffsCount, isSHDegree } from './point-cloud';
export type { Point, PointCloudData, SHDegree } from './point-cloud';
export { readPly } from './readers/read-ply';
export { readSplat } from './readers/read-splat';
export { readSpz, readSpzHeader } from './readers/read-spz';
export type { SpzHeader } from './readers/read-spz';
export type { ProgressCallback, ReadOptions, ReadResult, Reader } from './readers/types';
export {
    SH_C0,
    SH_C1,
    SH_C2,
    SH_C3,
    evalSH,
    evalSHBand0,
    evalSHBand1,
    evalSHBand2,
    evalSHBand3,
    evalSHColors,
    inferSHDegree,
    shCoeffsToRgb
} from './sh';
export type { RGB, SHCoeffs } from './sh';
export { DEFAULT_SHADE_OPTIONS, shadePointCloud } from './shade';
export type { ShadeOptions } from './shade';
export { IDENTITY_TRANSFORM, validateTransform } from './transform';
export type { Transform } from './transform';
export { decodeQuatInt8, decodeQuatSmallestThree, decodeQuatUint8 } from './utils/quat-codecs';
export { formatCsvRows, writeCsv } from './writers/write-csv';
