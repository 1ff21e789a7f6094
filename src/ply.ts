import { FormatError, UnsupportedFormatError } from './errors';

type PlyScalarKind = 'int8' | 'uint8' | 'int16' | 'uint16' | 'int32' | 'uint32' | 'float32' | 'float64';

type PlyFormat = 'ascii' | 'binary_little_endian' | 'binary_big_endian';

type PlyProperty = {
    name: string;               // 'x', f_dc_0', etc
    kind: PlyScalarKind;
};

type PlyElement = {
    name: string;               // 'vertex', etc
    count: number;
    properties: PlyProperty[];
    hasListProperty: boolean;
};

type PlyHeader = {
    format: PlyFormat;
    comments: string[];
    elements: PlyElement[];
};

// both the classic and the sized type names are accepted
const getScalarKind = (type: string): PlyScalarKind | null => {
    switch (type) {
        case 'char': case 'int8': return 'int8';
        case 'uchar': case 'uint8': return 'uint8';
        case 'short': case 'int16': return 'int16';
        case 'ushort': case 'uint16': return 'uint16';
        case 'int': case 'int32': return 'int32';
        case 'uint': case 'uint32': return 'uint32';
        case 'float': case 'float32': return 'float32';
        case 'double': case 'float64': return 'float64';
        default: return null;
    }
};

const scalarSize: Record<PlyScalarKind, number> = {
    int8: 1,
    uint8: 1,
    int16: 2,
    uint16: 2,
    int32: 4,
    uint32: 4,
    float32: 4,
    float64: 8
};

const parseFormat = (value: string | undefined): PlyFormat => {
    switch (value) {
        case 'ascii':
        case 'binary_little_endian':
        case 'binary_big_endian':
            return value;
        default:
            throw new FormatError(`invalid ply format '${value ?? ''}'`);
    }
};

// parse the ply header text into its format, comments and element schemas
const parsePlyHeader = (text: string): PlyHeader => {
    // decode header and split into lines
    const strings = text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line);

    if (strings[0] !== 'ply') {
        throw new FormatError('invalid ply header: missing ply magic');
    }

    let format: PlyFormat | null = null;
    const elements: PlyElement[] = [];
    const comments: string[] = [];
    let element: PlyElement | null = null;

    for (let i = 1; i < strings.length; ++i) {
        const words = strings[i].split(/\s+/);

        switch (words[0]) {
            case 'end_header':
                // skip
                break;
            case 'comment':
            case 'obj_info':
                comments.push(strings[i].substring(words[0].length + 1));
                break;
            case 'format':
                format = parseFormat(words[1]);
                break;
            case 'element': {
                const count = Number(words[2]);
                if (words.length !== 3 || !Number.isInteger(count) || count < 0) {
                    throw new FormatError(`invalid ply header line '${strings[i]}'`);
                }
                element = {
                    name: words[1],
                    count,
                    properties: [],
                    hasListProperty: false
                };
                elements.push(element);
                break;
            }
            case 'property': {
                if (!element) {
                    throw new FormatError(`ply property declared before any element: '${strings[i]}'`);
                }
                if (words[1] === 'list') {
                    element.hasListProperty = true;
                    break;
                }
                const kind = getScalarKind(words[1]);
                if (words.length !== 3 || !kind) {
                    throw new FormatError(`invalid ply header line '${strings[i]}'`);
                }
                element.properties.push({
                    name: words[2],
                    kind
                });
                break;
            }
            default: {
                throw new FormatError(`unrecognized header value '${words[0]}' in ply header`);
            }
        }
    }

    if (!format) {
        throw new FormatError('invalid ply header: missing format line');
    }

    return { format, comments, elements };
};

// size in bytes of one record of a fixed layout element
const calcStride = (element: PlyElement) => {
    if (element.hasListProperty) {
        throw new UnsupportedFormatError(`ply element '${element.name}' has list properties which are not supported`);
    }
    return element.properties.reduce((total, property) => total + scalarSize[property.kind], 0);
};

const shNames = new Array(45).fill('').map((_, i) => `f_rest_${i}`);

export type { PlyScalarKind, PlyFormat, PlyProperty, PlyElement, PlyHeader };
export { getScalarKind, parsePlyHeader, calcStride, shNames };
