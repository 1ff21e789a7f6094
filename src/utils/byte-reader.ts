// sequential reader over a byte buffer. every read advances the cursor by the
// size of the value read.
class ByteReader {
    readonly data: Uint8Array;
    readonly view: DataView;
    littleEndian: boolean;
    offset: number;

    constructor(data: Uint8Array, offset = 0, littleEndian = true) {
        this.data = data;
        this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
        this.littleEndian = littleEndian;
        this.offset = offset;
    }

    get remaining() {
        return this.data.byteLength - this.offset;
    }

    skip(numBytes: number) {
        this.offset += numBytes;
    }

    readUint8() {
        return this.data[this.offset++];
    }

    readInt8() {
        return this.view.getInt8(this.offset++);
    }

    readUint16() {
        const value = this.view.getUint16(this.offset, this.littleEndian);
        this.offset += 2;
        return value;
    }

    readInt16() {
        const value = this.view.getInt16(this.offset, this.littleEndian);
        this.offset += 2;
        return value;
    }

    readUint32() {
        const value = this.view.getUint32(this.offset, this.littleEndian);
        this.offset += 4;
        return value;
    }

    readInt32() {
        const value = this.view.getInt32(this.offset, this.littleEndian);
        this.offset += 4;
        return value;
    }

    readFloat32() {
        const value = this.view.getFloat32(this.offset, this.littleEndian);
        this.offset += 4;
        return value;
    }

    readFloat64() {
        const value = this.view.getFloat64(this.offset, this.littleEndian);
        this.offset += 8;
        return value;
    }

    // 3 byte little endian two's complement integer
    readInt24() {
        const value = readInt24(this.data, this.offset);
        this.offset += 3;
        return value;
    }
}

// sign extend the low 24 bits of a 3 byte little endian value
const readInt24 = (data: Uint8Array, offset: number) => {
    const value = data[offset] | (data[offset + 1] << 8) | (data[offset + 2] << 16);
    return (value & 0x800000) ? value - 0x1000000 : value;
};

// extract a 10 bit two's complement field starting at bit `shift` of a u32
const unpackInt10 = (packed: number, shift: number) => {
    const value = (packed >>> shift) & 0x3ff;
    return (value & 0x200) ? value - 0x400 : value;
};

export { ByteReader, readInt24, unpackInt10 };
