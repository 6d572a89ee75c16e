import { decodeVarintAt, writeVarint, type IntLike } from '../codec-utils.js';
import { CorruptPayloadError, TruncatedPayloadError } from './errors.js';

/**
 * Append-only byte sink for payload layouts. Fixed-width fields are
 * little-endian.
 */
export class ByteWriter {
    private readonly bytes: number[] = [];
    private readonly scratch = new DataView(new ArrayBuffer(8));

    writeU8(value: number): void {
        this.bytes.push(value & 0xFF);
    }

    writeU32(value: number): void {
        this.scratch.setUint32(0, value, true);
        this.pushScratch(4);
    }

    writeI64(value: bigint): void {
        this.scratch.setBigInt64(0, value, true);
        this.pushScratch(8);
    }

    writeU64(value: bigint): void {
        this.scratch.setBigUint64(0, value, true);
        this.pushScratch(8);
    }

    writeF64(value: number): void {
        this.scratch.setFloat64(0, value, true);
        this.pushScratch(8);
    }

    writeVarint(value: IntLike): void {
        writeVarint(this.bytes, value);
    }

    writeBytes(data: Uint8Array): void {
        for (const byte of data) this.bytes.push(byte);
    }

    /** Varint length prefix followed by the bytes. */
    writeSized(data: Uint8Array): void {
        this.writeVarint(data.length);
        this.writeBytes(data);
    }

    finish(): Uint8Array {
        return new Uint8Array(this.bytes);
    }

    private pushScratch(n: number): void {
        for (let i = 0; i < n; i++) this.bytes.push(this.scratch.getUint8(i));
    }
}

/**
 * Bounds-checked cursor over a payload. Every read either succeeds in full or
 * throws TruncatedPayloadError.
 */
export class ByteReader {
    private pos = 0;
    private readonly view: DataView;

    constructor(private readonly data: Uint8Array, private readonly context: string = 'payload') {
        this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    }

    get remaining(): number {
        return this.data.length - this.pos;
    }

    readU8(): number {
        this.require(1);
        return this.data[this.pos++];
    }

    readU32(): number {
        this.require(4);
        const value = this.view.getUint32(this.pos, true);
        this.pos += 4;
        return value;
    }

    readI64(): bigint {
        this.require(8);
        const value = this.view.getBigInt64(this.pos, true);
        this.pos += 8;
        return value;
    }

    readU64(): bigint {
        this.require(8);
        const value = this.view.getBigUint64(this.pos, true);
        this.pos += 8;
        return value;
    }

    readF64(): number {
        this.require(8);
        const value = this.view.getFloat64(this.pos, true);
        this.pos += 8;
        return value;
    }

    readVarint(): bigint {
        const { value, nextPos } = decodeVarintAt(this.data, this.pos);
        this.pos = nextPos;
        return value;
    }

    /**
     * Varint that must be a count or index in `[0, max]`.
     */
    readCount(max: number, what: string): number {
        const value = this.readVarint();
        if (value < 0n || value > BigInt(max)) {
            throw new CorruptPayloadError(`${this.context}: ${what} ${value} outside [0, ${max}]`);
        }
        return Number(value);
    }

    /** Stored point count, which must agree with the block's. */
    expectCount(expected: number): void {
        const value = this.readVarint();
        if (value !== BigInt(expected)) {
            throw new CorruptPayloadError(`${this.context}: holds ${value} points, block declares ${expected}`);
        }
    }

    readBytes(n: number): Uint8Array {
        this.require(n);
        const slice = this.data.subarray(this.pos, this.pos + n);
        this.pos += n;
        return slice;
    }

    /** A prefix longer than what is left is a truncation, not corruption. */
    readSized(): Uint8Array {
        const length = this.readVarint();
        if (length < 0n) {
            throw new CorruptPayloadError(`${this.context}: negative length prefix ${length}`);
        }
        if (length > BigInt(this.remaining)) {
            throw new TruncatedPayloadError(`${this.context}: need ${length} bytes at offset ${this.pos}, have ${this.remaining}`);
        }
        return this.readBytes(Number(length));
    }

    /** Every byte of a payload belongs to the layout. */
    expectEnd(): void {
        if (this.remaining !== 0) {
            throw new CorruptPayloadError(`${this.context}: ${this.remaining} trailing bytes`);
        }
    }

    private require(n: number): void {
        if (this.remaining < n) {
            throw new TruncatedPayloadError(`${this.context}: need ${n} bytes at offset ${this.pos}, have ${this.remaining}`);
        }
    }
}
