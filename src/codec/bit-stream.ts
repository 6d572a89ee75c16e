import { InsufficientBitsError } from './errors.js';
import { MAX_BIT_FIELD } from './format.js';

function checkWidth(n: number): void {
    if (!Number.isInteger(n) || n < 0 || n > MAX_BIT_FIELD) {
        throw new RangeError(`Bit field width must be an integer in [0, ${MAX_BIT_FIELD}], got ${n}`);
    }
}

/**
 * Packs arbitrary-width bit fields MSB-first into a growing byte buffer.
 */
export class BitWriter {
    private readonly bytes: number[] = [];
    private current = 0;
    private bitsInCurrent = 0;

    /** Total bits written so far, padding excluded. */
    get bitLength(): number {
        return this.bytes.length * 8 + this.bitsInCurrent;
    }

    /**
     * Append the low `n` bits of `value`, most significant first.
     */
    writeBits(value: bigint | number, n: number): void {
        checkWidth(n);
        if (n === 0) return;

        const masked = BigInt.asUintN(n, typeof value === 'bigint' ? value : BigInt(value));
        let remaining = n;

        while (remaining > 0) {
            const take = Math.min(remaining, 8 - this.bitsInCurrent);
            const shift = BigInt(remaining - take);
            const chunk = Number((masked >> shift) & BigInt((1 << take) - 1));

            this.current = (this.current << take) | chunk;
            this.bitsInCurrent += take;
            remaining -= take;

            if (this.bitsInCurrent === 8) {
                this.bytes.push(this.current);
                this.current = 0;
                this.bitsInCurrent = 0;
            }
        }
    }

    writeBit(bit: 0 | 1): void {
        this.writeBits(bit, 1);
    }

    /**
     * Pad the final byte with zero bits and return the buffer.
     * The writer is reset and can be reused.
     */
    flush(): Uint8Array {
        if (this.bitsInCurrent > 0) {
            this.bytes.push((this.current << (8 - this.bitsInCurrent)) & 0xFF);
        }
        const result = new Uint8Array(this.bytes);
        this.bytes.length = 0;
        this.current = 0;
        this.bitsInCurrent = 0;
        return result;
    }
}

/**
 * Bounds-checked MSB-first cursor over a byte buffer.
 */
export class BitReader {
    private bitPos = 0;

    constructor(private readonly data: Uint8Array) { }

    get remainingBits(): number {
        return this.data.length * 8 - this.bitPos;
    }

    hasBits(n: number = 1): boolean {
        return this.remainingBits >= n;
    }

    /**
     * Read the next `n` bits. Throws InsufficientBitsError instead of
     * returning padding past the end of the buffer.
     */
    readBits(n: number): bigint {
        checkWidth(n);
        if (!this.hasBits(n)) {
            throw new InsufficientBitsError(n, this.remainingBits);
        }

        let result = 0n;
        let remaining = n;

        while (remaining > 0) {
            const byte = this.data[this.bitPos >>> 3];
            const bitOffset = this.bitPos & 7;
            const available = 8 - bitOffset;
            const take = Math.min(remaining, available);
            const bits = (byte >>> (available - take)) & ((1 << take) - 1);

            result = (result << BigInt(take)) | BigInt(bits);
            this.bitPos += take;
            remaining -= take;
        }

        return result;
    }

    /** `readBits` for fields of at most 32 bits, returned as a number. */
    readSmall(n: number): number {
        if (n > 32) throw new RangeError(`readSmall supports at most 32 bits, got ${n}`);
        return Number(this.readBits(n));
    }

    readBit(): 0 | 1 {
        return this.readBits(1) === 0n ? 0 : 1;
    }
}
