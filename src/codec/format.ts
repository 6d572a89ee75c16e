export enum TimestampMethod {
    EMPTY = 0,
    SINGLE = 1,
    PAIR = 2,
    DOUBLE_DELTA = 3,
}

// Value tags start at 16 so a timestamp tag in the value slot never decodes.
export enum ValueMethod {
    CONSTANT = 16,
    NEAR_CONSTANT = 17,
    POWER_OF_2 = 18,
    MOSTLY_INTEGER = 19,
    LINEAR = 20,
    PERIODIC = 21,
    QUANTIZED = 22,
    SPARSE = 23,
    XOR = 24,
    DELTA = 25,
}

export enum OuterCodecId {
    NONE = 0,
    ZSTD = 1,
}

export enum DeltaMode {
    PLAIN = 0,
    ZERO_RUN = 1,
}

export const BLOCK_MAGIC = new Uint8Array([0x53, 0x42]); // "SB"
export const BLOCK_VERSION = 0x01;

export const PACK_MAGIC = new Uint8Array([0x53, 0x42, 0x5A, 0x31]); // "SBZ1"

/** Bytes a sample takes uncompressed: int64 timestamp + float64 value. */
export const RAW_BYTES_PER_POINT = 16;

/** `readBits` returns at most this many bits. */
export const MAX_BIT_FIELD = 64;

export function isTimestampMethod(tag: number): tag is TimestampMethod {
    return tag >= TimestampMethod.EMPTY && tag <= TimestampMethod.DOUBLE_DELTA && Number.isInteger(tag);
}

export function isValueMethod(tag: number): tag is ValueMethod {
    return tag >= ValueMethod.CONSTANT && tag <= ValueMethod.DELTA && Number.isInteger(tag);
}
