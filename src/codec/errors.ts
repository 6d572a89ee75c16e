export enum CodecErrorCode {
    INSUFFICIENT_BITS = 101,
    TRUNCATED_PAYLOAD = 102,
    TRUNCATED_VARINT = 103,
    UNKNOWN_METHOD_TAG = 201,
    CORRUPT_XOR_STREAM = 202,
    CORRUPT_PAYLOAD = 203,
    LIMIT_EXCEEDED = 301,
    ROUND_TRIP_MISMATCH = 401,
}

export class CodecError extends Error {
    constructor(message: string, public readonly code: CodecErrorCode) {
        super(message);
        this.name = 'CodecError';
    }
}

/**
 * Buffer exhausted before the expected data was fully read.
 * Always a caller or framing bug, never a data-dependent case.
 */
export class IncompleteDataError extends CodecError {
    constructor(message: string, code: CodecErrorCode) {
        super(message, code);
        this.name = 'IncompleteDataError';
    }
}

export class InsufficientBitsError extends IncompleteDataError {
    constructor(public readonly requested: number, public readonly available: number) {
        super(`Not enough bits available: need ${requested}, have ${available}`, CodecErrorCode.INSUFFICIENT_BITS);
        this.name = 'InsufficientBitsError';
    }
}

export class TruncatedPayloadError extends IncompleteDataError {
    constructor(message: string, code: CodecErrorCode = CodecErrorCode.TRUNCATED_PAYLOAD) {
        super(message, code);
        this.name = 'TruncatedPayloadError';
    }
}

export class TruncatedVarintError extends TruncatedPayloadError {
    constructor(position: number) {
        super(`Truncated varint at byte ${position}`, CodecErrorCode.TRUNCATED_VARINT);
        this.name = 'TruncatedVarintError';
    }
}

/** No decoder is registered for a tag: version or format skew. */
export class UnknownMethodTagError extends CodecError {
    constructor(public readonly domain: 'timestamp' | 'value' | 'outer', public readonly tag: number) {
        super(`Unknown ${domain} method tag: ${tag}`, CodecErrorCode.UNKNOWN_METHOD_TAG);
        this.name = 'UnknownMethodTagError';
    }
}

export class CorruptXorStreamError extends CodecError {
    constructor(message: string) {
        super(message, CodecErrorCode.CORRUPT_XOR_STREAM);
        this.name = 'CorruptXorStreamError';
    }
}

/** Structurally impossible payload: count mismatch, index out of range, trailing bytes. */
export class CorruptPayloadError extends CodecError {
    constructor(message: string) {
        super(message, CodecErrorCode.CORRUPT_PAYLOAD);
        this.name = 'CorruptPayloadError';
    }
}

export class LimitExceededError extends CodecError {
    constructor(message: string) {
        super(message, CodecErrorCode.LIMIT_EXCEEDED);
        this.name = 'LimitExceededError';
    }
}

export class RoundTripMismatchError extends CodecError {
    constructor(message: string, public readonly index: number) {
        super(message, CodecErrorCode.ROUND_TRIP_MISMATCH);
        this.name = 'RoundTripMismatchError';
    }
}
