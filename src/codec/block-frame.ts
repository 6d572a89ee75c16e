import { ByteReader, ByteWriter } from './byte-stream.js';
import { CorruptPayloadError, LimitExceededError, UnknownMethodTagError } from './errors.js';
import { BLOCK_MAGIC, BLOCK_VERSION, PACK_MAGIC, RAW_BYTES_PER_POINT, isTimestampMethod, isValueMethod } from './format.js';
import { getOuterCodec, outerCodecByName } from './outer-codecs.js';
import type { Block, OuterCodecName } from './types.js';

/** Largest raw frame `unpackBlock` accepts unless told otherwise (64 MiB). */
export const DEFAULT_MAX_RAW_BYTES = 64 * 1024 * 1024;

/**
 * Largest point count a decoder expands unless told otherwise: the raw size
 * limit in samples. A CONSTANT or SPARSE payload of a few bytes can declare
 * any count, so the frame size alone does not bound the decoded series.
 */
export const DEFAULT_MAX_POINTS = DEFAULT_MAX_RAW_BYTES / RAW_BYTES_PER_POINT;

export function enforcePointLimit(pointCount: number, maxPoints: number): void {
    if (pointCount > maxPoints) {
        throw new LimitExceededError(`Point count ${pointCount} exceeds limit ${maxPoints}`);
    }
}

function expectMagic(reader: ByteReader, magic: Uint8Array, what: string): void {
    const found = reader.readBytes(magic.length);
    for (let i = 0; i < magic.length; i++) {
        if (found[i] !== magic[i]) {
            throw new CorruptPayloadError(`${what}: bad magic`);
        }
    }
}

export function serializeBlock(block: Block): Uint8Array {
    const out = new ByteWriter();
    out.writeBytes(BLOCK_MAGIC);
    out.writeU8(BLOCK_VERSION);
    out.writeVarint(block.pointCount);
    out.writeU8(block.timestamps.method);
    out.writeSized(block.timestamps.bytes);
    out.writeU8(block.values.method);
    out.writeSized(block.values.bytes);
    return out.finish();
}

/**
 * Parses the frame only. Payloads are checked when the block is decoded.
 */
export function deserializeBlock(data: Uint8Array, maxPoints: number = DEFAULT_MAX_POINTS): Block {
    const reader = new ByteReader(data, 'block frame');
    expectMagic(reader, BLOCK_MAGIC, 'block frame');

    const version = reader.readU8();
    if (version !== BLOCK_VERSION) {
        throw new CorruptPayloadError(`block frame: unsupported version ${version}`);
    }
    const pointCount = reader.readCount(Number.MAX_SAFE_INTEGER, 'point count');
    enforcePointLimit(pointCount, maxPoints);

    const timestampTag = reader.readU8();
    if (!isTimestampMethod(timestampTag)) throw new UnknownMethodTagError('timestamp', timestampTag);
    // Copies, so the block does not pin the caller's buffer.
    const timestampBytes = reader.readSized().slice();

    const valueTag = reader.readU8();
    if (!isValueMethod(valueTag)) throw new UnknownMethodTagError('value', valueTag);
    const valueBytes = reader.readSized().slice();

    reader.expectEnd();

    return Object.freeze({
        pointCount,
        timestamps: Object.freeze({ method: timestampTag, bytes: timestampBytes }),
        values: Object.freeze({ method: valueTag, bytes: valueBytes }),
    });
}

export async function packBlock(block: Block, outer: OuterCodecName = 'zstd', level: number = 3): Promise<Uint8Array> {
    const raw = serializeBlock(block);
    const codec = outerCodecByName(outer);
    const compressed = await codec.compress(raw, level);

    const out = new ByteWriter();
    out.writeBytes(PACK_MAGIC);
    out.writeU8(codec.id);
    out.writeU32(raw.length);
    out.writeBytes(compressed);
    return out.finish();
}

export async function unpackBlock(
    data: Uint8Array,
    maxRawBytes: number = DEFAULT_MAX_RAW_BYTES,
    maxPoints: number = DEFAULT_MAX_POINTS
): Promise<Block> {
    const reader = new ByteReader(data, 'packed block');
    expectMagic(reader, PACK_MAGIC, 'packed block');

    const codec = getOuterCodec(reader.readU8());
    const rawLength = reader.readU32();
    if (rawLength > maxRawBytes) {
        throw new LimitExceededError(`Declared raw length ${rawLength} exceeds limit ${maxRawBytes}`);
    }

    const raw = await codec.decompress(reader.readBytes(reader.remaining), rawLength);
    if (raw.length !== rawLength) {
        throw new CorruptPayloadError(`packed block: raw length ${raw.length} !== declared ${rawLength}`);
    }
    return deserializeBlock(raw, maxPoints);
}
