import { BlockCodec, decodeBlock, encodeBlock } from '../../src/codec/block.js';
import { DEFAULT_MAX_POINTS, deserializeBlock, packBlock, serializeBlock, unpackBlock } from '../../src/codec/block-frame.js';
import { ByteWriter } from '../../src/codec/byte-stream.js';
import { LimitExceededError } from '../../src/codec/errors.js';
import { TimestampMethod, ValueMethod } from '../../src/codec/format.js';
import { encodeTimestamps } from '../../src/codec/timestamp-codec.js';
import type { Block } from '../../src/codec/types.js';
import { expectSameSeries, makeSeries, regularTimestamps } from '../helpers/test-utils.js';

/** A CONSTANT block whose 16-byte value payload declares `pointCount` points. */
function constantBlock(pointCount: number): Block {
    const values = new ByteWriter();
    values.writeF64(1);
    values.writeU64(BigInt(pointCount));
    return {
        pointCount,
        timestamps: encodeTimestamps(regularTimestamps(3)),
        values: { method: ValueMethod.CONSTANT, bytes: values.finish() },
    };
}

describe('Regression: declared point counts', () => {
    it('defaults to the raw byte limit in samples', () => {
        expect(DEFAULT_MAX_POINTS).toBe(4 * 1024 * 1024);
    });

    it('refuses a frame declaring 2^33 points before reading its payloads', () => {
        const frame = serializeBlock(constantBlock(2 ** 33));
        expect(frame.length).toBeLessThan(64);
        expect(() => deserializeBlock(frame)).toThrow(LimitExceededError);
    });

    it('refuses to expand a small payload past the limit', () => {
        const block = constantBlock(20_000_000);
        expect(() => decodeBlock(block)).toThrow(LimitExceededError);
        expect(() => new BlockCodec().decodeColumns(block)).toThrow(LimitExceededError);
    });

    it('applies an explicit limit to frames, blocks and packed blocks', async () => {
        const series = makeSeries([50, 50, 50, 50, 50]);
        const block = encodeBlock(series);
        expect(block.timestamps.method).toBe(TimestampMethod.DOUBLE_DELTA);

        expect(() => deserializeBlock(serializeBlock(block), 4)).toThrow(LimitExceededError);
        expect(deserializeBlock(serializeBlock(block), 5)).toEqual(block);
        expect(() => decodeBlock(block, 4)).toThrow(LimitExceededError);
        expectSameSeries(decodeBlock(block, 5), series);

        const packed = await packBlock(block, 'none');
        await expect(unpackBlock(packed, undefined, 4)).rejects.toThrow(LimitExceededError);
        await expect(new BlockCodec({ maxPoints: 4 }).unpack(packed)).rejects.toThrow(LimitExceededError);
        expectSameSeries(await new BlockCodec({ maxPoints: 5 }).unpack(packed), series);
    });

    it('takes the codec option on decode but not on verified encodes', () => {
        const codec = new BlockCodec({ maxPoints: 4, verify: true });
        const series = makeSeries([1, 2, 3, 4, 5]);
        const block = codec.encode(series);
        expect(block.pointCount).toBe(5);
        expect(() => codec.decode(block)).toThrow(LimitExceededError);
        expect(codec.verify(series).ok).toBe(true);
    });
});
