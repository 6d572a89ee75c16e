/**
 * Series block codec public API
 *
 * @module series-block-codec
 */

import { BlockCodec, assertRoundTrip, decodeBlock } from './codec/block.js';
import type { Block, CodecOptions, Sample, Series } from './codec/types.js';

export type { Sample, Series, Block, EncodedPayload, TimestampPayload, ValuePayload, CodecLogger, CodecOptions, DetectorThresholds, DetectorPreset, OuterCodecName } from './codec/types.js';
export { DETECTOR_PRESETS, resolveThresholds } from './codec/types.js';
export { TimestampMethod, ValueMethod, OuterCodecId } from './codec/format.js';
export {
    CodecError, CodecErrorCode, IncompleteDataError, InsufficientBitsError, TruncatedPayloadError, TruncatedVarintError,
    UnknownMethodTagError, CorruptXorStreamError, CorruptPayloadError, LimitExceededError, RoundTripMismatchError,
} from './codec/errors.js';
export { BitReader, BitWriter } from './codec/bit-stream.js';
export { encodeVarint, decodeVarint, encodeRLE, decodeRLE, zigzagEncode, zigzagDecode } from './codec-utils.js';
export { encodeTimestamps, decodeTimestamps, selectTimestampMethod } from './codec/timestamp-codec.js';
export { Pattern, classifyPattern, calculateSeriesMetrics, describeDetection } from './codec/pattern-detector.js';
export type { Detection, SeriesMetrics } from './codec/pattern-detector.js';
export { encodeValues, decodeValues, encodeGeneral, selectSmaller, VALUE_CODECS } from './codec/value-codec.js';
export type { ValueCodec, EncodeContext } from './codec/strategies/strategy.js';
export { encodeXor, decodeXor } from './codec/strategies/xor.js';
export { BlockCodec, encodeBlock, decodeBlock, encodeColumns, decodeColumns, verifyRoundTrip, assertRoundTrip, blockStats } from './codec/block.js';
export type { BlockStats, RoundTripResult, SeriesColumns } from './codec/block.js';
export { serializeBlock, deserializeBlock, packBlock, unpackBlock, DEFAULT_MAX_RAW_BYTES, DEFAULT_MAX_POINTS } from './codec/block-frame.js';
export { CodecProfiler } from './codec/profiler.js';
export type { ProfileResult, ProfileMeta, StrategyTrial } from './codec/profiler.js';

// Namespace object
export const SeriesCodec = {
    /**
     * Encodes one series into a block.
     */
    encode: (series: Series, options?: CodecOptions): Block => new BlockCodec(options).encode(series),

    decode: (block: Block): Sample[] => decodeBlock(block),

    /**
     * Encodes, decodes and compares bit for bit. Throws RoundTripMismatchError on any difference.
     */
    verify: (series: Series, options?: CodecOptions): Block => assertRoundTrip(series, new BlockCodec(options).thresholds),

    /**
     * Encoded block, framed and passed through the outer codec (zstd by default).
     */
    pack: async (series: Series, options?: CodecOptions): Promise<Uint8Array> => new BlockCodec(options).pack(series),

    unpack: async (data: Uint8Array, maxRawBytes?: number): Promise<Sample[]> => new BlockCodec().unpack(data, maxRawBytes),

    Codec: BlockCodec,
};

export default SeriesCodec;
