import { ZstdCodec, type ZstdModule } from 'zstd-codec';
import { CorruptPayloadError, LimitExceededError, UnknownMethodTagError } from './errors.js';
import { OuterCodecId } from './format.js';
import type { OuterCodecName } from './types.js';

export interface OuterCodec {
    id: OuterCodecId;
    name: OuterCodecName;
    compress(data: Uint8Array, level?: number): Promise<Uint8Array>;
    decompress(data: Uint8Array, maxSize?: number): Promise<Uint8Array>;
}

/**
 * Registry of available outer codecs.
 */
export const OUTER_CODECS: Map<OuterCodecId, OuterCodec> = new Map();

function enforceLimit(size: number, maxSize: number | undefined): void {
    if (maxSize !== undefined && size > maxSize) {
        throw new LimitExceededError(`Decompressed size limit exceeded (${size} > ${maxSize})`);
    }
}

/**
 * Identity codec (no compression).
 */
export const OuterCodecNone: OuterCodec = {
    id: OuterCodecId.NONE,
    name: 'none',
    async compress(data: Uint8Array) {
        return data;
    },
    async decompress(data: Uint8Array, maxSize?: number) {
        enforceLimit(data.length, maxSize);
        return data;
    },
};

let zstdInstance: Promise<ZstdModule> | null = null;

function getZstd(): Promise<ZstdModule> {
    if (!zstdInstance) {
        zstdInstance = new Promise((resolve) => {
            ZstdCodec.run((zstd) => resolve(zstd));
        });
    }
    return zstdInstance;
}

export const OuterCodecZstd: OuterCodec = {
    id: OuterCodecId.ZSTD,
    name: 'zstd',
    async compress(data: Uint8Array, level: number = 3) {
        const zstd = await getZstd();
        const simple = new zstd.Simple();
        const compressed = simple.compress(data, level);
        if (!compressed) throw new CorruptPayloadError('Zstd compression failed');
        return compressed;
    },
    async decompress(data: Uint8Array, maxSize?: number) {
        const zstd = await getZstd();
        const simple = new zstd.Simple();
        const decompressed = simple.decompress(data);
        if (!decompressed) throw new CorruptPayloadError('Zstd decompression failed');
        enforceLimit(decompressed.length, maxSize);
        return decompressed;
    },
};

OUTER_CODECS.set(OuterCodecId.NONE, OuterCodecNone);
OUTER_CODECS.set(OuterCodecId.ZSTD, OuterCodecZstd);

export function getOuterCodec(id: number): OuterCodec {
    const codec = OUTER_CODECS.get(id);
    if (!codec) throw new UnknownMethodTagError('outer', id);
    return codec;
}

export function outerCodecByName(name: OuterCodecName): OuterCodec {
    for (const codec of OUTER_CODECS.values()) {
        if (codec.name === name) return codec;
    }
    throw new RangeError(`Unknown outer codec "${name}"`);
}
