// src/utils/profiling/hyperLogLog.ts

/** FNV-1a over UTF-16 code units followed by the murmur3 finalizer. */
export const hash32 = (key: string): number => {
    let hash = 0x811c9dc5;
    for (let i = 0; i < key.length; i++) {
        hash ^= key.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    hash ^= hash >>> 16;
    hash = Math.imul(hash, 0x85ebca6b);
    hash ^= hash >>> 13;
    hash = Math.imul(hash, 0xc2b2ae35);
    hash ^= hash >>> 16;
    return hash >>> 0;
};

const TWO_POW_32 = 2 ** 32;

/**
 * HyperLogLog cardinality sketch over 32-bit hashes (standard error ≈ 1.04/√m).
 */
export class HyperLogLog {
    private readonly registers: Uint8Array;
    private readonly registerCount: number;

    constructor(private readonly precision = 12) {
        if (precision < 4 || precision > 16) {
            throw new RangeError(`HyperLogLog precision must be within 4..16, got ${precision}.`);
        }
        this.registerCount = 1 << precision;
        this.registers = new Uint8Array(this.registerCount);
    }

    add(key: string): void {
        const hash = hash32(key);
        const index = hash >>> (32 - this.precision);
        const remainder = (hash << this.precision) >>> 0;
        const rank = remainder === 0 ? 32 - this.precision + 1 : Math.clz32(remainder) + 1;
        if (rank > this.registers[index]) {
            this.registers[index] = rank;
        }
    }

    estimate(): number {
        const m = this.registerCount;
        const alpha = 0.7213 / (1 + 1.079 / m);
        let harmonic = 0;
        let zeros = 0;
        for (const register of this.registers) {
            harmonic += Math.pow(2, -register);
            if (register === 0) zeros += 1;
        }
        const raw = (alpha * m * m) / harmonic;

        if (raw <= 2.5 * m && zeros > 0) {
            return m * Math.log(m / zeros);
        }
        if (raw > TWO_POW_32 / 30) {
            return -TWO_POW_32 * Math.log(1 - raw / TWO_POW_32);
        }
        return raw;
    }
}
