// src/utils/profiling/adaptiveHistogram.ts
import { HistogramBucket } from '../../types';

const niceCeil = (value: number): number => {
    const exponent = Math.floor(Math.log10(value));
    const magnitude = Math.pow(10, exponent);
    const fraction = value / magnitude;
    const niceFraction = fraction <= 1 ? 1 : fraction <= 2 ? 2 : fraction <= 5 ? 5 : 10;
    return niceFraction * magnitude;
};

/**
 * Fixed number of equal-width buckets over a range learned while streaming.
 *
 * The range is set from the first two distinct values. When a value falls
 * outside it, adjacent bucket pairs are merged and the width doubles (upward, or
 * downward by moving the origin), so every count stays exact for the final edges
 * without revisiting values.
 *
 * Edges always stay finite: near the limits of the number range the width stops
 * growing and outlying values are counted in the nearest edge bucket.
 */
export class AdaptiveHistogram {
    private counts: number[];
    private origin = 0;
    private width = 0;
    private anchor: number | null = null;
    private anchorCount = 0;

    constructor(private readonly bucketCount: number) {
        if (bucketCount < 2 || bucketCount % 2 !== 0) {
            throw new RangeError(`Histogram bucket count must be an even number >= 2, got ${bucketCount}.`);
        }
        this.counts = new Array<number>(bucketCount).fill(0);
    }

    add(value: number): void {
        if (this.anchor === null) {
            this.anchor = value;
            this.anchorCount = 1;
            return;
        }
        if (this.width === 0) {
            if (value === this.anchor) {
                this.anchorCount += 1;
                return;
            }
            this.establish(this.anchor, value);
            this.counts[this.indexOf(this.anchor)] += this.anchorCount;
        }
        this.growToInclude(value);
        this.counts[this.indexOf(value)] += 1;
    }

    buckets(): HistogramBucket[] {
        if (this.anchor === null) {
            return [];
        }
        if (this.width === 0) {
            // Single distinct value: one closed, zero-width bucket.
            return [{ lower: this.anchor, upper: this.anchor, count: this.anchorCount }];
        }
        return this.counts.map((count, index) => ({
            lower: this.origin + index * this.width,
            upper: this.origin + (index + 1) * this.width,
            count,
        }));
    }

    private establish(first: number, second: number): void {
        const low = Math.min(first, second);
        const high = Math.max(first, second);
        const width = niceCeil((high - low) / (this.bucketCount - 1));
        this.width = Number.isFinite(width) ? width : Number.MAX_VALUE / this.bucketCount;
        this.origin = Math.floor(low / this.width) * this.width;
    }

    private growToInclude(value: number): void {
        const half = this.bucketCount / 2;
        while (value >= this.origin + this.bucketCount * this.width) {
            if (!Number.isFinite(this.origin + this.bucketCount * this.width * 2)) break;
            const merged = new Array<number>(this.bucketCount).fill(0);
            for (let i = 0; i < half; i++) {
                merged[i] = this.counts[2 * i] + this.counts[2 * i + 1];
            }
            this.counts = merged;
            this.width *= 2;
        }
        while (value < this.origin) {
            if (!Number.isFinite(this.origin - this.bucketCount * this.width)) break;
            const merged = new Array<number>(this.bucketCount).fill(0);
            for (let i = 0; i < half; i++) {
                merged[half + i] = this.counts[2 * i] + this.counts[2 * i + 1];
            }
            this.counts = merged;
            this.origin -= this.bucketCount * this.width;
            this.width *= 2;
        }
    }

    private indexOf(value: number): number {
        const index = Math.floor((value - this.origin) / this.width);
        return Math.min(Math.max(index, 0), this.bucketCount - 1);
    }
}
