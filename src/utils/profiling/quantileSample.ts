// src/utils/profiling/quantileSample.ts
import { QuantileValue } from '../../types';

/**
 * Bounded, deterministic sample for quantile estimation. Every `stride`-th value
 * is kept; when the buffer fills up, every other kept value is dropped and the
 * stride doubles. Until that first happens, quantiles are exact.
 */
export class QuantileSample {
    private values: number[] = [];
    private stride = 1;
    private seen = 0;
    private decimated = false;

    constructor(private readonly capacity: number) {
        if (capacity < 2) {
            throw new RangeError(`Quantile sample capacity must be >= 2, got ${capacity}.`);
        }
    }

    add(value: number): void {
        if (this.seen % this.stride === 0) {
            this.values.push(value);
            if (this.values.length >= this.capacity) {
                this.values = this.values.filter((_, index) => index % 2 === 0);
                this.stride *= 2;
                this.decimated = true;
            }
        }
        this.seen += 1;
    }

    get exact(): boolean {
        return !this.decimated;
    }

    get size(): number {
        return this.values.length;
    }

    /** Linear interpolation between closest ranks. */
    quantiles(probabilities: readonly number[]): QuantileValue[] {
        if (this.values.length === 0) {
            return [];
        }
        const sorted = [...this.values].sort((a, b) => a - b);
        return probabilities.map(p => {
            const position = (sorted.length - 1) * p;
            const lower = Math.floor(position);
            const upper = Math.ceil(position);
            const fraction = position - lower;
            const value = sorted[lower] + (sorted[upper] - sorted[lower]) * fraction;
            return { p, value };
        });
    }
}
