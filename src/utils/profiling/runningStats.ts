// src/utils/profiling/runningStats.ts

/**
 * Welford's online mean/variance with min/max tracking.
 */
export class RunningStats {
    private n = 0;
    private runningMean = 0;
    private m2 = 0;
    private minValue = Infinity;
    private maxValue = -Infinity;

    add(value: number): void {
        this.n += 1;
        const delta = value - this.runningMean;
        this.runningMean += delta / this.n;
        this.m2 += delta * (value - this.runningMean);
        if (value < this.minValue) this.minValue = value;
        if (value > this.maxValue) this.maxValue = value;
    }

    get count(): number {
        return this.n;
    }

    get min(): number | null {
        return this.n === 0 ? null : this.minValue;
    }

    get max(): number | null {
        return this.n === 0 ? null : this.maxValue;
    }

    get mean(): number | null {
        return this.n === 0 ? null : this.runningMean;
    }

    /** Sample standard deviation; a single observation has no spread. */
    get stdev(): number | null {
        if (this.n === 0) return null;
        if (this.n === 1) return 0;
        return Math.sqrt(this.m2 / (this.n - 1));
    }
}
