// src/utils/profiling/distinctCounter.ts
import { DistinctCount } from '../../types';
import { HyperLogLog } from './hyperLogLog';

/**
 * Exact distinct count up to `cap` keys; past that the retained keys are folded
 * into a HyperLogLog sketch and the set is released.
 */
export class DistinctCounter {
    private exact: Set<string> | null = new Set<string>();
    private sketch: HyperLogLog | null = null;

    constructor(private readonly cap: number) {}

    add(key: string): void {
        if (this.exact) {
            this.exact.add(key);
            if (this.exact.size > this.cap) {
                this.sketch = new HyperLogLog();
                for (const retained of this.exact) {
                    this.sketch.add(retained);
                }
                this.exact = null;
            }
            return;
        }
        this.sketch?.add(key);
    }

    result(): DistinctCount {
        if (this.exact) {
            return { value: this.exact.size, approximate: false };
        }
        return { value: Math.round(this.sketch?.estimate() ?? 0), approximate: true };
    }
}
