// src/utils/profiling/frequencyCounter.ts
import { ValueFrequency } from '../../types';

/**
 * Frequency table with a fixed capacity. A new key arriving at a full table
 * evicts the least frequent entry; among equally rare entries, the one that
 * has held that count longest goes first.
 *
 * Keys are bucketed by count so that increments and evictions never scan the table.
 */
export class FrequencyCounter {
    /** Insertion order is first-seen order. */
    private readonly counts = new Map<string, number>();
    /** Count → keys holding it, in the order they reached it. */
    private readonly buckets = new Map<number, Set<string>>();
    private minCount = 0;

    constructor(private readonly capacity: number) {
        if (capacity < 1) {
            throw new RangeError(`Frequency counter capacity must be >= 1, got ${capacity}.`);
        }
    }

    add(key: string): void {
        const current = this.counts.get(key);
        if (current !== undefined) {
            this.counts.set(key, current + 1);
            this.leaveBucket(key, current);
            this.joinBucket(key, current + 1);
            if (this.minCount === current && !this.buckets.has(current)) {
                this.minCount = current + 1;
            }
            return;
        }
        if (this.counts.size >= this.capacity) {
            this.evictLeastFrequent();
        }
        this.counts.set(key, 1);
        this.joinBucket(key, 1);
        this.minCount = 1;
    }

    get size(): number {
        return this.counts.size;
    }

    /** Most frequent entries, ties kept in first-seen order. */
    top(limit: number): ValueFrequency[] {
        return Array.from(this.counts, ([value, count]) => ({ value, count }))
            .sort((a, b) => b.count - a.count)
            .slice(0, limit);
    }

    private joinBucket(key: string, count: number): void {
        const bucket = this.buckets.get(count);
        if (bucket) {
            bucket.add(key);
        } else {
            this.buckets.set(count, new Set([key]));
        }
    }

    private leaveBucket(key: string, count: number): void {
        const bucket = this.buckets.get(count);
        if (!bucket) return;
        bucket.delete(key);
        if (bucket.size === 0) {
            this.buckets.delete(count);
        }
    }

    private evictLeastFrequent(): void {
        const rarest = this.buckets.get(this.minCount);
        if (!rarest) return;
        const oldest = rarest.values().next();
        if (oldest.done) return;
        this.leaveBucket(oldest.value, this.minCount);
        this.counts.delete(oldest.value);
    }
}
