// src/utils/profiling/distinctCounter.test.ts
import { DistinctCounter } from './distinctCounter';
import { HyperLogLog, hash32 } from './hyperLogLog';

describe('hash32', () => {
    it('is deterministic and unsigned', () => {
        expect(hash32('column')).toBe(hash32('column'));
        expect(hash32('column')).not.toBe(hash32('columm'));
        expect(hash32('')).toBeGreaterThanOrEqual(0);
    });
});

describe('HyperLogLog', () => {
    it('estimates a large cardinality within a few percent', () => {
        const sketch = new HyperLogLog();
        for (let i = 0; i < 20000; i++) {
            sketch.add(`key-${i}`);
            sketch.add(`key-${i}`);
        }
        const estimate = sketch.estimate();
        expect(Math.abs(estimate - 20000) / 20000).toBeLessThan(0.1);
    });
});

describe('DistinctCounter', () => {
    it('counts exactly up to the cap', () => {
        const counter = new DistinctCounter(5);
        ['a', 'b', 'a', 'c', 'b'].forEach(key => counter.add(key));
        expect(counter.result()).toEqual({ value: 3, approximate: false });
    });

    it('switches to an approximate count past the cap', () => {
        const counter = new DistinctCounter(100);
        for (let i = 0; i < 5000; i++) {
            counter.add(String(i));
        }
        const result = counter.result();
        expect(result.approximate).toBe(true);
        expect(Number.isInteger(result.value)).toBe(true);
        expect(Math.abs(result.value - 5000) / 5000).toBeLessThan(0.1);
    });
});
