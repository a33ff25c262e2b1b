// src/utils/profiling/runningStats.test.ts
import { RunningStats } from './runningStats';

describe('RunningStats', () => {
    it('reports null for every statistic before any value', () => {
        const stats = new RunningStats();
        expect([stats.min, stats.max, stats.mean, stats.stdev]).toEqual([null, null, null, null]);
    });

    it('uses the sample standard deviation', () => {
        const stats = new RunningStats();
        [20, 30, 40].forEach(value => stats.add(value));
        expect(stats.count).toBe(3);
        expect(stats.mean).toBe(30);
        expect(stats.stdev).toBe(10);
        expect(stats.min).toBe(20);
        expect(stats.max).toBe(40);
    });

    it('gives a single value no spread', () => {
        const stats = new RunningStats();
        stats.add(-4.5);
        expect(stats.stdev).toBe(0);
        expect(stats.mean).toBe(-4.5);
    });
});
