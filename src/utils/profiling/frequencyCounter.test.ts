// src/utils/profiling/frequencyCounter.test.ts
import { FrequencyCounter } from './frequencyCounter';

describe('FrequencyCounter', () => {
    it('orders by count and keeps first-seen order on ties', () => {
        const counter = new FrequencyCounter(10);
        ['b', 'a', 'c', 'a', 'c', 'd'].forEach(key => counter.add(key));
        expect(counter.top(3)).toEqual([
            { value: 'a', count: 2 },
            { value: 'c', count: 2 },
            { value: 'b', count: 1 },
        ]);
    });

    it('evicts the least frequent entry when full', () => {
        const counter = new FrequencyCounter(2);
        ['a', 'a', 'b', 'c'].forEach(key => counter.add(key));
        expect(counter.size).toBe(2);
        expect(counter.top(5)).toEqual([
            { value: 'a', count: 2 },
            { value: 'c', count: 1 },
        ]);
    });

    it('evicts the oldest entry among equally rare ones', () => {
        const counter = new FrequencyCounter(2);
        ['p', 'q', 'r'].forEach(key => counter.add(key));
        expect(counter.top(5).map(entry => entry.value)).toEqual(['q', 'r']);
    });

    it('does not evict an entry whose count has grown past the rarest', () => {
        const counter = new FrequencyCounter(2);
        ['a', 'b', 'a', 'c', 'd'].forEach(key => counter.add(key));
        expect(counter.top(5)).toEqual([
            { value: 'a', count: 2 },
            { value: 'd', count: 1 },
        ]);
    });

    it('keeps a heavy hitter through a long tail of unique keys', () => {
        const counter = new FrequencyCounter(3);
        for (let i = 0; i < 5; i++) counter.add('hot');
        for (let i = 0; i < 10_000; i++) counter.add(`k${i}`);
        expect(counter.size).toBe(3);
        expect(counter.top(3)).toEqual([
            { value: 'hot', count: 5 },
            { value: 'k9998', count: 1 },
            { value: 'k9999', count: 1 },
        ]);
    });
});
