// src/services/audit/profiling.service.test.ts
import container from '../../container';
import { MemoryTabularSource } from '../../sources/memory.source';
import { ProfilingCancelledError } from '../../utils/errors';
import { ProfilingService } from './profiling.service';

const numbers = (count: number): MemoryTabularSource =>
    new MemoryTabularSource('numbers', ['n'], Array.from({ length: count }, (_, index) => [index]));

describe('ProfilingService', () => {
    const service = container.resolve(ProfilingService);

    it('applies per-call overrides and reports batch progress', async () => {
        const batches: number[] = [];
        const profile = await service.profile(numbers(5), { batchSize: 2, onBatch: rows => batches.push(rows) });

        expect(profile.rowCount).toBe(5);
        expect(batches).toEqual([2, 4]);
    });

    it('treats configured null tokens as missing', async () => {
        const source = new MemoryTabularSource('tokens', ['v'], [['1'], ['N/A'], ['None'], ['3']]);
        const profile = await service.profile(source);
        expect(profile.columns[0].nullCount).toBe(2);
        expect(profile.columns[0].numeric?.mean).toBe(2);
    });

    it('stops with a cancellation error once aborted', async () => {
        const controller = new AbortController();
        controller.abort();

        const error = await service.profile(numbers(3), { signal: controller.signal }).catch((caught: unknown) => caught);
        expect(error).toBeInstanceOf(ProfilingCancelledError);
        expect(error).toMatchObject({ code: 'CANCELLED', rowsProcessed: 0 });
    });

    it('aborts between batches', async () => {
        const controller = new AbortController();
        const error = await service
            .profile(numbers(10), { batchSize: 3, onBatch: rows => { if (rows === 6) controller.abort(); }, signal: controller.signal })
            .catch((caught: unknown) => caught);
        expect(error).toMatchObject({ code: 'CANCELLED', rowsProcessed: 6 });
    });
});
