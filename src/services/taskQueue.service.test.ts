// src/services/taskQueue.service.test.ts
import container from '../container';
import { TaskQueueService } from './taskQueue.service';

const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

describe('TaskQueueService', () => {
    const taskQueue = container.resolve(TaskQueueService);

    it('resolves results in task order regardless of completion order', async () => {
        const tasks = [30, 5, 15].map(ms => async (): Promise<number> => {
            await delay(ms);
            return ms;
        });
        await expect(taskQueue.runAll(tasks, 3)).resolves.toEqual([30, 5, 15]);
    });

    it('never runs more tasks than the concurrency limit', async () => {
        let running = 0;
        let peak = 0;
        const tasks = Array.from({ length: 6 }, () => async (): Promise<void> => {
            running += 1;
            peak = Math.max(peak, running);
            await delay(5);
            running -= 1;
        });

        await taskQueue.runAll(tasks, 2);
        expect(peak).toBe(2);
    });

    it('rejects with the first task error', async () => {
        const tasks = [
            async (): Promise<string> => 'ok',
            async (): Promise<string> => { throw new Error('boom'); },
        ];
        await expect(taskQueue.runAll(tasks, 1)).rejects.toThrow('boom');
    });
});
