// src/services/taskQueue.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import PQueue from 'p-queue';
import { Logger } from 'pino';
import { LoggingService } from './logging.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

/**
 * Runs batches of independent tasks on a bounded p-queue. Each batch gets its
 * own queue, so concurrent callers with different limits do not interfere.
 */
@singleton()
export class TaskQueueService {
    private readonly logger: Logger;

    constructor(@inject(LoggingService) private readonly loggingService: LoggingService) {
        this.logger = this.loggingService.getLogger({ service: 'TaskQueueService' });
    }

    /**
     * Runs every task with at most `concurrency` in flight and resolves with
     * their results in task order. Rejects with the first task error.
     */
    async runAll<TaskResult>(tasks: ReadonlyArray<() => Promise<TaskResult>>, concurrency: number): Promise<TaskResult[]> {
        const queue = this.createQueue(concurrency);
        this.logger.debug({ event: 'queue_batch_start', tasks: tasks.length, concurrency }, 'Running task batch.');
        try {
            const results = await Promise.all(tasks.map(task => queue.add(task)));
            this.logger.debug({ event: 'queue_batch_done', tasks: tasks.length }, 'Task batch completed.');
            return results;
        } catch (error) {
            const { message: errorMessage, stack: errorStack } = getErrorMessageAndStack(error);
            this.logger.error({ err: { message: errorMessage, stack: errorStack }, event: 'queue_task_error' }, `Error occurred within a queued task: "${errorMessage}".`);
            queue.clear();
            throw error;
        }
    }

    private createQueue(concurrency: number): PQueue {
        const queue = new PQueue({ concurrency });

        queue.on('idle', () => {
            this.logger.trace({ event: 'queue_idle' }, 'Task queue is now idle.');
        });
        queue.on('active', () => {
            this.logger.trace({ size: queue.size, pending: queue.pending, event: 'queue_task_started' }, 'Queued task started.');
        });
        queue.on('add', () => {
            this.logger.trace({ size: queue.size, pending: queue.pending, event: 'queue_task_added' }, 'Task added to queue. New queue size: %d, pending: %d.', queue.size, queue.pending);
        });
        return queue;
    }
}
