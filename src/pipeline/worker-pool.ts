/**
 * Bounded worker pool for external tool invocations.
 * Child processes run off the event loop; the pool caps how many run at once.
 */
import pLimit from 'p-limit';
import { poolActiveTasks, poolPendingTasks } from '../observability/metrics.js';
import { StageTimeoutError } from './errors.js';

export interface WorkerPoolOptions {
    concurrency: number;
    /** Per-task deadline; null waits indefinitely */
    timeoutMs: number | null;
}

export type PoolTask<T> = (signal: AbortSignal) => Promise<T>;

export class WorkerPool {
    private readonly limit: ReturnType<typeof pLimit>;
    private readonly timeoutMs: number | null;

    constructor(options: WorkerPoolOptions) {
        this.limit = pLimit(options.concurrency);
        this.timeoutMs = options.timeoutMs;
    }

    get activeCount(): number {
        return this.limit.activeCount;
    }

    get pendingCount(): number {
        return this.limit.pendingCount;
    }

    /**
     * Queue a task. The timeout starts once the task holds a slot; on expiry
     * the signal aborts (killing the child process) and the call rejects
     * with StageTimeoutError.
     */
    run<T>(label: string, task: PoolTask<T>): Promise<T> {
        const queued = this.limit(() => this.execute(label, task));
        this.updateGauges();
        return queued;
    }

    private async execute<T>(label: string, task: PoolTask<T>): Promise<T> {
        this.updateGauges();
        const controller = new AbortController();
        const timeoutMs = this.timeoutMs;
        let timer: NodeJS.Timeout | undefined;

        const deadline = new Promise<never>((_resolve, reject) => {
            if (timeoutMs === null) {
                return;
            }
            timer = setTimeout(() => {
                const error = new StageTimeoutError(label, timeoutMs);
                // Settle first so the race reports the timeout, not the task's abort error
                reject(error);
                controller.abort(error);
            }, timeoutMs);
        });

        try {
            return await Promise.race([task(controller.signal), deadline]);
        } finally {
            clearTimeout(timer);
            // activeCount still includes this task until the promise settles
            setImmediate(() => this.updateGauges());
        }
    }

    private updateGauges(): void {
        poolActiveTasks.set(this.limit.activeCount);
        poolPendingTasks.set(this.limit.pendingCount);
    }
}
