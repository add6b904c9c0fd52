import type { Job } from "../jobTypes.js";

/**
 * JobInbox is a bounded single-consumer FIFO between submitters and the worker.
 * Expects: only the engine worker awaits next().
 */
export class JobInbox {
    readonly capacity: number;
    private items: Job[] = [];
    private waiter: ((job: Job | null) => void) | null = null;
    private closed = false;

    constructor(capacity: number) {
        this.capacity = capacity;
    }

    /**
     * Queues a job or hands it straight to a waiting worker.
     * Returns false when the inbox is closed or full.
     */
    post(job: Job): boolean {
        if (this.closed) {
            return false;
        }
        const waiter = this.waiter;
        if (waiter) {
            this.waiter = null;
            waiter(job);
            return true;
        }
        if (this.items.length >= this.capacity) {
            return false;
        }
        this.items.push(job);
        return true;
    }

    /**
     * Resolves with the next job, or null once the inbox is closed.
     */
    async next(): Promise<Job | null> {
        const next = this.items.shift();
        if (next) {
            return next;
        }
        if (this.closed) {
            return null;
        }
        if (this.waiter) {
            throw new Error("JobInbox already has a waiting consumer");
        }
        return new Promise((resolve) => {
            this.waiter = resolve;
        });
    }

    /**
     * Closes the inbox, wakes the waiting consumer with null and returns the
     * jobs that never started.
     */
    close(): Job[] {
        this.closed = true;
        const abandoned = this.items;
        this.items = [];
        const waiter = this.waiter;
        this.waiter = null;
        waiter?.(null);
        return abandoned;
    }

    size(): number {
        return this.items.length;
    }
}
