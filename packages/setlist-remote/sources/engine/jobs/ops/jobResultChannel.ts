import type { JobResult } from "../jobTypes.js";

/**
 * Bounded FIFO of completed results waiting for the control loop.
 * A full channel rejects the new result instead of blocking the worker.
 */
export class JobResultChannel {
    readonly capacity: number;
    private items: JobResult[] = [];
    private droppedCount = 0;

    constructor(capacity: number) {
        this.capacity = capacity;
    }

    push(result: JobResult): boolean {
        if (this.items.length >= this.capacity) {
            this.droppedCount += 1;
            return false;
        }
        this.items.push(result);
        return true;
    }

    drain(): JobResult[] {
        const drained = this.items;
        this.items = [];
        return drained;
    }

    size(): number {
        return this.items.length;
    }

    dropped(): number {
        return this.droppedCount;
    }
}
