import { getLogger } from "../../log.js";
import type { NetworkPort, TransportPort } from "../../transport/transportTypes.js";
import { jobIdNext } from "./jobIdNext.js";
import { jobExecute } from "./ops/jobExecute.js";
import { JobInbox } from "./ops/jobInbox.js";
import { JobResultChannel } from "./ops/jobResultChannel.js";
import type { Job, JobEngineState, JobExecuteContext, JobRequest, JobResult } from "./jobTypes.js";

const logger = getLogger("job.engine");

export const JOB_ENGINE_DEFAULTS = {
    queueCapacity: 10,
    resultCapacity: 10
};

export type JobEngineOptions = {
    transport: TransportPort;
    network: NetworkPort;
    basePath: string;
    queueCapacity?: number;
    resultCapacity?: number;
    now?: () => number;
};

/**
 * Executes DAW jobs one at a time on a single worker task.
 * Submission order, execution order and result order are the same.
 * Lifecycle: stopped -> running -> shutdown; a shut down engine cannot restart.
 */
export class JobEngine {
    private readonly context: JobExecuteContext;
    private readonly inbox: JobInbox;
    private readonly results: JobResultChannel;
    private readonly now: () => number;
    private lifecycle: JobEngineState = "stopped";
    private lastJobId = 0;
    private worker: Promise<void> | null = null;
    private shutdownPromise: Promise<void> | null = null;
    private outstanding = 0;
    private idleWaiters: (() => void)[] = [];

    constructor(options: JobEngineOptions) {
        this.context = {
            transport: options.transport,
            network: options.network,
            basePath: options.basePath
        };
        this.inbox = new JobInbox(options.queueCapacity ?? JOB_ENGINE_DEFAULTS.queueCapacity);
        this.results = new JobResultChannel(options.resultCapacity ?? JOB_ENGINE_DEFAULTS.resultCapacity);
        this.now = options.now ?? Date.now;
    }

    get state(): JobEngineState {
        return this.lifecycle;
    }

    start(): void {
        if (this.lifecycle === "running") {
            return;
        }
        if (this.lifecycle === "shutdown") {
            throw new Error("JobEngine was shut down and cannot be restarted");
        }
        this.lifecycle = "running";
        this.worker = this.workerRun();
        logger.info(
            { queueCapacity: this.inbox.capacity, resultCapacity: this.results.capacity },
            "start: Job engine started"
        );
    }

    /**
     * Queues a job for the worker. Returns its id, or 0 when the engine is not
     * running or the queue is full.
     */
    submit(request: JobRequest): number {
        if (this.lifecycle !== "running") {
            logger.warn({ type: request.type }, "submit: Rejected, engine not running");
            return 0;
        }
        const id = jobIdNext(this.lastJobId);
        const job: Job = Object.freeze({ ...request, id, submittedAt: this.now() });
        if (!this.inbox.post(job)) {
            logger.warn({ type: request.type, queued: this.inbox.size() }, "submit: Rejected, job queue full");
            return 0;
        }
        this.lastJobId = id;
        this.outstanding += 1;
        logger.debug({ jobId: id, type: request.type }, "submit: Job queued");
        return id;
    }

    /**
     * Returns and removes every buffered result, oldest first. Never waits.
     */
    drainResults(): JobResult[] {
        return this.results.drain();
    }

    droppedResults(): number {
        return this.results.dropped();
    }

    /**
     * Jobs accepted but not yet completed, including the one in flight.
     */
    pendingJobs(): number {
        return this.outstanding;
    }

    /**
     * Resolves once every accepted job has completed.
     */
    whenIdle(): Promise<void> {
        if (this.outstanding === 0) {
            return Promise.resolve();
        }
        return new Promise((resolve) => {
            this.idleWaiters.push(resolve);
        });
    }

    /**
     * Stops accepting jobs, abandons queued ones and waits for the job in
     * flight to finish. Its result stays drainable. Safe to call repeatedly.
     */
    shutdown(): Promise<void> {
        if (!this.shutdownPromise) {
            this.shutdownPromise = this.shutdownRun();
        }
        return this.shutdownPromise;
    }

    private async shutdownRun(): Promise<void> {
        const wasRunning = this.lifecycle === "running";
        this.lifecycle = "shutdown";
        const abandoned = this.inbox.close();
        this.outstanding -= abandoned.length;
        this.idleNotify();
        if (abandoned.length > 0) {
            logger.info({ abandoned: abandoned.length }, "stop: Abandoned queued jobs");
        }
        if (this.worker) {
            await this.worker;
            this.worker = null;
        }
        if (wasRunning) {
            logger.info({ dropped: this.results.dropped() }, "stop: Job engine stopped");
        }
    }

    private async workerRun(): Promise<void> {
        for (;;) {
            const job = await this.inbox.next();
            if (!job) {
                return;
            }
            const startedAt = this.now();
            const outcome = await jobExecute(job, this.context);
            const completedAt = this.now();

            const result: JobResult = Object.freeze({ ...outcome, jobId: job.id, completedAt });
            logger.debug(
                { jobId: job.id, type: job.type, success: result.success, durationMs: completedAt - startedAt },
                "execute: Job completed"
            );
            if (!this.results.push(result)) {
                logger.warn(
                    { jobId: job.id, type: job.type, dropped: this.results.dropped() },
                    "error: Result channel full, dropping result"
                );
            }
            this.outstanding -= 1;
            this.idleNotify();
        }
    }

    private idleNotify(): void {
        if (this.outstanding > 0) {
            return;
        }
        for (const waiter of this.idleWaiters.splice(0)) {
            waiter();
        }
    }
}
