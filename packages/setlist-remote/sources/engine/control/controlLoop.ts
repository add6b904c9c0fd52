import { getLogger } from "../../log.js";
import type { JobEngine } from "../jobs/jobEngine.js";
import type { JobRequest, JobResult } from "../jobs/jobTypes.js";
import { SessionMachine } from "../session/sessionMachine.js";
import type { SessionOptions } from "../session/sessionTypes.js";
import { DomainStore } from "../state/domainStore.js";
import { ButtonDispatcher } from "./buttonDispatcher.js";
import type { ControlView, InputPort, RenderPort } from "./controlTypes.js";
import { StatusPoller, type StatusPollerOptions } from "./statusPoller.js";

const logger = getLogger("control.loop");

export const CONTROL_LOOP_DEFAULTS = {
    frameIntervalMs: 1000 / 60,
    periodicIntervalMs: 30_000
};

export type ControlLoopEngine = Pick<JobEngine, "start" | "submit" | "drainResults" | "pendingJobs" | "shutdown">;

export type ControlLoopOptions = {
    engine: ControlLoopEngine;
    input: InputPort;
    render: RenderPort;
    session?: Partial<SessionOptions>;
    polling?: Partial<StatusPollerOptions>;
    frameIntervalMs?: number;
    periodicIntervalMs?: number;
    now?: () => number;
};

/**
 * Composes the session machine, store, dispatcher and poller around the
 * job engine. One tick samples input, submits due jobs, applies drained
 * results and renders.
 */
export class ControlLoop {
    readonly session: SessionMachine;
    readonly store: DomainStore;
    readonly dispatcher: ButtonDispatcher;
    readonly poller: StatusPoller;
    private readonly engine: ControlLoopEngine;
    private readonly input: InputPort;
    private readonly render: RenderPort;
    private readonly frameIntervalMs: number;
    private readonly periodicIntervalMs: number;
    private readonly now: () => number;
    private lastPeriodicAt = Number.NEGATIVE_INFINITY;
    private timer: NodeJS.Timeout | null = null;
    private stopPromise: Promise<void> | null = null;

    constructor(options: ControlLoopOptions) {
        this.engine = options.engine;
        this.input = options.input;
        this.render = options.render;
        this.frameIntervalMs = options.frameIntervalMs ?? CONTROL_LOOP_DEFAULTS.frameIntervalMs;
        this.periodicIntervalMs = options.periodicIntervalMs ?? CONTROL_LOOP_DEFAULTS.periodicIntervalMs;
        this.now = options.now ?? Date.now;

        const submit = (request: JobRequest) => this.engine.submit(request);
        this.session = new SessionMachine(submit, options.session);
        this.store = new DomainStore();
        this.dispatcher = new ButtonDispatcher(submit, () => this.session.sessionToken);
        this.poller = new StatusPoller(submit, options.polling);
    }

    start(): void {
        if (this.timer || this.stopPromise) {
            return;
        }
        this.engine.start();
        this.timer = setInterval(() => {
            try {
                this.tick(this.now());
            } catch (error) {
                logger.error({ error }, "error: Control loop tick failed");
            }
        }, this.frameIntervalMs);
        logger.info({ frameIntervalMs: this.frameIntervalMs }, "start: Control loop started");
    }

    tick(now: number): void {
        this.dispatcher.handleButtons(this.input.buttonsSample());
        this.session.checkAndRetry(now);
        this.poller.tick(now, {
            connected: this.session.connected,
            sessionToken: this.session.sessionToken,
            tabsKnown: this.store.tabsKnown,
            ui: this.dispatcher.state
        });
        this.resultsApply(this.engine.drainResults());

        this.render.render(this.view());
        if (now - this.lastPeriodicAt >= this.periodicIntervalMs) {
            this.lastPeriodicAt = now;
            this.render.periodicRefresh(now);
        }
    }

    view(): ControlView {
        return {
            ui: this.dispatcher.state,
            session: this.session.state,
            address: this.session.localAddress,
            domain: this.store.snapshot(),
            pendingJobs: this.engine.pendingJobs()
        };
    }

    /**
     * Stops ticking, shuts the engine down and applies its last results.
     */
    stop(): Promise<void> {
        if (!this.stopPromise) {
            this.stopPromise = this.stopRun();
        }
        return this.stopPromise;
    }

    private async stopRun(): Promise<void> {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        await this.engine.shutdown();
        this.resultsApply(this.engine.drainResults());
        logger.info("stop: Control loop stopped");
    }

    private resultsApply(results: JobResult[]): void {
        for (const result of results) {
            this.session.observe(result);
            this.store.apply(result);
            this.poller.observe(result);
            this.dispatcher.connectionSet(this.session.connected);
            this.dispatcher.observe(result);
        }
    }
}
