import { getLogger } from "../../log.js";
import { jobIdReached } from "../jobs/jobIdNext.js";
import type { JobResult, JobSubmit } from "../jobs/jobTypes.js";
import type { UiState } from "./controlTypes.js";

const logger = getLogger("poller");

export type StatusPollerOptions = {
    statusInitialIntervalMs: number;
    statusIntervalMs: number;
    transportIntervalMs: number;
    transportIdleIntervalMs: number;
};

export const STATUS_POLLER_DEFAULTS: StatusPollerOptions = {
    statusInitialIntervalMs: 1_000,
    statusIntervalMs: 10_000,
    transportIntervalMs: 1_000,
    transportIdleIntervalMs: 10_000
};

export type StatusPollerInput = {
    connected: boolean;
    sessionToken: string;
    tabsKnown: boolean;
    ui: UiState;
};

export type StatusPollKind = "getStatus" | "getTransport";

/**
 * Submits periodic status and transport polls, at most one job per tick and
 * one outstanding job of each kind.
 */
export class StatusPoller {
    private readonly submit: JobSubmit;
    private readonly options: StatusPollerOptions;
    private lastStatusAt = Number.NEGATIVE_INFINITY;
    private lastTransportAt = Number.NEGATIVE_INFINITY;
    private statusJobId = 0;
    private transportJobId = 0;

    constructor(submit: JobSubmit, options: Partial<StatusPollerOptions> = {}) {
        this.submit = submit;
        this.options = { ...STATUS_POLLER_DEFAULTS, ...options };
    }

    tick(now: number, input: StatusPollerInput): StatusPollKind | null {
        if (!input.connected) {
            return null;
        }

        const statusInterval = input.tabsKnown ? this.options.statusIntervalMs : this.options.statusInitialIntervalMs;
        if (
            input.sessionToken.length > 0 &&
            this.statusJobId === 0 &&
            now - this.lastStatusAt >= statusInterval
        ) {
            this.lastStatusAt = now;
            this.lastTransportAt = now;
            this.statusJobId = this.submit({ type: "getStatus", sessionToken: input.sessionToken });
            logger.debug({ jobId: this.statusJobId }, "poll: Status submitted");
            return "getStatus";
        }

        const active = input.ui === "playing" || input.ui === "confirmStop";
        const transportInterval = active ? this.options.transportIntervalMs : this.options.transportIdleIntervalMs;
        if (this.transportJobId === 0 && now - this.lastTransportAt >= transportInterval) {
            this.lastTransportAt = now;
            this.transportJobId = this.submit({ type: "getTransport" });
            return "getTransport";
        }
        return null;
    }

    /**
     * Results arrive in submission order, so any result at or past an
     * outstanding id means that poll has completed or its result was dropped.
     */
    observe(result: JobResult): void {
        if (this.statusJobId !== 0 && jobIdReached(result.jobId, this.statusJobId)) {
            this.statusJobId = 0;
        }
        if (this.transportJobId !== 0 && jobIdReached(result.jobId, this.transportJobId)) {
            this.transportJobId = 0;
        }
    }

    get statusOutstanding(): boolean {
        return this.statusJobId !== 0;
    }
}
