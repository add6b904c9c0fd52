import { getLogger } from "../../log.js";
import { jobIdReached } from "../jobs/jobIdNext.js";
import type { JobResult, JobSubmit } from "../jobs/jobTypes.js";
import { SESSION_DEFAULTS, type SessionOptions, type SessionState } from "./sessionTypes.js";

const logger = getLogger("session");

/**
 * Tracks link and session-token acquisition and decides when to submit
 * connect and token jobs. Only the control loop reads or writes it.
 */
export class SessionMachine {
    private readonly submit: JobSubmit;
    private readonly options: SessionOptions;
    private current: SessionState = "disconnected";
    private token = "";
    private address: string | null = null;
    private lastConnectAttempt = Number.NEGATIVE_INFINITY;
    private lastTokenAttempt = Number.NEGATIVE_INFINITY;
    private tokenAttempts = 0;
    private tokenCapLogged = false;
    private connectJobId = 0;
    private linkReported = false;
    private consecutiveFailures = 0;

    constructor(submit: JobSubmit, options: Partial<SessionOptions> = {}) {
        this.submit = submit;
        this.options = { ...SESSION_DEFAULTS, ...options };
    }

    get state(): SessionState {
        return this.current;
    }

    get sessionToken(): string {
        return this.token;
    }

    get localAddress(): string | null {
        return this.address;
    }

    get connected(): boolean {
        return this.current !== "disconnected";
    }

    get tokenAttemptCount(): number {
        return this.tokenAttempts;
    }

    /**
     * Submits at most one connect or token job when its retry interval elapsed.
     */
    checkAndRetry(now: number): void {
        switch (this.current) {
            case "disconnected": {
                // An outstanding connect job expires after one retry interval.
                if (now - this.lastConnectAttempt < this.options.connectRetryIntervalMs) {
                    return;
                }
                if (this.connectJobId !== 0) {
                    logger.debug({ jobId: this.connectJobId }, "retry: Connect result missing, resubmitting");
                }
                this.lastConnectAttempt = now;
                const id = this.submit({ type: "connect" });
                this.connectJobId = id;
                logger.debug({ jobId: id }, "retry: Connect submitted");
                return;
            }
            case "connectedNoToken": {
                const due = now - this.lastTokenAttempt >= this.options.tokenRetryIntervalMs;
                if (this.tokenAttempts >= this.options.maxTokenAttempts) {
                    if (due && !this.tokenCapLogged) {
                        this.tokenCapLogged = true;
                        logger.warn(
                            { attempts: this.tokenAttempts },
                            "retry: Session token unavailable, polling transport only"
                        );
                    }
                    return;
                }
                if (!due) {
                    return;
                }
                this.lastTokenAttempt = now;
                const id = this.submit({ type: "getSessionToken" });
                if (id !== 0) {
                    this.tokenAttempts += 1;
                }
                logger.debug({ jobId: id, attempts: this.tokenAttempts }, "retry: Session token requested");
                return;
            }
            case "connectedHasToken":
                return;
        }
    }

    observe(result: JobResult): void {
        if (this.connectJobId !== 0 && jobIdReached(result.jobId, this.connectJobId)) {
            this.connectJobId = 0;
        }

        if (result.type === "connect") {
            if (!result.success || !result.connected) {
                logger.debug({ jobId: result.jobId }, "event: Connect failed");
                this.linkReported = false;
                return;
            }
            // Token retries re-arm only for a fresh link: first connect, link reported down, or new address.
            // A drop inferred from request failures keeps the attempts already spent.
            if (!this.linkReported || result.address !== this.address) {
                this.tokenAttempts = 0;
                this.tokenCapLogged = false;
                this.lastTokenAttempt = Number.NEGATIVE_INFINITY;
            }
            this.linkReported = true;
            this.address = result.address;
            this.consecutiveFailures = 0;
            this.transition(this.token.length > 0 ? "connectedHasToken" : "connectedNoToken");
            return;
        }

        if (result.type === "getSessionToken" && !result.success) {
            return;
        }

        if (result.failure === "transport") {
            this.consecutiveFailures += 1;
            if (this.connected && this.consecutiveFailures >= this.options.disconnectAfterFailures) {
                logger.warn({ failures: this.consecutiveFailures }, "event: Connection lost");
                this.consecutiveFailures = 0;
                this.lastConnectAttempt = Number.NEGATIVE_INFINITY;
                this.transition("disconnected");
            }
            return;
        }
        this.consecutiveFailures = 0;

        if (result.type === "getSessionToken" && result.success && result.sessionToken.length > 0) {
            if (result.sessionToken !== this.token) {
                this.token = result.sessionToken;
                logger.info({ attempts: this.tokenAttempts }, "event: Session token acquired");
            }
            this.tokenAttempts = 0;
            if (this.current === "connectedNoToken") {
                this.transition("connectedHasToken");
            }
        }
    }

    private transition(next: SessionState): void {
        if (next === this.current) {
            return;
        }
        logger.info({ from: this.current, to: next }, "event: Session state changed");
        this.current = next;
    }
}
