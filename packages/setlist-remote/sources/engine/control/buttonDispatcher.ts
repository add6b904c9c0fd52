import { PLAY_STATE, type TabDirection } from "../../protocol/protocolTypes.js";
import { getLogger } from "../../log.js";
import type { JobRequest, JobResult, JobSubmit } from "../jobs/jobTypes.js";
import type { ButtonEdges, UiState } from "./controlTypes.js";

const logger = getLogger("buttons");

/**
 * Maps button edges and the current UI state onto job submissions and
 * UI transitions.
 */
export class ButtonDispatcher {
    private readonly submit: JobSubmit;
    private readonly tokenGet: () => string;
    private current: UiState = "disconnected";

    constructor(submit: JobSubmit, tokenGet: () => string) {
        this.submit = submit;
        this.tokenGet = tokenGet;
    }

    get state(): UiState {
        return this.current;
    }

    connectionSet(connected: boolean): void {
        if (!connected) {
            this.transition("disconnected");
        } else if (this.current === "disconnected") {
            this.transition("stopped");
        }
    }

    /**
     * Handles one frame of button edges. Only the lowest pressed button acts.
     */
    handleButtons(edges: ButtonEdges): void {
        const button = edges.findIndex((pressed) => pressed);
        if (button < 0) {
            return;
        }
        switch (this.current) {
            case "disconnected":
                logger.debug({ button }, "input: Ignored while disconnected");
                return;
            case "stopped":
                if (button === 0) {
                    this.tabChange("previous");
                } else if (button === 1) {
                    this.jobSubmit({ type: "changePlaystate", action: "play" });
                } else {
                    this.tabChange("next");
                }
                return;
            case "playing":
                if (button === 1) {
                    this.transition("confirmStop");
                }
                return;
            case "confirmStop":
                if (button === 0) {
                    this.jobSubmit({ type: "changePlaystate", action: "stop" });
                } else {
                    this.transition("playing");
                }
                return;
        }
    }

    observe(result: JobResult): void {
        if (this.current === "disconnected") {
            return;
        }
        if (result.type === "connect" || result.type === "getSessionToken" || !result.transport.success) {
            return;
        }
        if (this.current === "confirmStop" && result.type !== "changePlaystate") {
            return;
        }
        const playState = result.transport.playState;
        if (playState === PLAY_STATE.stopped) {
            this.transition("stopped");
        } else if (playState === PLAY_STATE.playing) {
            this.transition("playing");
        }
    }

    private tabChange(direction: TabDirection): void {
        const sessionToken = this.tokenGet();
        if (sessionToken.length === 0) {
            logger.warn({ direction }, "input: Tab change refused, session not ready");
            return;
        }
        this.jobSubmit({ type: "changeTab", direction, sessionToken });
    }

    private jobSubmit(request: JobRequest): void {
        const id = this.submit(request);
        if (id === 0) {
            logger.warn({ type: request.type }, "input: Job not accepted");
        }
    }

    private transition(next: UiState): void {
        if (next === this.current) {
            return;
        }
        logger.debug({ from: this.current, to: next }, "event: UI state changed");
        this.current = next;
    }
}
