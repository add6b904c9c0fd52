import type { DomainSnapshot } from "../state/domainStore.js";
import type { SessionState } from "../session/sessionTypes.js";

export type UiState = "disconnected" | "stopped" | "playing" | "confirmStop";

/**
 * One-shot "was pressed since the last sample" flags for buttons 0, 1 and 2.
 */
export type ButtonEdges = readonly [boolean, boolean, boolean];

export const BUTTONS_NONE: ButtonEdges = [false, false, false];

export type InputPort = {
    buttonsSample(): ButtonEdges;
};

export type ControlView = {
    ui: UiState;
    session: SessionState;
    address: string | null;
    domain: DomainSnapshot;
    pendingJobs: number;
};

export type RenderPort = {
    render(view: ControlView): void;
    periodicRefresh(now: number): void;
};
