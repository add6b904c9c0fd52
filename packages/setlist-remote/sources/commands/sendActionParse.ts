import type { JobRequest } from "../engine/jobs/jobTypes.js";

export const SEND_ACTIONS = ["play", "stop", "next", "previous"] as const;

export type SendAction = (typeof SEND_ACTIONS)[number];

export function sendActionParse(value: string): SendAction {
    const normalized = value.trim().toLowerCase();
    const action = SEND_ACTIONS.find((candidate) => candidate === normalized);
    if (!action) {
        throw new Error(`Unknown action "${value}", expected one of: ${SEND_ACTIONS.join(", ")}`);
    }
    return action;
}

export function sendActionNeedsSession(action: SendAction): boolean {
    return action === "next" || action === "previous";
}

/**
 * Maps an action onto its job. Tab changes need the session token.
 */
export function sendRequestBuild(action: SendAction, sessionToken: string): JobRequest {
    switch (action) {
        case "play":
        case "stop":
            return { type: "changePlaystate", action };
        case "next":
        case "previous":
            return { type: "changeTab", direction: action, sessionToken };
    }
}
