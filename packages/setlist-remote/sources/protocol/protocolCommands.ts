import type { PlayAction, TabDirection } from "./protocolTypes.js";

export const PROTOCOL_NAMESPACE = "ReaperSetlist";
export const EXTSTATE_TAG = "EXTSTATE";
export const TRANSPORT_TAG = "TRANSPORT";

export const SESSION_TOKEN_KEY = "ScriptActionId";
export const TABS_KEY = "tabs";
export const ACTIVE_INDEX_KEY = "activeIndex";

export const protocolCommands = {
    transport: TRANSPORT_TAG,
    play: "1007",
    stop: "1016",
    nextTab: "40861",
    previousTab: "40862",
    getSessionToken: `GET/EXTSTATE/${PROTOCOL_NAMESPACE}/${SESSION_TOKEN_KEY}`,
    requestOpenTabs: `SET/EXTSTATE/${PROTOCOL_NAMESPACE}/Operation/getOpenTabs`,
    getTabs: `GET/EXTSTATE/${PROTOCOL_NAMESPACE}/${TABS_KEY}`,
    getActiveIndex: `GET/EXTSTATE/${PROTOCOL_NAMESPACE}/${ACTIVE_INDEX_KEY}`
} as const;

export function protocolTabCommand(direction: TabDirection): string {
    return direction === "next" ? protocolCommands.nextTab : protocolCommands.previousTab;
}

export function protocolPlayCommand(action: PlayAction): string {
    return action === "play" ? protocolCommands.play : protocolCommands.stop;
}

/**
 * Builds the status batch: ask the script to publish the open tabs, run it,
 * then read tabs, active index and transport.
 * Only the last three commands produce output records.
 */
export function protocolStatusCommands(sessionToken: string): string[] {
    return [
        protocolCommands.requestOpenTabs,
        sessionToken,
        protocolCommands.getTabs,
        protocolCommands.getActiveIndex,
        protocolCommands.transport
    ];
}
