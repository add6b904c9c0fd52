/**
 * Wire-level domain types decoded from the DAW control protocol.
 */

export const PLAY_STATE = {
    stopped: 0,
    playing: 1,
    paused: 2,
    recording: 5,
    recordPaused: 6
} as const;

export type PlayState = (typeof PLAY_STATE)[keyof typeof PLAY_STATE];

/**
 * Transport snapshot. When success is false the other fields hold defaults
 * and must not be shown as real values.
 */
export type TransportState = {
    playState: number;
    positionSeconds: number;
    repeatEnabled: boolean;
    positionBarsBeats: string;
    success: boolean;
};

export type TabInfo = {
    lengthSeconds: number;
    displayName: string;
    index: number;
};

/**
 * Tab list in server order plus the active tab.
 * activeIndex is not bounds-checked against tabs.
 */
export type DaemonState = {
    tabs: TabInfo[];
    activeIndex: number;
    success: boolean;
};

export type TabDirection = "next" | "previous";
export type PlayAction = "play" | "stop";

export function transportStateEmpty(): TransportState {
    return {
        playState: PLAY_STATE.stopped,
        positionSeconds: 0,
        repeatEnabled: false,
        positionBarsBeats: "",
        success: false
    };
}

export function daemonStateEmpty(): DaemonState {
    return {
        tabs: [],
        activeIndex: 0,
        success: false
    };
}
