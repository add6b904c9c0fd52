import {
    PLAY_STATE,
    daemonStateEmpty,
    transportStateEmpty,
    type DaemonState,
    type TabInfo,
    type TransportState
} from "../../protocol/protocolTypes.js";
import type {
    ChangePlaystateJobResult,
    ChangeTabJobResult,
    ConnectJobResult,
    JobFailure,
    SessionTokenJobResult,
    StatusJobResult,
    TransportJobResult
} from "./jobTypes.js";

export function transportPlaying(positionSeconds = 12.5): TransportState {
    return {
        playState: PLAY_STATE.playing,
        positionSeconds,
        repeatEnabled: false,
        positionBarsBeats: "5.1.00",
        success: true
    };
}

export function transportStopped(): TransportState {
    return {
        playState: PLAY_STATE.stopped,
        positionSeconds: 0,
        repeatEnabled: false,
        positionBarsBeats: "1.1.00",
        success: true
    };
}

export function daemonWithTabs(tabs: TabInfo[], activeIndex = 0): DaemonState {
    return { tabs, activeIndex, success: true };
}

export function resultConnect(jobId: number, connected = true): ConnectJobResult {
    return {
        type: "connect",
        jobId,
        success: connected,
        failure: null,
        completedAt: 0,
        connected,
        address: connected ? "10.0.0.5" : null
    };
}

export function resultToken(jobId: number, sessionToken: string): SessionTokenJobResult {
    const success = sessionToken.length > 0;
    return {
        type: "getSessionToken",
        jobId,
        success,
        failure: success ? null : "parse",
        completedAt: 0,
        sessionToken
    };
}

export function resultTransport(jobId: number, transport: TransportState): TransportJobResult {
    return {
        type: "getTransport",
        jobId,
        success: transport.success,
        failure: transport.success ? null : "parse",
        completedAt: 0,
        transport
    };
}

export function resultPlaystate(jobId: number, transport: TransportState): ChangePlaystateJobResult {
    return {
        type: "changePlaystate",
        jobId,
        success: transport.success,
        failure: transport.success ? null : "parse",
        completedAt: 0,
        transport
    };
}

export function resultStatus(jobId: number, daemon: DaemonState, transport: TransportState): StatusJobResult {
    const success = daemon.success && transport.success;
    return {
        type: "getStatus",
        jobId,
        success,
        failure: success ? null : "parse",
        completedAt: 0,
        daemon,
        transport
    };
}

export function resultChangeTab(jobId: number, daemon: DaemonState, transport: TransportState): ChangeTabJobResult {
    const success = daemon.success && transport.success;
    return {
        type: "changeTab",
        jobId,
        success,
        failure: success ? null : "parse",
        completedAt: 0,
        daemon,
        transport
    };
}

export function resultTransportFailed(jobId: number, failure: JobFailure = "transport"): TransportJobResult {
    return {
        type: "getTransport",
        jobId,
        success: false,
        failure,
        completedAt: 0,
        transport: transportStateEmpty()
    };
}

export function resultStatusFailed(jobId: number, failure: JobFailure = "transport"): StatusJobResult {
    return {
        type: "getStatus",
        jobId,
        success: false,
        failure,
        completedAt: 0,
        daemon: daemonStateEmpty(),
        transport: transportStateEmpty()
    };
}

export function resultTokenFailed(jobId: number, failure: JobFailure = "transport"): SessionTokenJobResult {
    return {
        type: "getSessionToken",
        jobId,
        success: false,
        failure,
        completedAt: 0,
        sessionToken: ""
    };
}
