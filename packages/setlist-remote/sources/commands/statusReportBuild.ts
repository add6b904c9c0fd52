import { clockFormat } from "../terminal/statusLineBuild.js";
import { PLAY_STATE, type DaemonState, type TransportState } from "../protocol/protocolTypes.js";

export type StatusReport = {
    origin: string;
    sessionReady: boolean;
    transport: TransportState;
    daemon: DaemonState | null;
};

const PLAY_STATE_NAMES: Record<number, string> = {
    [PLAY_STATE.stopped]: "stopped",
    [PLAY_STATE.playing]: "playing",
    [PLAY_STATE.paused]: "paused",
    [PLAY_STATE.recording]: "recording",
    [PLAY_STATE.recordPaused]: "record paused"
};

export function playStateName(playState: number): string {
    return PLAY_STATE_NAMES[playState] ?? `unknown (${playState})`;
}

/**
 * Formats the one-shot status report printed by `status`.
 */
export function statusReportBuild(report: StatusReport): string[] {
    const lines = [`daw:       ${report.origin}`, `session:   ${report.sessionReady ? "ready" : "unavailable"}`];
    lines.push(`transport: ${transportDescribe(report.transport)}`);
    if (!report.daemon || !report.daemon.success) {
        lines.push("tabs:      unknown");
        return lines;
    }
    lines.push(`tabs:      ${report.daemon.tabs.length}`);
    for (const tab of report.daemon.tabs) {
        const marker = tab.index === report.daemon.activeIndex ? "*" : " ";
        lines.push(`  ${marker} ${tab.index}: ${tab.displayName} (${clockFormat(tab.lengthSeconds)})`);
    }
    return lines;
}

export function transportDescribe(transport: TransportState): string {
    if (!transport.success) {
        return "unavailable";
    }
    const repeat = transport.repeatEnabled ? " repeat" : "";
    return `${playStateName(transport.playState)} ${clockFormat(transport.positionSeconds)} ${transport.positionBarsBeats}${repeat}`;
}
