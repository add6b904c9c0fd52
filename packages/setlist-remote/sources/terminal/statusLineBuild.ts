import type { DomainSnapshot } from "../engine/state/domainStore.js";
import type { ControlView, UiState } from "../engine/control/controlTypes.js";
import type { TransportState } from "../protocol/protocolTypes.js";

const UI_LABELS: Record<UiState, string> = {
    disconnected: "OFFLINE",
    stopped: "STOPPED",
    playing: "PLAYING",
    confirmStop: "STOP? [1] yes [2]/[3] no"
};

/**
 * Renders the control view as one status line:
 * `STATE | tab i/n Name (mm:ss) | mm:ss bars.beats | link`.
 */
export function statusLineBuild(view: ControlView): string {
    return [
        UI_LABELS[view.ui],
        tabLabel(view.domain),
        positionLabel(view.domain.transport),
        linkLabel(view)
    ].join(" | ");
}

export function clockFormat(seconds: number): string {
    const whole = Math.max(0, Math.floor(seconds));
    const minutes = Math.floor(whole / 60);
    const rest = whole % 60;
    return `${String(minutes).padStart(2, "0")}:${String(rest).padStart(2, "0")}`;
}

function tabLabel(domain: DomainSnapshot): string {
    if (!domain.tabsKnown) {
        return "tab -";
    }
    const { tabs, activeIndex } = domain.daemon;
    const position = tabs.findIndex((tab) => tab.index === activeIndex);
    const tab = tabs[position];
    if (!tab) {
        return `tab ?/${tabs.length}`;
    }
    return `tab ${position + 1}/${tabs.length} ${tab.displayName} (${clockFormat(tab.lengthSeconds)})`;
}

function positionLabel(transport: TransportState): string {
    if (!transport.success) {
        return "--:--";
    }
    const bars = transport.positionBarsBeats.length > 0 ? ` ${transport.positionBarsBeats}` : "";
    const repeat = transport.repeatEnabled ? " [repeat]" : "";
    return `${clockFormat(transport.positionSeconds)}${bars}${repeat}`;
}

function linkLabel(view: ControlView): string {
    switch (view.session) {
        case "disconnected":
            return "link down";
        case "connectedNoToken":
            return `${view.address ?? "connected"} (no session)`;
        case "connectedHasToken":
            return view.address ?? "connected";
    }
}
