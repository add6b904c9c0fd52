import {
    daemonStateEmpty,
    transportStateEmpty,
    type DaemonState,
    type TabInfo,
    type TransportState
} from "../../protocol/protocolTypes.js";
import type { JobResult } from "../jobs/jobTypes.js";

export type DomainSnapshot = {
    transport: TransportState;
    daemon: DaemonState;
    tabsKnown: boolean;
    updatedAt: number | null;
};

/**
 * Last-known-good tab list and transport state. Written only from drained
 * job results; an unsuccessful part of a result leaves the stored value alone.
 */
export class DomainStore {
    private transport: TransportState = transportStateEmpty();
    private daemon: DaemonState = daemonStateEmpty();
    private updatedAt: number | null = null;

    apply(result: JobResult): boolean {
        let changed = false;
        switch (result.type) {
            case "getTransport":
            case "changePlaystate":
                changed = this.transportApply(result.transport);
                break;
            case "getStatus":
            case "changeTab":
                changed = this.daemonApply(result.daemon);
                changed = this.transportApply(result.transport) || changed;
                break;
            case "connect":
            case "getSessionToken":
                return false;
        }
        if (changed) {
            this.updatedAt = result.completedAt;
        }
        return changed;
    }

    get tabsKnown(): boolean {
        return this.daemon.success;
    }

    activeTab(): TabInfo | null {
        return this.daemon.tabs.find((tab) => tab.index === this.daemon.activeIndex) ?? null;
    }

    snapshot(): DomainSnapshot {
        return {
            transport: { ...this.transport },
            daemon: { ...this.daemon, tabs: this.daemon.tabs.map((tab) => ({ ...tab })) },
            tabsKnown: this.tabsKnown,
            updatedAt: this.updatedAt
        };
    }

    private transportApply(transport: TransportState): boolean {
        if (!transport.success) {
            return false;
        }
        this.transport = { ...transport };
        return true;
    }

    private daemonApply(daemon: DaemonState): boolean {
        if (!daemon.success) {
            return false;
        }
        this.daemon = { ...daemon, tabs: daemon.tabs.map((tab) => ({ ...tab })) };
        return true;
    }
}
