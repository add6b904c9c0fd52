import { describe, expect, it } from "vitest";

import { daemonStateEmpty, transportStateEmpty } from "../../protocol/protocolTypes.js";
import {
    daemonWithTabs,
    resultConnect,
    resultStatus,
    resultTransport,
    resultTransportFailed,
    transportPlaying,
    transportStopped
} from "../jobs/jobResultsTestUtils.js";
import { DomainStore } from "./domainStore.js";

const TABS = [
    { lengthSeconds: 180, displayName: "Opener", index: 0 },
    { lengthSeconds: 240.5, displayName: "Ballad", index: 1 }
];

describe("DomainStore", () => {
    it("starts with untrusted defaults", () => {
        const store = new DomainStore();
        const snapshot = store.snapshot();

        expect(snapshot.transport.success).toBe(false);
        expect(snapshot.tabsKnown).toBe(false);
        expect(snapshot.updatedAt).toBeNull();
        expect(store.activeTab()).toBeNull();
    });

    it("stores a successful transport result", () => {
        const store = new DomainStore();

        expect(store.apply({ ...resultTransport(1, transportPlaying(30)), completedAt: 500 })).toBe(true);

        const snapshot = store.snapshot();
        expect(snapshot.transport.positionSeconds).toBe(30);
        expect(snapshot.updatedAt).toBe(500);
    });

    it("keeps the last good transport after a failure", () => {
        const store = new DomainStore();
        store.apply(resultTransport(1, transportPlaying(30)));

        expect(store.apply(resultTransportFailed(2))).toBe(false);

        expect(store.snapshot().transport.positionSeconds).toBe(30);
    });

    it("applies the successful half of a partially failed status", () => {
        const store = new DomainStore();
        store.apply(resultStatus(1, daemonWithTabs(TABS, 0), transportStopped()));

        store.apply(resultStatus(2, daemonStateEmpty(), transportPlaying(8)));

        const snapshot = store.snapshot();
        expect(snapshot.daemon.tabs.map((tab) => tab.displayName)).toEqual(["Opener", "Ballad"]);
        expect(snapshot.transport.positionSeconds).toBe(8);
    });

    it("finds the active tab by its server index", () => {
        const store = new DomainStore();

        store.apply(resultStatus(1, daemonWithTabs(TABS, 1), transportStateEmpty()));

        expect(store.tabsKnown).toBe(true);
        expect(store.activeTab()?.displayName).toBe("Ballad");
    });

    it("returns no active tab when the index is out of range", () => {
        const store = new DomainStore();

        store.apply(resultStatus(1, daemonWithTabs(TABS, 4), transportStopped()));

        expect(store.activeTab()).toBeNull();
    });

    it("ignores connect results", () => {
        const store = new DomainStore();

        expect(store.apply(resultConnect(1))).toBe(false);
    });

    it("hands out copies that do not alias the stored state", () => {
        const store = new DomainStore();
        store.apply(resultStatus(1, daemonWithTabs(TABS, 0), transportStopped()));

        const snapshot = store.snapshot();
        snapshot.daemon.tabs.push({ lengthSeconds: 1, displayName: "Extra", index: 9 });

        expect(store.snapshot().daemon.tabs).toHaveLength(2);
    });
});
