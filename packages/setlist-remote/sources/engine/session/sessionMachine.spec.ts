import { describe, expect, it } from "vitest";

import { resultConnect, resultToken, resultTokenFailed, resultTransportFailed } from "../jobs/jobResultsTestUtils.js";
import type { JobRequest } from "../jobs/jobTypes.js";
import { SessionMachine } from "./sessionMachine.js";

function buildSession(accept = true) {
    const submitted: JobRequest[] = [];
    let nextId = 1;
    const session = new SessionMachine((request) => {
        if (!accept) {
            return 0;
        }
        submitted.push(request);
        const id = nextId;
        nextId += 1;
        return id;
    });
    return { session, submitted };
}

function connect(session: SessionMachine, now: number): void {
    session.checkAndRetry(now);
    session.observe(resultConnect(1));
}

describe("SessionMachine", () => {
    it("starts disconnected and tries to connect immediately", () => {
        const { session, submitted } = buildSession();

        expect(session.state).toBe("disconnected");
        session.checkAndRetry(0);

        expect(submitted).toEqual([{ type: "connect" }]);
    });

    it("waits for the connect retry interval after a failed attempt", () => {
        const { session, submitted } = buildSession();

        session.checkAndRetry(0);
        session.observe(resultConnect(1, false));
        session.checkAndRetry(9_999);
        expect(submitted).toHaveLength(1);

        session.checkAndRetry(10_000);
        expect(submitted).toEqual([{ type: "connect" }, { type: "connect" }]);
    });

    it("does not submit a second connect while one is outstanding", () => {
        const { session, submitted } = buildSession();

        session.checkAndRetry(0);
        session.checkAndRetry(9_999);

        expect(submitted).toHaveLength(1);
    });

    it("resubmits the connect job when its result never arrives", () => {
        const { session, submitted } = buildSession();

        session.checkAndRetry(0);
        session.checkAndRetry(10_000);
        session.observe(resultConnect(2));

        expect(submitted).toEqual([{ type: "connect" }, { type: "connect" }]);
        expect(session.state).toBe("connectedNoToken");
    });

    it("moves to connectedNoToken after a successful connect", () => {
        const { session } = buildSession();

        connect(session, 0);

        expect(session.state).toBe("connectedNoToken");
        expect(session.connected).toBe(true);
        expect(session.localAddress).toBe("10.0.0.5");
    });

    it("requests the session token every 5 seconds", () => {
        const { session, submitted } = buildSession();
        connect(session, 0);

        session.checkAndRetry(100);
        session.checkAndRetry(5_099);
        session.checkAndRetry(5_100);

        expect(submitted.slice(1)).toEqual([{ type: "getSessionToken" }, { type: "getSessionToken" }]);
        expect(session.tokenAttemptCount).toBe(2);
    });

    it("stops requesting the token after five attempts", () => {
        const { session, submitted } = buildSession();
        connect(session, 0);

        for (let attempt = 0; attempt < 8; attempt += 1) {
            session.checkAndRetry(attempt * 5_000);
            session.observe(resultToken(attempt + 2, ""));
        }

        expect(submitted.filter((request) => request.type === "getSessionToken")).toHaveLength(5);
        expect(session.state).toBe("connectedNoToken");
    });

    it("caches a fetched token and moves to connectedHasToken", () => {
        const { session } = buildSession();
        connect(session, 0);

        session.checkAndRetry(0);
        session.observe(resultToken(2, "_RS1234"));

        expect(session.state).toBe("connectedHasToken");
        expect(session.sessionToken).toBe("_RS1234");
        expect(session.tokenAttemptCount).toBe(0);
    });

    it("keeps the cached token when a later fetch returns empty", () => {
        const { session } = buildSession();
        connect(session, 0);
        session.observe(resultToken(2, "_RS1234"));

        session.observe(resultToken(3, ""));

        expect(session.sessionToken).toBe("_RS1234");
        expect(session.state).toBe("connectedHasToken");
    });

    it("submits nothing once it holds a token", () => {
        const { session, submitted } = buildSession();
        connect(session, 0);
        session.observe(resultToken(2, "_RS1234"));

        session.checkAndRetry(60_000);

        expect(submitted).toEqual([{ type: "connect" }]);
    });

    it("drops to disconnected after three consecutive transport failures", () => {
        const { session } = buildSession();
        connect(session, 0);
        session.observe(resultToken(2, "_RS1234"));

        session.observe(resultTransportFailed(3));
        session.observe(resultTransportFailed(4));
        expect(session.state).toBe("connectedHasToken");
        session.observe(resultTransportFailed(5));

        expect(session.state).toBe("disconnected");
        expect(session.sessionToken).toBe("_RS1234");
    });

    it("does not count parse failures as connection trouble", () => {
        const { session } = buildSession();
        connect(session, 0);

        session.observe(resultTransportFailed(2));
        session.observe(resultTransportFailed(3, "parse"));
        session.observe(resultTransportFailed(4));
        session.observe(resultTransportFailed(5));

        expect(session.state).toBe("connectedNoToken");
    });

    it("reconnects straight into connectedHasToken with a cached token", () => {
        const { session, submitted } = buildSession();
        connect(session, 0);
        session.observe(resultToken(2, "_RS1234"));
        for (const jobId of [3, 4, 5]) {
            session.observe(resultTransportFailed(jobId));
        }

        session.checkAndRetry(1_000);
        session.observe(resultConnect(6));

        expect(submitted).toEqual([{ type: "connect" }, { type: "connect" }]);
        expect(session.state).toBe("connectedHasToken");
    });

    it("re-arms token retries after the connection comes back", () => {
        const { session, submitted } = buildSession();
        connect(session, 0);
        for (let attempt = 0; attempt < 5; attempt += 1) {
            session.checkAndRetry(attempt * 5_000);
        }
        for (const jobId of [7, 8, 9]) {
            session.observe(resultTransportFailed(jobId));
        }

        session.checkAndRetry(30_000);
        session.observe(resultConnect(7, false));
        session.checkAndRetry(40_000);
        session.observe(resultConnect(8));
        session.checkAndRetry(40_000);

        expect(submitted.at(-1)).toEqual({ type: "getSessionToken" });
        expect(session.tokenAttemptCount).toBe(1);
    });

    it("keeps spent token attempts across a drop inferred from request failures", () => {
        const { session, submitted } = buildSession();
        connect(session, 0);
        for (let attempt = 0; attempt < 5; attempt += 1) {
            session.checkAndRetry(attempt * 5_000);
        }
        for (const jobId of [7, 8, 9]) {
            session.observe(resultTransportFailed(jobId));
        }

        session.checkAndRetry(30_000);
        session.observe(resultConnect(7));
        session.checkAndRetry(30_000);
        session.checkAndRetry(60_000);

        expect(session.state).toBe("connectedNoToken");
        expect(submitted.at(-1)).toEqual({ type: "connect" });
        expect(session.tokenAttemptCount).toBe(5);
    });

    it("does not count failed token fetches toward a connection drop", () => {
        const { session } = buildSession();
        connect(session, 0);

        for (const jobId of [2, 3, 4, 5]) {
            session.observe(resultTokenFailed(jobId));
        }

        expect(session.state).toBe("connectedNoToken");
    });

    it("caps token fetches while the DAW stays unreachable", () => {
        const submitted: JobRequest[] = [];
        let nextId = 1;
        const jobIdTake = (): number => {
            const id = nextId;
            nextId += 1;
            return id;
        };
        const session = new SessionMachine((request) => {
            submitted.push(request);
            return jobIdTake();
        });

        for (let now = 0; now <= 120_000; now += 5_000) {
            const before = submitted.length;
            session.checkAndRetry(now);
            submitted.slice(before).forEach((request, index) => {
                const jobId = nextId - (submitted.length - before) + index;
                session.observe(request.type === "connect" ? resultConnect(jobId) : resultTokenFailed(jobId));
            });
            session.observe(resultTransportFailed(jobIdTake()));
        }

        const tokenJobs = submitted.filter((request) => request.type === "getSessionToken");
        const connectJobs = submitted.filter((request) => request.type === "connect");
        expect(tokenJobs).toHaveLength(5);
        expect(connectJobs.length).toBeGreaterThan(1);
    });

    it("retries later when the engine refuses the connect job", () => {
        const { session } = buildSession(false);

        session.checkAndRetry(0);

        expect(session.state).toBe("disconnected");
    });
});
