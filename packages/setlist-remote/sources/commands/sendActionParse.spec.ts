import { describe, expect, it } from "vitest";

import { sendActionNeedsSession, sendActionParse, sendRequestBuild } from "./sendActionParse.js";

describe("sendActionParse", () => {
    it("accepts known actions in any case", () => {
        expect(sendActionParse("Play")).toBe("play");
        expect(sendActionParse(" previous ")).toBe("previous");
    });

    it("rejects unknown actions", () => {
        expect(() => sendActionParse("rewind")).toThrow(
            'Unknown action "rewind", expected one of: play, stop, next, previous'
        );
    });
});

describe("sendRequestBuild", () => {
    it("maps transport actions onto playstate jobs", () => {
        expect(sendRequestBuild("stop", "")).toEqual({ type: "changePlaystate", action: "stop" });
        expect(sendActionNeedsSession("stop")).toBe(false);
    });

    it("maps tab actions onto tab jobs with the token", () => {
        expect(sendRequestBuild("next", "_RS1234")).toEqual({
            type: "changeTab",
            direction: "next",
            sessionToken: "_RS1234"
        });
        expect(sendActionNeedsSession("next")).toBe(true);
    });
});
