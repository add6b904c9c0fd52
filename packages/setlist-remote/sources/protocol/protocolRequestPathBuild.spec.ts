import { describe, expect, it } from "vitest";

import { protocolRequestPathBuild } from "./protocolRequestPathBuild.js";

describe("protocolRequestPathBuild", () => {
    it("appends a single command to the base path", () => {
        expect(protocolRequestPathBuild(["TRANSPORT"], "/_")).toBe("/_/TRANSPORT");
    });

    it("joins batched commands with semicolons", () => {
        expect(protocolRequestPathBuild(["1007", "TRANSPORT"], "/_")).toBe("/_/1007;TRANSPORT");
    });

    it("does not double a trailing slash on the base path", () => {
        expect(protocolRequestPathBuild(["GET/EXTSTATE/ReaperSetlist/tabs"], "/_/")).toBe(
            "/_/GET/EXTSTATE/ReaperSetlist/tabs"
        );
    });

    it("returns the base path when there are no commands", () => {
        expect(protocolRequestPathBuild([], "/_")).toBe("/_");
    });
});
