import { describe, expect, it } from "vitest";

import { protocolKeyedFieldParse } from "./protocolKeyedFieldParse.js";

describe("protocolKeyedFieldParse", () => {
    it("returns the value when namespace and key match", () => {
        expect(
            protocolKeyedFieldParse(["EXTSTATE", "ReaperSetlist", "activeIndex", "3"], "ReaperSetlist", "activeIndex")
        ).toBe("3");
    });

    it("returns null for a different key", () => {
        expect(protocolKeyedFieldParse(["EXTSTATE", "ReaperSetlist", "tabs", "[]"], "ReaperSetlist", "activeIndex")).toBeNull();
    });

    it("returns null for a different record tag", () => {
        expect(protocolKeyedFieldParse(["TRANSPORT", "ReaperSetlist", "tabs", "[]"], "ReaperSetlist", "tabs")).toBeNull();
    });

    it("returns null when the value field is missing", () => {
        expect(protocolKeyedFieldParse(["EXTSTATE", "ReaperSetlist", "tabs"], "ReaperSetlist", "tabs")).toBeNull();
    });
});
