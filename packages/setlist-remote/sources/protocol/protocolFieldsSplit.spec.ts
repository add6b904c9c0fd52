import { describe, expect, it } from "vitest";

import { protocolFieldsSplit } from "./protocolFieldsSplit.js";

describe("protocolFieldsSplit", () => {
    it("splits on tabs and strips the trailing newline", () => {
        expect(protocolFieldsSplit("EXTSTATE\tReaperSetlist\tScriptActionId\t_RS123\n")).toEqual([
            "EXTSTATE",
            "ReaperSetlist",
            "ScriptActionId",
            "_RS123"
        ]);
    });

    it("strips a trailing carriage return line break", () => {
        expect(protocolFieldsSplit("TRANSPORT\t0\r\n")).toEqual(["TRANSPORT", "0"]);
    });

    it("drops empty trailing fragments but keeps inner empty fields", () => {
        expect(protocolFieldsSplit("a\t\tb\t\t")).toEqual(["a", "", "b"]);
    });

    it("returns no fields for an empty line", () => {
        expect(protocolFieldsSplit("")).toEqual([]);
    });
});
