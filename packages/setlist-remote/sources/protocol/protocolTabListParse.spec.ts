import { describe, expect, it } from "vitest";

import { protocolTabListParse } from "./protocolTabListParse.js";

describe("protocolTabListParse", () => {
    it("strips the project suffix and keeps the length", () => {
        expect(protocolTabListParse('[{"length":180,"name":"Song.RPP","index":0}]')).toEqual([
            { lengthSeconds: 180, displayName: "Song", index: 0 }
        ]);
    });

    it("keeps server order and indices", () => {
        const tabs = protocolTabListParse(
            '[{"length":297.5,"name":"Opener.rpp","index":2,"dirty":false},{"length":12,"name":"Encore","index":0}]'
        );

        expect(tabs.map((tab) => [tab.displayName, tab.index])).toEqual([
            ["Opener", 2],
            ["Encore", 0]
        ]);
    });

    it("only strips the exact lower or upper case suffix", () => {
        expect(protocolTabListParse('[{"length":1,"name":"Mixed.Rpp","index":0}]')[0].displayName).toBe("Mixed.Rpp");
    });

    it("skips entries missing required keys", () => {
        const tabs = protocolTabListParse(
            '[{"length":10,"index":0},{"length":20,"name":"Kept.rpp","index":1},{"name":"NoLength","index":2}]'
        );

        expect(tabs).toEqual([{ lengthSeconds: 20, displayName: "Kept", index: 1 }]);
    });

    it("returns an empty list for invalid json or a non-array", () => {
        expect(protocolTabListParse("not json")).toEqual([]);
        expect(protocolTabListParse('{"length":1}')).toEqual([]);
    });
});
