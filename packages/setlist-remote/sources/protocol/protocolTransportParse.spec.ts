import { describe, expect, it } from "vitest";

import { protocolFieldsSplit } from "./protocolFieldsSplit.js";
import { protocolTransportParse } from "./protocolTransportParse.js";

describe("protocolTransportParse", () => {
    it("decodes a playing transport line", () => {
        const state = protocolTransportParse(protocolFieldsSplit("TRANSPORT\t1\t96.106667\t0\t35.1.30\n"));

        expect(state).toEqual({
            playState: 1,
            positionSeconds: 96.106667,
            repeatEnabled: false,
            positionBarsBeats: "35.1.30",
            success: true
        });
    });

    it("reads the repeat flag", () => {
        const state = protocolTransportParse(["TRANSPORT", "5", "0", "1", "1.1.00"]);

        expect(state.playState).toBe(5);
        expect(state.positionSeconds).toBe(0);
        expect(state.repeatEnabled).toBe(true);
    });

    it("fails without throwing when fields are missing", () => {
        expect(() => protocolTransportParse(["TRANSPORT", "1", "2.5", "0"])).not.toThrow();
        expect(protocolTransportParse(["TRANSPORT", "1", "2.5", "0"])).toEqual({
            playState: 0,
            positionSeconds: 0,
            repeatEnabled: false,
            positionBarsBeats: "",
            success: false
        });
    });

    it("fails when the tag does not match", () => {
        expect(protocolTransportParse(["EXTSTATE", "1", "2.5", "0", "1.1.00"]).success).toBe(false);
    });

    it("fails when numbers do not parse", () => {
        expect(protocolTransportParse(["TRANSPORT", "play", "2.5", "0", "1.1.00"]).success).toBe(false);
        expect(protocolTransportParse(["TRANSPORT", "1", "soon", "0", "1.1.00"]).success).toBe(false);
        expect(protocolTransportParse(["TRANSPORT", "1", "", "0", "1.1.00"]).success).toBe(false);
    });

    it("fails for a negative position", () => {
        expect(protocolTransportParse(["TRANSPORT", "1", "-0.5", "0", "1.1.00"]).success).toBe(false);
    });
});
