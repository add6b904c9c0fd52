import { describe, expect, it } from "vitest";

import type { ControlView } from "../engine/control/controlTypes.js";
import { daemonStateEmpty, transportStateEmpty } from "../protocol/protocolTypes.js";
import { terminalRenderCreate } from "./terminalRender.js";

const VIEW: ControlView = {
    ui: "disconnected",
    session: "disconnected",
    address: null,
    domain: { transport: transportStateEmpty(), daemon: daemonStateEmpty(), tabsKnown: false, updatedAt: null },
    pendingJobs: 0
};

function outputRecording() {
    const chunks: string[] = [];
    return { chunks, output: { write: (chunk: string) => chunks.push(chunk) } };
}

describe("terminalRenderCreate", () => {
    it("writes the line once while it stays the same", () => {
        const { chunks, output } = outputRecording();
        const render = terminalRenderCreate(output);

        render.render(VIEW);
        render.render(VIEW);

        expect(chunks).toEqual(["\r\u001b[KOFFLINE | tab - | --:-- | link down"]);
    });

    it("redraws after a periodic refresh", () => {
        const { chunks, output } = outputRecording();
        const render = terminalRenderCreate(output);

        render.render(VIEW);
        render.periodicRefresh(30_000);
        render.render(VIEW);

        expect(chunks).toHaveLength(2);
    });

    it("redraws when the view changes", () => {
        const { chunks, output } = outputRecording();
        const render = terminalRenderCreate(output);

        render.render(VIEW);
        render.render({ ...VIEW, ui: "stopped", session: "connectedHasToken", address: "10.0.0.5" });

        expect(chunks[1]).toBe("\r\u001b[KSTOPPED | tab - | --:-- | 10.0.0.5");
    });
});
