import { PassThrough } from "node:stream";

import { describe, expect, it, vi } from "vitest";

import { terminalInputCreate, terminalKeyButton } from "./terminalInput.js";

describe("terminalKeyButton", () => {
    it("maps digit and home-row keys onto buttons", () => {
        expect(["1", "2", "3", "a", "S", "d", "x"].map(terminalKeyButton)).toEqual([0, 1, 2, 0, 1, 2, null]);
    });
});

describe("terminalInputCreate", () => {
    it("latches presses until the next sample", () => {
        const stream = new PassThrough();
        const input = terminalInputCreate(stream, () => {});

        stream.emit("keypress", "3", { name: "3" });
        stream.emit("keypress", "a", { name: "a" });

        expect(input.buttonsSample()).toEqual([true, false, true]);
        expect(input.buttonsSample()).toEqual([false, false, false]);
        input.close();
    });

    it("calls onQuit for q and ctrl+c", () => {
        const stream = new PassThrough();
        const onQuit = vi.fn();
        const input = terminalInputCreate(stream, onQuit);

        stream.emit("keypress", "q", { name: "q" });
        stream.emit("keypress", "\u0003", { name: "c", ctrl: true });

        expect(onQuit).toHaveBeenCalledTimes(2);
        expect(input.buttonsSample()).toEqual([false, false, false]);
        input.close();
    });

    it("stops listening after close", () => {
        const stream = new PassThrough();
        const input = terminalInputCreate(stream, () => {});

        input.close();
        stream.emit("keypress", "1", { name: "1" });

        expect(input.buttonsSample()).toEqual([false, false, false]);
    });
});
