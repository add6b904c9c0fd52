import { emitKeypressEvents } from "node:readline";

import { getLogger } from "../log.js";
import type { ButtonEdges, InputPort } from "../engine/control/controlTypes.js";

const logger = getLogger("terminal.input");

const KEY_BUTTONS: Record<string, 0 | 1 | 2> = {
    "1": 0,
    a: 0,
    "2": 1,
    s: 1,
    "3": 2,
    d: 2
};

type Keypress = {
    name?: string;
    sequence?: string;
    ctrl?: boolean;
};

export type TerminalInputStream = NodeJS.ReadableStream & {
    isTTY?: boolean;
    setRawMode?: (mode: boolean) => unknown;
};

export type TerminalInput = InputPort & {
    close(): void;
};

/**
 * Maps a key to its button index, or null for keys that are not buttons.
 */
export function terminalKeyButton(key: string): 0 | 1 | 2 | null {
    return KEY_BUTTONS[key.toLowerCase()] ?? null;
}

/**
 * Reads keypresses from a terminal and latches them as button edges until
 * the next sample. `q` and Ctrl+C call onQuit.
 */
export function terminalInputCreate(stream: TerminalInputStream, onQuit: () => void): TerminalInput {
    let pressed: [boolean, boolean, boolean] = [false, false, false];

    const onKeypress = (sequence: string | undefined, key: Keypress | undefined) => {
        if ((key?.ctrl && key.name === "c") || key?.name === "q") {
            logger.debug("input: Quit requested");
            onQuit();
            return;
        }
        const name = key?.name ?? sequence ?? "";
        const button = terminalKeyButton(name);
        if (button !== null) {
            pressed[button] = true;
        }
    };

    emitKeypressEvents(stream);
    if (stream.isTTY && stream.setRawMode) {
        stream.setRawMode(true);
    }
    stream.on("keypress", onKeypress);
    stream.resume();

    return {
        buttonsSample: (): ButtonEdges => {
            const sample = pressed;
            pressed = [false, false, false];
            return sample;
        },
        close: () => {
            stream.off("keypress", onKeypress);
            if (stream.isTTY && stream.setRawMode) {
                stream.setRawMode(false);
            }
            stream.pause();
        }
    };
}
