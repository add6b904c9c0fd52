import { getLogger } from "../log.js";
import type { ControlView, RenderPort } from "../engine/control/controlTypes.js";
import { statusLineBuild } from "./statusLineBuild.js";

const logger = getLogger("terminal.render");

const CLEAR_LINE = "\r\u001b[K";

export type TerminalOutput = {
    write(chunk: string): unknown;
};

/**
 * Draws the status line in place, redrawing only when it changes or when
 * the periodic refresh asks for it.
 */
export function terminalRenderCreate(output: TerminalOutput): RenderPort {
    let lastLine: string | null = null;

    return {
        render: (view: ControlView) => {
            const line = statusLineBuild(view);
            if (line === lastLine) {
                return;
            }
            lastLine = line;
            output.write(`${CLEAR_LINE}${line}`);
        },
        periodicRefresh: (now: number) => {
            logger.debug({ now }, "refresh: Periodic redraw");
            lastLine = null;
        }
    };
}
