import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { ControlLoop } from "../engine/control/controlLoop.js";
import { getLogger } from "../log.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { terminalInputCreate } from "../terminal/terminalInput.js";
import { terminalRenderCreate } from "../terminal/terminalRender.js";
import { awaitShutdown, onShutdown, requestShutdown } from "../util/shutdown.js";
import { cliEngineCreate } from "./cliEngineCreate.js";
import { cliPortParse } from "./cliPortParse.js";

const logger = getLogger("command.start");

export type StartOptions = {
    settings?: string;
    host?: string;
    port?: string;
};

export async function startCommand(options: StartOptions): Promise<void> {
    const settingsPath = path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH);
    const config = await configLoad(settingsPath, {
        host: options.host,
        port: options.port === undefined ? undefined : cliPortParse(options.port)
    });
    logger.info({ settings: config.settingsPath, daw: config.dawOrigin }, "start: Starting setlist remote");

    const input = terminalInputCreate(process.stdin, () => requestShutdown("quit"));
    const loop = new ControlLoop({
        engine: cliEngineCreate(config),
        input,
        render: terminalRenderCreate(process.stdout),
        session: config.session,
        polling: config.polling,
        frameIntervalMs: config.loop.frameIntervalMs,
        periodicIntervalMs: config.loop.periodicIntervalMs
    });

    onShutdown("control-loop", async () => {
        input.close();
        await loop.stop();
        process.stdout.write("\n");
    });
    loop.start();
    process.stdout.write("Buttons: [1]/[a] left  [2]/[s] middle  [3]/[d] right  [q] quit\n");

    const reason = await awaitShutdown();
    logger.info({ reason }, "stop: Setlist remote stopped");
}
