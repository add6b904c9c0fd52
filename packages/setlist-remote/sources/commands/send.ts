import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { getLogger } from "../log.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { cliEngineCreate } from "./cliEngineCreate.js";
import { cliJobRun } from "./cliJobRun.js";
import { cliPortParse } from "./cliPortParse.js";
import { sendActionNeedsSession, sendActionParse, sendRequestBuild } from "./sendActionParse.js";
import { transportDescribe } from "./statusReportBuild.js";

const logger = getLogger("command.send");

export type SendOptions = {
    settings?: string;
    host?: string;
    port?: string;
};

export async function sendCommand(actionValue: string, options: SendOptions): Promise<void> {
    const action = sendActionParse(actionValue);
    const config = await configLoad(path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH), {
        host: options.host,
        port: options.port === undefined ? undefined : cliPortParse(options.port)
    });
    const engine = cliEngineCreate(config);
    engine.start();

    try {
        let sessionToken = "";
        if (sendActionNeedsSession(action)) {
            const token = await cliJobRun(engine, { type: "getSessionToken" });
            if (!token.success) {
                throw new Error("Session token unavailable; is the setlist script loaded in the DAW?");
            }
            sessionToken = token.sessionToken;
        }

        const request = sendRequestBuild(action, sessionToken);
        const result = await cliJobRun(engine, request);
        if (!result.success) {
            throw new Error(`Action ${action} failed (${result.failure ?? "unknown"} failure)`);
        }
        logger.info({ action, jobId: result.jobId }, "send: Action completed");
        if (result.type === "changePlaystate" || result.type === "changeTab") {
            console.log(transportDescribe(result.transport));
        }
    } finally {
        await engine.shutdown();
    }
}
