import path from "node:path";

import { configLoad } from "../config/configLoad.js";
import { getLogger } from "../log.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { cliEngineCreate } from "./cliEngineCreate.js";
import { cliJobRun } from "./cliJobRun.js";
import { cliPortParse } from "./cliPortParse.js";
import { statusReportBuild } from "./statusReportBuild.js";

const logger = getLogger("command.status");

export type StatusOptions = {
    settings?: string;
    host?: string;
    port?: string;
    json?: boolean;
};

export async function statusCommand(options: StatusOptions): Promise<void> {
    const config = await configLoad(path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH), {
        host: options.host,
        port: options.port === undefined ? undefined : cliPortParse(options.port)
    });
    const engine = cliEngineCreate(config);
    engine.start();

    try {
        const token = await cliJobRun(engine, { type: "getSessionToken" });
        const sessionToken = token.success ? token.sessionToken : "";
        const report = { origin: config.dawOrigin, sessionReady: sessionToken.length > 0 };

        if (sessionToken.length > 0) {
            const status = await cliJobRun(engine, { type: "getStatus", sessionToken });
            statusPrint({ ...report, transport: status.transport, daemon: status.daemon }, options.json ?? false);
        } else {
            logger.warn("status: Session token unavailable, reading transport only");
            const transport = await cliJobRun(engine, { type: "getTransport" });
            statusPrint({ ...report, transport: transport.transport, daemon: null }, options.json ?? false);
        }
    } finally {
        await engine.shutdown();
    }
}

function statusPrint(report: Parameters<typeof statusReportBuild>[0], json: boolean): void {
    if (json) {
        console.log(JSON.stringify(report, null, 2));
        return;
    }
    for (const line of statusReportBuild(report)) {
        console.log(line);
    }
}
