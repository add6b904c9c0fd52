#!/usr/bin/env node
import { readFileSync } from "node:fs";

import { Command } from "commander";
import { z } from "zod";

import { cliLogConfig } from "./commands/cliLogConfig.js";
import type { SendOptions } from "./commands/send.js";
import type { StartOptions } from "./commands/start.js";
import type { StatusOptions } from "./commands/status.js";
import { getLogger, initLogging } from "./log.js";
import { DEFAULT_SETTINGS_PATH } from "./settings.js";

const packageSchema = z.object({ version: z.string() }).passthrough();
const pkg = packageSchema.parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

const program = new Command();

// Command modules create their loggers on import, so they load after logging is configured.
initLogging(cliLogConfig(process.argv));
const logger = getLogger("main");

program.name("setlist-remote").description("Three-button remote control for a DAW setlist").version(pkg.version);

program
    .command("start")
    .description("Run the remote control loop in this terminal")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--host <host>", "Override the DAW host")
    .option("--port <port>", "Override the DAW web control port")
    .action(async (options: StartOptions) => {
        const { startCommand } = await import("./commands/start.js");
        await startCommand(options);
    });

program
    .command("status")
    .description("Print the DAW transport and tab list once")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--host <host>", "Override the DAW host")
    .option("--port <port>", "Override the DAW web control port")
    .option("--json", "Print the report as JSON")
    .action(async (options: StatusOptions) => {
        const { statusCommand } = await import("./commands/status.js");
        await statusCommand(options);
    });

program
    .command("send")
    .description("Send one command to the DAW")
    .argument("<action>", "play, stop, next or previous")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--host <host>", "Override the DAW host")
    .option("--port <port>", "Override the DAW web control port")
    .action(async (action: string, options: SendOptions) => {
        const { sendCommand } = await import("./commands/send.js");
        await sendCommand(action, options);
    });

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

try {
    await program.parseAsync(process.argv);
} catch (error) {
    logger.error({ error }, "error: Command failed");
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
}
