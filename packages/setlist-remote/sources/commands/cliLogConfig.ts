import type { LogConfig } from "../log.js";
import { resolveSetlistRemotePath } from "../paths.js";

export const START_LOG_PATH = resolveSetlistRemotePath("setlist-remote.log");

/**
 * Logging overrides for the command named in argv.
 * The start command draws its status line on the terminal, so its logs go to
 * START_LOG_PATH unless SETLIST_LOG_DEST names a destination.
 */
export function cliLogConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Partial<LogConfig> {
    const command = argv.slice(2).find((arg) => !arg.startsWith("-"));
    if (command !== "start" || (env.SETLIST_LOG_DEST?.trim() ?? "").length > 0) {
        return {};
    }
    return { destination: START_LOG_PATH };
}
