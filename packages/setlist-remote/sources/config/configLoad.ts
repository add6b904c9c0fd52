import { promises as fs } from "node:fs";
import path from "node:path";

import { getLogger } from "../log.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";
import { configResolve } from "./configResolve.js";
import { configSettingsParse } from "./configSettingsParse.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

const logger = getLogger("config");

/**
 * Loads, validates, and resolves the config from disk into an immutable snapshot.
 * A missing settings file means all defaults.
 */
export async function configLoad(
    settingsPath: string = DEFAULT_SETTINGS_PATH,
    overrides: ConfigOverrides = {}
): Promise<Config> {
    const resolvedPath = path.resolve(settingsPath);
    let raw: unknown = {};

    let content: string | null = null;
    try {
        content = await fs.readFile(resolvedPath, "utf8");
    } catch (error) {
        if (!errorIsMissingFile(error)) {
            throw error;
        }
        logger.debug({ settingsPath: resolvedPath }, "load: Settings file not found, using defaults");
    }

    if (content !== null) {
        try {
            raw = JSON.parse(content);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new Error(`Settings file ${resolvedPath} is not valid JSON: ${reason}`);
        }
    }

    const settings = configSettingsParse(raw);
    return configResolve(settings, resolvedPath, overrides);
}

function errorIsMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
