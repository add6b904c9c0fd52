import type { ResolvedSettingsConfig } from "../settings.js";

export type Config = ResolvedSettingsConfig & {
    settingsPath: string;
    configDir: string;
    dawOrigin: string;
};

export type ConfigOverrides = {
    host?: string;
    port?: number;
};
