import { resolveSetlistRemotePath } from "./paths.js";

export type DawSettings = {
    host?: string;
    port?: number;
    basePath?: string;
};

export type EngineSettings = {
    queueCapacity?: number;
    resultCapacity?: number;
};

export type SessionSettings = {
    connectRetryIntervalMs?: number;
    tokenRetryIntervalMs?: number;
    maxTokenAttempts?: number;
    disconnectAfterFailures?: number;
};

export type PollingSettings = {
    statusInitialIntervalMs?: number;
    statusIntervalMs?: number;
    transportIntervalMs?: number;
    transportIdleIntervalMs?: number;
};

export type LoopSettings = {
    frameIntervalMs?: number;
    periodicIntervalMs?: number;
};

/**
 * Contents of settings.json. Every field is optional; configResolve fills in defaults.
 */
export type SettingsConfig = {
    daw?: DawSettings;
    requestTimeoutMs?: number;
    engine?: EngineSettings;
    session?: SessionSettings;
    polling?: PollingSettings;
    loop?: LoopSettings;
};

export type ResolvedSettingsConfig = {
    daw: Required<DawSettings>;
    requestTimeoutMs: number;
    engine: Required<EngineSettings>;
    session: Required<SessionSettings>;
    polling: Required<PollingSettings>;
    loop: Required<LoopSettings>;
};

export const DEFAULT_SETTINGS_PATH = resolveSetlistRemotePath("settings.json");
