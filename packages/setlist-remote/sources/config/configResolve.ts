import path from "node:path";

import { CONTROL_LOOP_DEFAULTS } from "../engine/control/controlLoop.js";
import { STATUS_POLLER_DEFAULTS } from "../engine/control/statusPoller.js";
import { JOB_ENGINE_DEFAULTS } from "../engine/jobs/jobEngine.js";
import { SESSION_DEFAULTS } from "../engine/session/sessionTypes.js";
import type { ResolvedSettingsConfig, SettingsConfig } from "../settings.js";
import { freezeDeep } from "../util/freezeDeep.js";
import type { Config, ConfigOverrides } from "./configTypes.js";

const DEFAULT_SETTINGS: ResolvedSettingsConfig = {
    daw: {
        host: "127.0.0.1",
        port: 8080,
        basePath: "/_"
    },
    requestTimeoutMs: 5_000,
    engine: { ...JOB_ENGINE_DEFAULTS },
    session: { ...SESSION_DEFAULTS },
    polling: { ...STATUS_POLLER_DEFAULTS },
    loop: { ...CONTROL_LOOP_DEFAULTS }
};

/**
 * Resolves defaults and overrides into an immutable Config snapshot.
 * Expects: settings already validated.
 */
export function configResolve(settings: SettingsConfig, settingsPath: string, overrides: ConfigOverrides = {}): Config {
    const resolved = resolveSettingsDefaults(settings);
    const host = overrides.host ?? resolved.daw.host;
    const port = overrides.port ?? resolved.daw.port;
    const basePath = basePathNormalize(resolved.daw.basePath);
    const resolvedSettingsPath = path.resolve(settingsPath);

    return freezeDeep({
        ...resolved,
        daw: { host, port, basePath },
        settingsPath: resolvedSettingsPath,
        configDir: path.dirname(resolvedSettingsPath),
        dawOrigin: `http://${hostFormat(host)}:${port}`
    });
}

function resolveSettingsDefaults(settings: SettingsConfig): ResolvedSettingsConfig {
    const { daw, engine, session, polling, loop } = settings;
    return {
        daw: {
            host: daw?.host ?? DEFAULT_SETTINGS.daw.host,
            port: daw?.port ?? DEFAULT_SETTINGS.daw.port,
            basePath: daw?.basePath ?? DEFAULT_SETTINGS.daw.basePath
        },
        requestTimeoutMs: settings.requestTimeoutMs ?? DEFAULT_SETTINGS.requestTimeoutMs,
        engine: {
            queueCapacity: engine?.queueCapacity ?? DEFAULT_SETTINGS.engine.queueCapacity,
            resultCapacity: engine?.resultCapacity ?? DEFAULT_SETTINGS.engine.resultCapacity
        },
        session: {
            connectRetryIntervalMs: session?.connectRetryIntervalMs ?? DEFAULT_SETTINGS.session.connectRetryIntervalMs,
            tokenRetryIntervalMs: session?.tokenRetryIntervalMs ?? DEFAULT_SETTINGS.session.tokenRetryIntervalMs,
            maxTokenAttempts: session?.maxTokenAttempts ?? DEFAULT_SETTINGS.session.maxTokenAttempts,
            disconnectAfterFailures:
                session?.disconnectAfterFailures ?? DEFAULT_SETTINGS.session.disconnectAfterFailures
        },
        polling: {
            statusInitialIntervalMs:
                polling?.statusInitialIntervalMs ?? DEFAULT_SETTINGS.polling.statusInitialIntervalMs,
            statusIntervalMs: polling?.statusIntervalMs ?? DEFAULT_SETTINGS.polling.statusIntervalMs,
            transportIntervalMs: polling?.transportIntervalMs ?? DEFAULT_SETTINGS.polling.transportIntervalMs,
            transportIdleIntervalMs:
                polling?.transportIdleIntervalMs ?? DEFAULT_SETTINGS.polling.transportIdleIntervalMs
        },
        loop: {
            frameIntervalMs: loop?.frameIntervalMs ?? DEFAULT_SETTINGS.loop.frameIntervalMs,
            periodicIntervalMs: loop?.periodicIntervalMs ?? DEFAULT_SETTINGS.loop.periodicIntervalMs
        }
    };
}

function basePathNormalize(basePath: string): string {
    return basePath.trim().replace(/\/+$/, "");
}

function hostFormat(host: string): string {
    return host.includes(":") && !host.startsWith("[") ? `[${host}]` : host;
}
