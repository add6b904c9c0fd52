import { createRequire } from "node:module";

import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogFormat = "pretty" | "json";
export type LogDestination = "stdout" | "stderr" | string;

export type LogConfig = {
    level: string;
    format: LogFormat;
    destination: LogDestination;
    redact: string[];
    service: string;
};

const DEFAULT_REDACT = ["sessionToken", "*.sessionToken"];
const VALID_FORMATS: readonly LogFormat[] = ["pretty", "json"];
const MODULE_WIDTH = 16;
const nodeRequire = createRequire(import.meta.url);

let rootLogger: Logger | null = null;

export function initLogging(overrides: Partial<LogConfig> = {}): Logger {
    if (rootLogger) {
        return rootLogger;
    }
    rootLogger = buildLogger(resolveLogConfig(overrides));
    return rootLogger;
}

export function getLogger(moduleName?: string): Logger {
    const logger = rootLogger ?? initLogging();
    return logger.child({ module: normalizeModule(moduleName) });
}

export function resetLogging(): void {
    rootLogger = null;
}

export function resolveLogConfig(overrides: Partial<LogConfig> = {}): LogConfig {
    const isUnitTest = process.env.VITEST === "true" || process.env.VITEST === "1";
    const isDev = process.env.NODE_ENV !== "production";
    const level =
        overrides.level ??
        envValue("SETLIST_LOG_LEVEL") ??
        envValue("LOG_LEVEL") ??
        (isUnitTest ? "silent" : isDev ? "debug" : "info");
    const destination = overrides.destination ?? envValue("SETLIST_LOG_DEST") ?? "stderr";
    const forceJson = parseBooleanFlag(envValue("SETLIST_LOG_JSON")) ?? false;
    let format =
        overrides.format ??
        parseFormat(envValue("SETLIST_LOG_FORMAT")) ??
        parseFormat(envValue("LOG_FORMAT")) ??
        (forceJson ? "json" : "pretty");

    // Files always get machine-readable lines.
    if (destination !== "stdout" && destination !== "stderr") {
        format = "json";
    }

    return {
        level,
        format,
        destination,
        redact: overrides.redact ?? DEFAULT_REDACT,
        service: overrides.service ?? "setlist-remote"
    };
}

function buildLogger(config: LogConfig): Logger {
    const options: LoggerOptions = {
        level: config.level,
        timestamp: pino.stdTimeFunctions.isoTime,
        base: { service: config.service },
        redact: config.redact.length > 0 ? { paths: config.redact, censor: "[REDACTED]" } : undefined,
        errorKey: "error",
        serializers: {
            error: pino.stdSerializers.err
        }
    };

    if (config.format === "pretty") {
        const prettyFactory = resolvePrettyFactory();
        if (prettyFactory) {
            const prettyStream = prettyFactory({
                colorize: !process.env.NO_COLOR,
                ignore: "pid,hostname,level,service,module,time",
                hideObject: true,
                messageFormat: formatPrettyMessage,
                destination: config.destination === "stdout" ? 1 : 2
            });
            return pino(options, prettyStream);
        }
    }

    const destination = resolveDestination(config.destination);
    return destination ? pino(options, destination) : pino(options);
}

/**
 * Formats one pretty log line as `[hh:mm:ss] [module] message key=value...`.
 */
export function formatPrettyMessage(log: Record<string, unknown>, messageKey: string): string {
    const time = formatLogTime(log.time);
    const module = normalizeModule(typeof log.module === "string" ? log.module : undefined)
        .slice(0, MODULE_WIDTH)
        .padEnd(MODULE_WIDTH, " ");
    const messageValue = log[messageKey];
    const message = messageValue === undefined || messageValue === null ? "" : String(messageValue);
    const details: string[] = [];
    for (const [key, value] of Object.entries(log)) {
        if (key === messageKey || PRETTY_RESERVED_FIELDS.has(key) || value === undefined) {
            continue;
        }
        if (message.includes(`${key}=`)) {
            continue;
        }
        details.push(`${key}=${formatDetailValue(value)}`);
    }
    const tail = details.length > 0 ? ` ${details.join(" ")}` : "";
    return `[${time}] [${module}] ${message}${tail}`;
}

const PRETTY_RESERVED_FIELDS = new Set(["pid", "hostname", "level", "time", "service", "module", "msg"]);

function formatDetailValue(value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (typeof value === "string") {
        return value.length === 0 || /[=\s]/.test(value) ? JSON.stringify(value) : value;
    }
    if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
        return String(value);
    }
    if (typeof value === "object" && "message" in value && typeof value.message === "string") {
        return JSON.stringify(value.message);
    }
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}

function formatLogTime(value: unknown): string {
    const date = typeof value === "number" || typeof value === "string" ? new Date(value) : new Date();
    const safe = Number.isNaN(date.getTime()) ? new Date() : date;
    return [safe.getHours(), safe.getMinutes(), safe.getSeconds()]
        .map((part) => String(part).padStart(2, "0"))
        .join(":");
}

function normalizeModule(moduleName?: string): string {
    const trimmed = moduleName?.trim() ?? "";
    return trimmed.length > 0 ? trimmed : "unknown";
}

function resolveDestination(destination: LogDestination): DestinationStream | undefined {
    if (destination === "stdout") {
        return undefined;
    }
    if (destination === "stderr") {
        return pino.destination(2);
    }
    return pino.destination({ dest: destination, mkdir: true, sync: false });
}

function resolvePrettyFactory(): ((options: Record<string, unknown>) => DestinationStream) | null {
    try {
        return nodeRequire("pino-pretty");
    } catch {
        return null;
    }
}

function parseFormat(value: string | null): LogFormat | null {
    if (!value) {
        return null;
    }
    const normalized = value.toLowerCase().trim();
    return VALID_FORMATS.find((format) => format === normalized) ?? null;
}

function parseBooleanFlag(value: string | null): boolean | null {
    if (!value) {
        return null;
    }
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) {
        return true;
    }
    if (["0", "false", "no", "off"].includes(normalized)) {
        return false;
    }
    return null;
}

function envValue(key: string): string | null {
    const value = process.env[key]?.trim();
    return value && value.length > 0 ? value : null;
}
