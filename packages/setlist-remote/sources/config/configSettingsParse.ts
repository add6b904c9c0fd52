import { z } from "zod";

import type { SettingsConfig } from "../settings.js";

const positiveInt = z.number().int().positive();
const intervalMs = z.number().nonnegative();

const settingsSchema = z
    .object({
        daw: z
            .object({
                host: z.string().min(1).optional(),
                port: z.number().int().min(1).max(65_535).optional(),
                basePath: z
                    .string()
                    .refine((value) => value.startsWith("/"), "daw.basePath must start with /")
                    .optional()
            })
            .passthrough()
            .optional(),
        requestTimeoutMs: positiveInt.optional(),
        engine: z
            .object({
                queueCapacity: positiveInt.optional(),
                resultCapacity: positiveInt.optional()
            })
            .passthrough()
            .optional(),
        session: z
            .object({
                connectRetryIntervalMs: intervalMs.optional(),
                tokenRetryIntervalMs: intervalMs.optional(),
                maxTokenAttempts: z.number().int().nonnegative().optional(),
                disconnectAfterFailures: positiveInt.optional()
            })
            .passthrough()
            .optional(),
        polling: z
            .object({
                statusInitialIntervalMs: intervalMs.optional(),
                statusIntervalMs: intervalMs.optional(),
                transportIntervalMs: intervalMs.optional(),
                transportIdleIntervalMs: intervalMs.optional()
            })
            .passthrough()
            .optional(),
        loop: z
            .object({
                frameIntervalMs: z.number().positive().optional(),
                periodicIntervalMs: intervalMs.optional()
            })
            .passthrough()
            .optional()
    })
    .passthrough();

/**
 * Parses raw settings data into a validated SettingsConfig.
 * Expects: raw is JSON-compatible; throws listing every invalid field otherwise.
 */
export function configSettingsParse(raw: unknown): SettingsConfig {
    const result = settingsSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => {
            const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
            return `${at}: ${issue.message}`;
        });
        throw new Error(`Invalid settings: ${issues.join("; ")}`);
    }
    return result.data;
}
