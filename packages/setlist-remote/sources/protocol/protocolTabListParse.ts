import { z } from "zod";

import { getLogger } from "../log.js";
import type { TabInfo } from "./protocolTypes.js";

const logger = getLogger("protocol.tabs");

const tabEntrySchema = z.object({
    length: z.number(),
    name: z.string(),
    index: z.number().int().nonnegative()
});

const PROJECT_SUFFIXES = [".rpp", ".RPP"];

/**
 * Decodes the JSON tab list published by the setlist script.
 * Expects: `[{"length":n,"name":"...","index":n}, ...]`; bad entries are skipped.
 */
export function protocolTabListParse(jsonText: string): TabInfo[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(jsonText);
    } catch (error) {
        logger.warn({ error }, "error: Tab list is not valid JSON");
        return [];
    }

    if (!Array.isArray(parsed)) {
        logger.warn("error: Tab list is not a JSON array");
        return [];
    }

    const tabs: TabInfo[] = [];
    for (const entry of parsed) {
        const result = tabEntrySchema.safeParse(entry);
        if (!result.success) {
            logger.warn({ issues: result.error.issues.length }, "skip: Tab entry missing required fields");
            continue;
        }
        tabs.push({
            lengthSeconds: result.data.length,
            displayName: projectSuffixStrip(result.data.name),
            index: result.data.index
        });
    }
    logger.debug({ count: tabs.length }, "parse: Tab list decoded");
    return tabs;
}

function projectSuffixStrip(name: string): string {
    const suffix = PROJECT_SUFFIXES.find((candidate) => name.endsWith(candidate));
    return suffix ? name.slice(0, -suffix.length) : name;
}
