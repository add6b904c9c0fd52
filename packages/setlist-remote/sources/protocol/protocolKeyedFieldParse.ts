import { EXTSTATE_TAG } from "./protocolCommands.js";

/**
 * Reads the value of an `EXTSTATE\tnamespace\tkey\tvalue` record.
 * Returns null unless namespace and key match exactly.
 */
export function protocolKeyedFieldParse(fields: readonly string[], namespace: string, key: string): string | null {
    if (fields.length < 4) {
        return null;
    }
    if (fields[0] !== EXTSTATE_TAG || fields[1] !== namespace || fields[2] !== key) {
        return null;
    }
    // Values may themselves contain tabs.
    return fields.slice(3).join("\t");
}
