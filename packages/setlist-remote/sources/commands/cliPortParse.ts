/**
 * Parses a --port option value.
 */
export function cliPortParse(value: string): number {
    const trimmed = value.trim();
    const port = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
    if (!Number.isInteger(port) || port < 1 || port > 65_535) {
        throw new Error(`Invalid port: ${value}`);
    }
    return port;
}
