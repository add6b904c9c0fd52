/**
 * Splits one response line into its tab-separated fields.
 * Strips a single trailing line break and drops empty trailing fragments.
 */
export function protocolFieldsSplit(line: string): string[] {
    const trimmed = line.replace(/\r?\n$/, "");
    const fields = trimmed.split("\t");
    while (fields.length > 0 && fields[fields.length - 1] === "") {
        fields.pop();
    }
    return fields;
}
