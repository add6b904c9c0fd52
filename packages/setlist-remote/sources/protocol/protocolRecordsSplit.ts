/**
 * Splits a batched response body into its non-empty lines.
 * The nth record belongs to the nth output-producing command of the batch;
 * SET commands and script runs contribute nothing.
 */
export function protocolRecordsSplit(body: string): string[] {
    const records: string[] = [];
    for (const raw of body.split("\n")) {
        const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;
        if (line.length > 0) {
            records.push(line);
        }
    }
    return records;
}
