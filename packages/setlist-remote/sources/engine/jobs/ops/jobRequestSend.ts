import { getLogger } from "../../../log.js";
import { protocolRequestPathBuild } from "../../../protocol/protocolRequestPathBuild.js";
import type { JobExecuteContext } from "../jobTypes.js";

const logger = getLogger("job.request");

export type JobRequestSendResult = { ok: true; body: string } | { ok: false };

/**
 * Sends a command batch through the transport port.
 * Non-2xx statuses and rejected requests both collapse to { ok: false }.
 */
export async function jobRequestSend(
    context: JobExecuteContext,
    commands: readonly string[],
    label: string
): Promise<JobRequestSendResult> {
    const path = protocolRequestPathBuild(commands, context.basePath);
    try {
        const response = await context.transport.request(path);
        if (!response.ok) {
            logger.warn({ job: label, statusCode: response.statusCode }, "error: Request failed");
            return { ok: false };
        }
        return { ok: true, body: response.body };
    } catch (error) {
        logger.warn({ job: label, error }, "error: Request did not complete");
        return { ok: false };
    }
}
