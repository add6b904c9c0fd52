import { getLogger } from "../../../log.js";
import type { ConnectJobResult, JobExecuteContext, JobOutcome } from "../jobTypes.js";

const logger = getLogger("job.connect");

type ConnectOutcome = Extract<JobOutcome, { type: "connect" }>;

export async function jobConnectExecute(context: JobExecuteContext): Promise<ConnectOutcome> {
    try {
        const status = await context.network.connect();
        if (!status.connected) {
            logger.warn("error: Network is not connected");
            return connectOutcome(false, null);
        }
        logger.info({ address: status.address }, "event: Network connected");
        return connectOutcome(true, status.address);
    } catch (error) {
        logger.warn({ error }, "error: Network connect threw");
        return connectOutcome(false, null);
    }
}

function connectOutcome(connected: boolean, address: ConnectJobResult["address"]): ConnectOutcome {
    return {
        type: "connect",
        success: connected,
        failure: connected ? null : "transport",
        connected,
        address
    };
}
