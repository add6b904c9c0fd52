import { protocolCommands } from "../../../protocol/protocolCommands.js";
import { protocolFieldsSplit } from "../../../protocol/protocolFieldsSplit.js";
import { protocolTransportParse } from "../../../protocol/protocolTransportParse.js";
import { transportStateEmpty } from "../../../protocol/protocolTypes.js";
import type { JobExecuteContext, JobOutcome } from "../jobTypes.js";
import { jobRequestSend } from "./jobRequestSend.js";

type TransportOutcome = Extract<JobOutcome, { type: "getTransport" }>;

export async function jobTransportExecute(context: JobExecuteContext): Promise<TransportOutcome> {
    const response = await jobRequestSend(context, [protocolCommands.transport], "getTransport");
    if (!response.ok) {
        return { type: "getTransport", success: false, failure: "transport", transport: transportStateEmpty() };
    }
    const transport = protocolTransportParse(protocolFieldsSplit(response.body));
    return {
        type: "getTransport",
        success: transport.success,
        failure: transport.success ? null : "parse",
        transport
    };
}
