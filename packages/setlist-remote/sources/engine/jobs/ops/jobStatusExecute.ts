import { protocolStatusCommands, protocolTabCommand } from "../../../protocol/protocolCommands.js";
import { protocolStatusParse } from "../../../protocol/protocolStatusParse.js";
import { type TabDirection, daemonStateEmpty, transportStateEmpty } from "../../../protocol/protocolTypes.js";
import type { JobExecuteContext, JobOutcome } from "../jobTypes.js";
import { jobRequestSend } from "./jobRequestSend.js";

type StatusOutcome = Extract<JobOutcome, { type: "getStatus" }>;
type ChangeTabOutcome = Extract<JobOutcome, { type: "changeTab" }>;

export async function jobStatusExecute(context: JobExecuteContext, sessionToken: string): Promise<StatusOutcome> {
    const status = await statusFetch(context, protocolStatusCommands(sessionToken), "getStatus");
    return { type: "getStatus", ...status };
}

/**
 * Switches tab and refreshes the full status in one batch.
 */
export async function jobChangeTabExecute(
    context: JobExecuteContext,
    direction: TabDirection,
    sessionToken: string
): Promise<ChangeTabOutcome> {
    const commands = [protocolTabCommand(direction), ...protocolStatusCommands(sessionToken)];
    const status = await statusFetch(context, commands, "changeTab");
    return { type: "changeTab", ...status };
}

async function statusFetch(
    context: JobExecuteContext,
    commands: string[],
    label: string
): Promise<Omit<StatusOutcome, "type">> {
    const response = await jobRequestSend(context, commands, label);
    if (!response.ok) {
        return {
            success: false,
            failure: "transport",
            daemon: daemonStateEmpty(),
            transport: transportStateEmpty()
        };
    }
    const { daemon, transport } = protocolStatusParse(response.body);
    const success = daemon.success && transport.success;
    return {
        success,
        failure: success ? null : "parse",
        daemon,
        transport
    };
}
