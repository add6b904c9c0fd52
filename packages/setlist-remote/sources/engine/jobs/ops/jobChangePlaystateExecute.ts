import { protocolCommands, protocolPlayCommand } from "../../../protocol/protocolCommands.js";
import { protocolFieldsSplit } from "../../../protocol/protocolFieldsSplit.js";
import { protocolRecordsSplit } from "../../../protocol/protocolRecordsSplit.js";
import { protocolTransportParse } from "../../../protocol/protocolTransportParse.js";
import { type PlayAction, transportStateEmpty } from "../../../protocol/protocolTypes.js";
import type { JobExecuteContext, JobOutcome } from "../jobTypes.js";
import { jobRequestSend } from "./jobRequestSend.js";

type ChangePlaystateOutcome = Extract<JobOutcome, { type: "changePlaystate" }>;

/**
 * Sends the play/stop opcode and reads the transport back in the same round trip.
 * The opcode produces no output, so the transport is record 0.
 */
export async function jobChangePlaystateExecute(
    context: JobExecuteContext,
    action: PlayAction
): Promise<ChangePlaystateOutcome> {
    const commands = [protocolPlayCommand(action), protocolCommands.transport];
    const response = await jobRequestSend(context, commands, "changePlaystate");
    if (!response.ok) {
        return { type: "changePlaystate", success: false, failure: "transport", transport: transportStateEmpty() };
    }
    const [record] = protocolRecordsSplit(response.body);
    const transport = protocolTransportParse(record === undefined ? [] : protocolFieldsSplit(record));
    return {
        type: "changePlaystate",
        success: transport.success,
        failure: transport.success ? null : "parse",
        transport
    };
}
