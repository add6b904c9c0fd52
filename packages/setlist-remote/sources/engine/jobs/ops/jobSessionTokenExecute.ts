import { getLogger } from "../../../log.js";
import { PROTOCOL_NAMESPACE, SESSION_TOKEN_KEY, protocolCommands } from "../../../protocol/protocolCommands.js";
import { protocolFieldsSplit } from "../../../protocol/protocolFieldsSplit.js";
import { protocolKeyedFieldParse } from "../../../protocol/protocolKeyedFieldParse.js";
import type { JobExecuteContext, JobOutcome } from "../jobTypes.js";
import { jobRequestSend } from "./jobRequestSend.js";

const logger = getLogger("job.token");

type SessionTokenOutcome = Extract<JobOutcome, { type: "getSessionToken" }>;

export async function jobSessionTokenExecute(context: JobExecuteContext): Promise<SessionTokenOutcome> {
    const response = await jobRequestSend(context, [protocolCommands.getSessionToken], "getSessionToken");
    if (!response.ok) {
        return { type: "getSessionToken", success: false, failure: "transport", sessionToken: "" };
    }
    const value = protocolKeyedFieldParse(protocolFieldsSplit(response.body), PROTOCOL_NAMESPACE, SESSION_TOKEN_KEY);
    const sessionToken = value?.trim() ?? "";
    if (sessionToken.length === 0) {
        logger.warn("error: Session token response has no value");
        return { type: "getSessionToken", success: false, failure: "parse", sessionToken: "" };
    }
    return { type: "getSessionToken", success: true, failure: null, sessionToken };
}
