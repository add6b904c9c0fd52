import { getLogger } from "../../../log.js";
import { daemonStateEmpty, transportStateEmpty } from "../../../protocol/protocolTypes.js";
import type { Job, JobExecuteContext, JobOutcome } from "../jobTypes.js";
import { jobChangePlaystateExecute } from "./jobChangePlaystateExecute.js";
import { jobConnectExecute } from "./jobConnectExecute.js";
import { jobSessionTokenExecute } from "./jobSessionTokenExecute.js";
import { jobChangeTabExecute, jobStatusExecute } from "./jobStatusExecute.js";
import { jobTransportExecute } from "./jobTransportExecute.js";

const logger = getLogger("job.execute");

/**
 * Runs one job against the ports. Never rejects: unexpected errors become
 * an unsuccessful outcome of the job's own kind.
 */
export async function jobExecute(job: Job, context: JobExecuteContext): Promise<JobOutcome> {
    try {
        return await jobDispatch(job, context);
    } catch (error) {
        logger.error({ jobId: job.id, type: job.type, error }, "error: Job execution threw");
        return jobOutcomeFailed(job);
    }
}

function jobDispatch(job: Job, context: JobExecuteContext): Promise<JobOutcome> {
    switch (job.type) {
        case "connect":
            return jobConnectExecute(context);
        case "changeTab":
            return jobChangeTabExecute(context, job.direction, job.sessionToken);
        case "changePlaystate":
            return jobChangePlaystateExecute(context, job.action);
        case "getStatus":
            return jobStatusExecute(context, job.sessionToken);
        case "getSessionToken":
            return jobSessionTokenExecute(context);
        case "getTransport":
            return jobTransportExecute(context);
    }
}

export function jobOutcomeFailed(job: Job): JobOutcome {
    const base = { success: false, failure: "transport" } as const;
    switch (job.type) {
        case "connect":
            return { ...base, type: "connect", connected: false, address: null };
        case "changeTab":
            return { ...base, type: "changeTab", daemon: daemonStateEmpty(), transport: transportStateEmpty() };
        case "getStatus":
            return { ...base, type: "getStatus", daemon: daemonStateEmpty(), transport: transportStateEmpty() };
        case "changePlaystate":
            return { ...base, type: "changePlaystate", transport: transportStateEmpty() };
        case "getSessionToken":
            return { ...base, type: "getSessionToken", sessionToken: "" };
        case "getTransport":
            return { ...base, type: "getTransport", transport: transportStateEmpty() };
    }
}
