import type { DaemonState, PlayAction, TabDirection, TransportState } from "../../protocol/protocolTypes.js";
import type { NetworkPort, TransportPort } from "../../transport/transportTypes.js";

/**
 * Job requests the control loop can submit. changeTab and getStatus run the
 * tab-listing script and carry the session token captured at submit time.
 */
export type JobRequest =
    | { type: "connect" }
    | { type: "changeTab"; direction: TabDirection; sessionToken: string }
    | { type: "changePlaystate"; action: PlayAction }
    | { type: "getStatus"; sessionToken: string }
    | { type: "getSessionToken" }
    | { type: "getTransport" };

export type JobType = JobRequest["type"];

export type Job = JobRequest & {
    id: number;
    submittedAt: number;
};

export type JobFailure = "transport" | "parse";

type JobResultBase = {
    jobId: number;
    success: boolean;
    failure: JobFailure | null;
    completedAt: number;
};

export type ConnectJobResult = JobResultBase & { type: "connect"; connected: boolean; address: string | null };
export type ChangeTabJobResult = JobResultBase & {
    type: "changeTab";
    daemon: DaemonState;
    transport: TransportState;
};
export type ChangePlaystateJobResult = JobResultBase & { type: "changePlaystate"; transport: TransportState };
export type StatusJobResult = JobResultBase & { type: "getStatus"; daemon: DaemonState; transport: TransportState };
export type SessionTokenJobResult = JobResultBase & { type: "getSessionToken"; sessionToken: string };
export type TransportJobResult = JobResultBase & { type: "getTransport"; transport: TransportState };

export type JobResult =
    | ConnectJobResult
    | ChangeTabJobResult
    | ChangePlaystateJobResult
    | StatusJobResult
    | SessionTokenJobResult
    | TransportJobResult;

/**
 * Payload of a result before the worker stamps id and completion time.
 */
export type JobOutcome = DistributiveOmit<JobResult, "jobId" | "completedAt">;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export type JobExecuteContext = {
    transport: TransportPort;
    network: NetworkPort;
    basePath: string;
};

export type JobEngineState = "stopped" | "running" | "shutdown";

/**
 * Narrow submit capability handed to policy components.
 * Returns the job id, or 0 when the job was not accepted.
 */
export type JobSubmit = (request: JobRequest) => number;
