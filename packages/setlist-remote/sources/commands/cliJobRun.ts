import type { JobEngine } from "../engine/jobs/jobEngine.js";
import type { JobRequest, JobResult } from "../engine/jobs/jobTypes.js";

type JobRunEngine = Pick<JobEngine, "submit" | "whenIdle" | "drainResults">;

/**
 * Submits one job to a running engine and waits for its result.
 */
export async function cliJobRun<T extends JobRequest["type"]>(
    engine: JobRunEngine,
    request: JobRequest & { type: T }
): Promise<Extract<JobResult, { type: T }>> {
    const jobId = engine.submit(request);
    if (jobId === 0) {
        throw new Error(`Job ${request.type} was not accepted`);
    }
    await engine.whenIdle();
    for (const result of engine.drainResults()) {
        if (result.jobId === jobId && jobResultIs(result, request.type)) {
            return result;
        }
    }
    throw new Error(`Job ${request.type} finished without a result`);
}

function jobResultIs<T extends JobRequest["type"]>(
    result: JobResult,
    type: T
): result is Extract<JobResult, { type: T }> {
    return result.type === type;
}
