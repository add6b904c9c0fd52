import type { Config } from "../config/configTypes.js";
import { JobEngine } from "../engine/jobs/jobEngine.js";
import { httpTransportCreate } from "../transport/httpTransport.js";
import { networkInterfacesCreate } from "../transport/networkInterfaces.js";

const LOOPBACK_HOSTS = new Set(["127.0.0.1", "localhost", "::1"]);

/**
 * Builds a job engine wired to the HTTP transport and host network interfaces.
 */
export function cliEngineCreate(config: Config): JobEngine {
    return new JobEngine({
        transport: httpTransportCreate({ origin: config.dawOrigin, timeoutMs: config.requestTimeoutMs }),
        network: networkInterfacesCreate(undefined, { allowLoopback: LOOPBACK_HOSTS.has(config.daw.host) }),
        basePath: config.daw.basePath,
        queueCapacity: config.engine.queueCapacity,
        resultCapacity: config.engine.resultCapacity
    });
}
