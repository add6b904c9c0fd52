import { getLogger } from "../log.js";
import type { TransportPort, TransportResponse } from "./transportTypes.js";

const logger = getLogger("transport.http");

export type HttpTransportOptions = {
    origin: string;
    timeoutMs: number;
    fetch?: typeof fetch;
};

/**
 * TransportPort over HTTP GET. The path is appended verbatim to the origin so
 * batched `;`-joined commands reach the server unchanged.
 */
export function httpTransportCreate(options: HttpTransportOptions): TransportPort {
    const origin = options.origin.endsWith("/") ? options.origin.slice(0, -1) : options.origin;
    const fetchImpl = options.fetch ?? fetch;

    return {
        request: async (path: string): Promise<TransportResponse> => {
            const url = `${origin}${path.startsWith("/") ? path : `/${path}`}`;
            logger.trace({ url }, "request: GET");
            const response = await fetchImpl(url, {
                method: "GET",
                signal: AbortSignal.timeout(options.timeoutMs)
            });
            const body = await response.text();
            return {
                body,
                statusCode: response.status,
                ok: response.ok
            };
        }
    };
}
