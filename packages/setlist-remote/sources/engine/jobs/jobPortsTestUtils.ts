import type { NetworkPort, NetworkStatus, TransportPort, TransportResponse } from "../../transport/transportTypes.js";

export type RecordingTransport = TransportPort & {
    paths: string[];
};

/**
 * Transport fake that records request paths and answers through handler.
 */
export function transportRecording(
    handler: (path: string) => TransportResponse | Promise<TransportResponse>
): RecordingTransport {
    const paths: string[] = [];
    return {
        paths,
        request: async (path: string) => {
            paths.push(path);
            return handler(path);
        }
    };
}

export function responseOk(body: string): TransportResponse {
    return { body, statusCode: 200, ok: true };
}

export function responseStatus(statusCode: number): TransportResponse {
    return { body: "", statusCode, ok: false };
}

export function networkFixed(status: NetworkStatus): NetworkPort {
    return {
        connect: async () => status
    };
}

export type Deferred<T> = {
    promise: Promise<T>;
    resolve: (value: T) => void;
};

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => {};
    const promise = new Promise<T>((done) => {
        resolve = done;
    });
    return { promise, resolve };
}
