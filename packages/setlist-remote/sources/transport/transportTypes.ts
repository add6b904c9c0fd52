export type TransportResponse = {
    body: string;
    statusCode: number;
    ok: boolean;
};

/**
 * Sends one request path to the DAW and returns the raw response.
 * Implementations own connect/read timeouts; rejection means the request never completed.
 */
export interface TransportPort {
    request(path: string): Promise<TransportResponse>;
}

export type NetworkStatus = {
    connected: boolean;
    address: string | null;
};

/**
 * Brings the network link up (or checks it) and reports the local address.
 */
export interface NetworkPort {
    connect(): Promise<NetworkStatus>;
}
