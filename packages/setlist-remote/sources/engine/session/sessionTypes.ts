export type SessionState = "disconnected" | "connectedNoToken" | "connectedHasToken";

export type SessionOptions = {
    connectRetryIntervalMs: number;
    tokenRetryIntervalMs: number;
    maxTokenAttempts: number;
    disconnectAfterFailures: number;
};

export const SESSION_DEFAULTS: SessionOptions = {
    connectRetryIntervalMs: 10_000,
    tokenRetryIntervalMs: 5_000,
    maxTokenAttempts: 5,
    disconnectAfterFailures: 3
};
