import { getLogger } from "../log.js";

type ShutdownHandler = () => void | Promise<void>;
export type ShutdownReason = NodeJS.Signals | "quit" | "fatal";

const FORCE_EXIT_MS = 3_000;
const logger = getLogger("shutdown");
const shutdownHandlers = new Map<string, ShutdownHandler[]>();
const reasonWaiters: ((reason: ShutdownReason) => void)[] = [];

let requestedReason: ShutdownReason | null = null;
let completion: Promise<void> | null = null;
let signalsAttached = false;

/**
 * Registers a named handler that runs once when shutdown is requested.
 * Returns an unregister function.
 */
export function onShutdown(name: string, handler: ShutdownHandler): () => void {
    const handlers = shutdownHandlers.get(name) ?? [];
    handlers.push(handler);
    shutdownHandlers.set(name, handlers);

    return () => {
        const list = shutdownHandlers.get(name);
        if (!list) {
            return;
        }
        const index = list.indexOf(handler);
        if (index !== -1) {
            list.splice(index, 1);
        }
        if (list.length === 0) {
            shutdownHandlers.delete(name);
        }
    };
}

export function isShutdown(): boolean {
    return requestedReason !== null;
}

/**
 * Resolves with the reason once shutdown was requested and every handler settled.
 * Attaches SIGINT and SIGTERM listeners on first call.
 */
export async function awaitShutdown(): Promise<ShutdownReason> {
    if (!signalsAttached) {
        signalsAttached = true;
        process.once("SIGINT", () => requestShutdown("SIGINT"));
        process.once("SIGTERM", () => requestShutdown("SIGTERM"));
    }
    const reason = await shutdownRequested();
    await completion;
    return reason;
}

export function requestShutdown(reason: ShutdownReason = "SIGTERM"): void {
    if (requestedReason) {
        return;
    }
    requestedReason = reason;
    completion = handlersRun(reason);
    for (const waiter of reasonWaiters.splice(0)) {
        waiter(reason);
    }
}

function shutdownRequested(): Promise<ShutdownReason> {
    if (requestedReason) {
        return Promise.resolve(requestedReason);
    }
    return new Promise((resolve) => {
        reasonWaiters.push(resolve);
    });
}

async function handlersRun(reason: ShutdownReason): Promise<void> {
    const forceExit = setTimeout(() => {
        logger.warn({ reason, timeoutMs: FORCE_EXIT_MS }, "event: Shutdown handlers timed out, forcing exit");
        process.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    const tasks: Promise<void>[] = [];
    for (const [name, handlers] of shutdownHandlers) {
        for (const handler of [...handlers]) {
            tasks.push(
                Promise.resolve()
                    .then(() => handler())
                    .catch((error: unknown) => {
                        logger.warn({ error, name }, "event: Shutdown handler failed");
                    })
            );
        }
    }
    logger.info({ reason, handlers: tasks.length }, "event: Shutdown started");

    const startedAt = Date.now();
    await Promise.all(tasks);
    clearTimeout(forceExit);
    logger.info({ elapsedMs: Date.now() - startedAt }, "event: Shutdown completed");
}
