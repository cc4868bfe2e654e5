import { getLogger } from "../log.js";

type ShutdownHandler = () => void | Promise<void>;
type ShutdownReason = NodeJS.Signals | "fatal";

const shutdownHandlers = new Map<string, ShutdownHandler[]>();
const shutdownController = new AbortController();
const FORCE_EXIT_MS = 10_000;
let shutdownPromise: Promise<ShutdownReason> | null = null;
let resolveShutdown: ((reason: ShutdownReason) => void) | null = null;
let shutdownRequested: ShutdownReason | null = null;
let shutdownCompletion: Promise<void> | null = null;
let handlersAttached = false;
const logger = getLogger("shutdown");

/**
 * Aborted once shutdown is requested; long waits race against it.
 */
export const shutdownSignal: AbortSignal = shutdownController.signal;

export function onShutdown(name: string, handler: ShutdownHandler): () => void {
    if (shutdownSignal.aborted) {
        void Promise.resolve()
            .then(handler)
            .catch((error: unknown) => {
                logger.warn({ error, handler: name }, "event: Shutdown: late handler failed");
            });
        return () => {};
    }

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

/**
 * Resolves with the signal that stopped the process once every handler finished.
 * Attaches SIGINT and SIGTERM listeners on first call.
 */
export async function awaitShutdown(): Promise<ShutdownReason> {
    if (!shutdownPromise) {
        shutdownPromise = new Promise((resolve) => {
            resolveShutdown = resolve;
            if (!handlersAttached) {
                handlersAttached = true;
                const handler = (signal: NodeJS.Signals) => {
                    logger.info({ signal }, "event: Shutdown: signal received");
                    requestShutdown(signal);
                };
                process.once("SIGINT", handler);
                process.once("SIGTERM", handler);
            }
            if (shutdownRequested) {
                resolveWhenComplete(shutdownRequested);
            }
        });
    }
    return shutdownPromise;
}

export function requestShutdown(reason: ShutdownReason = "SIGTERM"): void {
    if (shutdownRequested) {
        return;
    }
    shutdownRequested = reason;
    shutdownCompletion = triggerShutdown();
    resolveWhenComplete(reason);
}

function resolveWhenComplete(reason: ShutdownReason): void {
    if (!resolveShutdown) {
        return;
    }
    const completion = shutdownCompletion ?? Promise.resolve();
    void completion.then(() => resolveShutdown?.(reason));
}

async function triggerShutdown(): Promise<void> {
    shutdownController.abort();

    const forceExit = setTimeout(() => {
        logger.warn(`event: Shutdown: forcing exit after ${FORCE_EXIT_MS}ms`);
        process.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    const tasks: Promise<void>[] = [];
    for (const [name, handlers] of shutdownHandlers) {
        for (const [index, handler] of [...handlers].entries()) {
            tasks.push(
                Promise.resolve()
                    .then(handler)
                    .catch((error: unknown) => {
                        logger.warn({ error }, `event: Shutdown: handler ${name}[${index + 1}] failed`);
                    })
            );
        }
    }

    if (tasks.length === 0) {
        logger.info("event: Shutdown: no handlers registered");
    } else {
        const startedAt = Date.now();
        logger.info(`event: Shutdown: waiting for ${tasks.length} handler${tasks.length === 1 ? "" : "s"}`);
        await Promise.allSettled(tasks);
        logger.info(`event: Shutdown: handlers completed in ${Date.now() - startedAt}ms`);
    }

    clearTimeout(forceExit);
}
