import { getLogger } from "../log.js";

type ShutdownHandler = () => void | Promise<void>;
type ShutdownRegistration = {
    name: string;
    handler: ShutdownHandler;
};

export type ShutdownReason = NodeJS.Signals | "requested";

const FORCE_EXIT_MS = 5_000;
const registrations = new Set<ShutdownRegistration>();
let running: Promise<ShutdownReason> | null = null;
let signalsAttached = false;
let finish: (reason: ShutdownReason) => void = () => undefined;
const finished = new Promise<ShutdownReason>((resolve) => {
    finish = resolve;
});
const logger = getLogger("shutdown");

/**
 * Registers a named handler that runs once when the process shuts down.
 * Handlers registered after shutdown started run right away.
 * Returns a function that unregisters the handler.
 */
export function onShutdown(name: string, handler: ShutdownHandler): () => void {
    const registration: ShutdownRegistration = { name, handler };
    if (running) {
        void handlerRun(registration);
        return () => undefined;
    }
    registrations.add(registration);
    return () => {
        registrations.delete(registration);
    };
}

/**
 * Resolves after SIGINT/SIGTERM (or requestShutdown) once every handler has settled.
 */
export function awaitShutdown(): Promise<ShutdownReason> {
    if (!signalsAttached) {
        signalsAttached = true;
        for (const signal of ["SIGINT", "SIGTERM"] as const) {
            process.once(signal, () => {
                void requestShutdown(signal);
            });
        }
    }
    return finished;
}

/**
 * Starts shutdown; later calls return the first run.
 */
export function requestShutdown(reason: ShutdownReason = "requested"): Promise<ShutdownReason> {
    if (!running) {
        running = shutdownRun(reason);
    }
    return running;
}

async function shutdownRun(reason: ShutdownReason): Promise<ShutdownReason> {
    const forceExit = setTimeout(() => {
        logger.warn(`event: Shutdown: forcing exit after ${FORCE_EXIT_MS}ms`);
        process.exit(1);
    }, FORCE_EXIT_MS);
    forceExit.unref();

    const pending = [...registrations];
    registrations.clear();
    logger.info({ reason, handlers: pending.length }, "event: Shutdown: running handlers");

    const startedAt = Date.now();
    await Promise.all(pending.map(handlerRun));
    clearTimeout(forceExit);
    logger.info({ durationMs: Date.now() - startedAt }, "event: Shutdown: completed");

    finish(reason);
    return reason;
}

async function handlerRun(registration: ShutdownRegistration): Promise<void> {
    try {
        await registration.handler();
    } catch (error) {
        logger.warn({ error, handler: registration.name }, "error: Shutdown handler failed");
    }
}
