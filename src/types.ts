import type { TimeSource } from "./monotone-time";

/**
 * Work deferred by the queue. A returned promise is not awaited; a rejection
 * is reported like a synchronous throw.
 */
export type TimeoutAction = () => void | PromiseLike<void>;

export interface Stats {
    pending: number;
    fired: number;     // by the runner
    flushed: number;   // by flush()
    cancelled: number; // cancel() and clear()
    resets: number;
    failed: number;    // actions that threw or rejected
}

export interface Options {
    timeoutMs: number;

    initialCapacity?: number; // default 16

    /**
     * When true, runner timers do not keep the process alive.
     * Pending actions are then lost if nothing else holds the event loop open.
     */
    unrefTimers?: boolean; // default false

    /**
     * Optional custom time source (primarily for testing).
     * Defaults to performance.now() if not provided.
     */
    time?: TimeSource;

    /**
     * Receives errors thrown (or rejected) by actions. Without it, the error is
     * rethrown from the dispatch callback and surfaces as an uncaught exception.
     */
    onError?: (error: unknown) => void;
}
