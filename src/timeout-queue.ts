import type { Options, Stats, TimeoutAction } from "./types";
import { NodeStore, type NodeId, type NodeStoreDebug } from "./node-store";
import { ActiveList } from "./active-list";
import { PerfTimeSource, type TimeSource } from "./monotone-time";
import { QueueToken, type Token, type TokenOwner } from "./token";
import { spawnRunner, type RunnerHost } from "./runner";
import { DEFAULT_INITIAL_CAPACITY, NIL } from "./constants";

export interface TimeoutQueueDebug extends NodeStoreDebug {
    epoch: number; // 0 = idle
}

function validateTimeoutMs(timeoutMs: number): void {
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
        throw new Error("timeoutMs must be a finite number >= 0");
    }
}

/**
 * Runs each added action once its timeout has elapsed, unless the action's
 * token cancels or resets it first. Every entry shares the queue's timeout.
 *
 * Each public method, and each runner wake-up, runs to completion without
 * yielding, so they never interleave: a cancel that succeeds guarantees the
 * action will not fire, and vice versa. Actions always run later, in their own
 * setImmediate callback.
 */
export class TimeoutQueue {
    // Core components
    private readonly store: NodeStore;
    private readonly active: ActiveList;
    private readonly time: TimeSource;
    private readonly tokenOwner: TokenOwner;
    private readonly runnerHost: RunnerHost;

    // Configuration
    private readonly unrefTimers: boolean;
    private readonly onError?: (error: unknown) => void;
    private timeoutMs: number;

    // Runner bookkeeping: epoch is the id of the one runner allowed to drain
    private epoch = 0;
    private lastEpoch = 0;

    private pendingCount = 0;
    private statsData: {
        fired: number;
        flushed: number;
        cancelled: number;
        resets: number;
        failed: number;
    };

    constructor(options: Options) {
        validateTimeoutMs(options.timeoutMs);
        this.timeoutMs = options.timeoutMs;
        this.unrefTimers = options.unrefTimers ?? false;
        this.onError = options.onError;
        this.time = options.time ?? new PerfTimeSource();

        this.store = new NodeStore({
            initialCap: options.initialCapacity ?? DEFAULT_INITIAL_CAPACITY,
        });
        this.active = new ActiveList(this.store);

        this.statsData = {
            fired: 0,
            flushed: 0,
            cancelled: 0,
            resets: 0,
            failed: 0,
        };

        this.tokenOwner = {
            cancelNode: (id, generation) => this.cancelNode(id, generation),
            resetNode: (id, generation) => this.resetNode(id, generation),
            isPending: (id, generation) => this.store.isLive(id, generation),
        };
        this.runnerHost = {
            wake: (epoch) => this.wake(epoch),
        };
    }

    /**
     * Schedule `action` to run after the queue's timeout.
     */
    add(action: TimeoutAction): Token {
        const deadline = this.time.nowMs() + this.timeoutMs;
        const id = this.store.allocate(action, deadline);
        this.active.append(id);
        this.pendingCount++;

        if (this.epoch === 0) {
            // Nothing can be due sooner than a full timeout from now
            this.startRunner(this.timeoutMs);
        }

        return new QueueToken(this.tokenOwner, id, this.store.generation[id]);
    }

    /**
     * Change the timeout of the queue, including every pending entry.
     * Pending deadlines all move by the same amount, so firing order is kept.
     */
    setTimeout(timeoutMs: number): void {
        validateTimeoutMs(timeoutMs);

        const delta = timeoutMs - this.timeoutMs;
        this.timeoutMs = timeoutMs;
        if (delta === 0) {
            return;
        }

        this.active.forEach((id) => {
            this.store.deadline[id] += delta;
        });

        // The current runner may be sleeping towards a deadline that is now too
        // late. Hand over to a new runner; the old one stands down when it wakes.
        if (delta < 0 && !this.active.isEmpty()) {
            const head = this.active.getHead();
            this.startRunner(this.store.deadline[head] - this.time.nowMs());
        }
    }

    timeout(): number {
        return this.timeoutMs;
    }

    /**
     * Dispatch every pending action now, in firing order.
     * Nothing that was pending before the call fires again afterwards.
     */
    flush(): void {
        let head = this.active.getHead();
        while (head !== NIL) {
            this.dispatch(this.take(head));
            this.statsData.flushed++;
            head = this.active.getHead();
        }
        this.epoch = 0;
    }

    /**
     * Drop every pending action without running it.
     * Returns the number of actions dropped.
     */
    clear(): number {
        let dropped = 0;
        let head = this.active.getHead();
        while (head !== NIL) {
            this.take(head);
            dropped++;
            head = this.active.getHead();
        }
        this.statsData.cancelled += dropped;
        this.epoch = 0;
        return dropped;
    }

    size(): number {
        return this.pendingCount;
    }

    stats(): Stats {
        return {
            pending: this.pendingCount,
            fired: this.statsData.fired,
            flushed: this.statsData.flushed,
            cancelled: this.statsData.cancelled,
            resets: this.statsData.resets,
            failed: this.statsData.failed,
        };
    }

    resetStats(): void {
        this.statsData.fired = 0;
        this.statsData.flushed = 0;
        this.statsData.cancelled = 0;
        this.statsData.resets = 0;
        this.statsData.failed = 0;
    }

    debug(): TimeoutQueueDebug {
        return {
            ...this.store.debug(),
            epoch: this.epoch,
        };
    }

    private cancelNode(id: NodeId, generation: number): boolean {
        if (!this.store.isLive(id, generation)) {
            return false;
        }

        this.take(id);
        this.statsData.cancelled++;
        return true;
    }

    private resetNode(id: NodeId, generation: number): boolean {
        if (!this.store.isLive(id, generation)) {
            return false;
        }

        this.store.deadline[id] = this.time.nowMs() + this.timeoutMs;
        this.active.moveToTail(id);
        this.statsData.resets++;
        return true;
    }

    private startRunner(delayMs: number): void {
        this.epoch = ++this.lastEpoch;
        spawnRunner(this.runnerHost, this.epoch, delayMs, {
            unref: this.unrefTimers,
        });
    }

    /**
     * One runner wake-up: fire everything that is due, then tell the runner
     * how long to sleep, or null to stop.
     */
    private wake(epoch: number): number | null {
        if (epoch !== this.epoch) {
            // Superseded by setTimeout(), or the queue was flushed/cleared
            return null;
        }

        const now = this.time.nowMs();
        let head = this.active.getHead();
        while (head !== NIL && this.store.deadline[head] <= now) {
            this.dispatch(this.take(head));
            this.statsData.fired++;
            head = this.active.getHead();
        }

        if (head === NIL) {
            this.epoch = 0;
            return null;
        }

        return this.store.deadline[head] - now;
    }

    /**
     * Unlink and release a pending node, returning its action.
     */
    private take(id: NodeId): TimeoutAction {
        const action = this.store.actionRef[id];
        if (action === undefined) {
            throw new Error(`pending nodeId=${id} has no action`);
        }

        this.active.unlink(id);
        this.store.release(id);
        this.pendingCount--;
        return action;
    }

    private dispatch(action: TimeoutAction): void {
        setImmediate(() => {
            let result: void | PromiseLike<void>;
            try {
                result = action();
            } catch (error) {
                this.reportFailure(error);
                return;
            }

            if (result !== undefined) {
                // Any thenable, not only native promises
                void Promise.resolve(result).catch((error: unknown) => this.reportFailure(error));
            }
        });
    }

    private reportFailure(error: unknown): void {
        this.statsData.failed++;
        if (this.onError) {
            this.onError(error);
            return;
        }
        throw error;
    }
}

/**
 * Shorthand for `new TimeoutQueue({ timeoutMs, initialCapacity })`.
 */
export function createTimeoutQueue(
    timeoutMs: number,
    initialCapacity: number = DEFAULT_INITIAL_CAPACITY
): TimeoutQueue {
    return new TimeoutQueue({ timeoutMs, initialCapacity });
}
