import { TimeoutQueue } from "../src/timeout-queue";
import type { Token } from "../src/token";
import { LRUCache } from "lru-cache";
import TTLCache from "@isaacs/ttlcache";
import type { DeferredBenchmark, WorkloadConfig } from "./types";


/**
 * TimeoutQueue: one arena, one background timer
 */
export class TimeoutQueueBenchmark implements DeferredBenchmark {
    private readonly queue: TimeoutQueue;
    private readonly tokens = new Map<number, Token>();

    constructor(config: WorkloadConfig) {
        this.queue = new TimeoutQueue({
            timeoutMs: config.timeoutMs,
            initialCapacity: config.initialCapacity,
        });
    }

    add(id: number, onFire: () => void): void {
        const token = this.queue.add(() => {
            this.tokens.delete(id);
            onFire();
        });
        this.tokens.set(id, token);
    }

    cancel(id: number): boolean {
        const token = this.tokens.get(id);
        if (token === undefined || !token.cancel()) {
            return false;
        }
        this.tokens.delete(id);
        return true;
    }

    reset(id: number): boolean {
        return this.tokens.get(id)?.reset() ?? false;
    }

    pending(): number {
        return this.queue.size();
    }

    close(): void {
        this.queue.clear();
        this.tokens.clear();
    }
}

/**
 * One Node timer per entry; reset re-arms it with refresh()
 */
export class SetTimeoutBenchmark implements DeferredBenchmark {
    private readonly timeoutMs: number;
    private readonly timers = new Map<number, NodeJS.Timeout>();

    constructor(config: WorkloadConfig) {
        this.timeoutMs = config.timeoutMs;
    }

    add(id: number, onFire: () => void): void {
        const timer = setTimeout(() => {
            this.timers.delete(id);
            onFire();
        }, this.timeoutMs);
        this.timers.set(id, timer);
    }

    cancel(id: number): boolean {
        const timer = this.timers.get(id);
        if (timer === undefined) {
            return false;
        }
        clearTimeout(timer);
        this.timers.delete(id);
        return true;
    }

    reset(id: number): boolean {
        const timer = this.timers.get(id);
        if (timer === undefined) {
            return false;
        }
        timer.refresh();
        return true;
    }

    pending(): number {
        return this.timers.size;
    }

    close(): void {
        for (const timer of this.timers.values()) {
            clearTimeout(timer);
        }
        this.timers.clear();
    }
}

/**
 * lru-cache with ttlAutopurge: the action runs from dispose() on expiry
 */
export class LruCacheBenchmark implements DeferredBenchmark {
    private readonly cache: LRUCache<number, () => void>;
    private readonly timeoutMs: number;

    constructor(config: WorkloadConfig) {
        this.timeoutMs = config.timeoutMs;
        this.cache = new LRUCache<number, () => void>({
            max: config.totalOps,
            ttl: config.timeoutMs,
            ttlAutopurge: true,
            ttlResolution: 0,
            allowStale: false,
            dispose: (action, _id, reason) => {
                if (reason === "expire") {
                    action();
                }
            },
        });
    }

    add(id: number, onFire: () => void): void {
        this.cache.set(id, onFire);
    }

    cancel(id: number): boolean {
        return this.cache.delete(id);
    }

    reset(id: number): boolean {
        const action = this.cache.get(id);
        if (action === undefined) {
            return false;
        }
        // Same value: no dispose, but the TTL and purge timer restart
        this.cache.set(id, action, { ttl: this.timeoutMs });
        return true;
    }

    pending(): number {
        return this.cache.size;
    }

    close(): void {
        this.cache.clear();
    }
}

/**
 * @isaacs/ttlcache: the action runs from dispose() when an entry goes stale
 */
export class TTLCacheBenchmark implements DeferredBenchmark {
    private readonly cache: TTLCache<number, () => void>;

    constructor(config: WorkloadConfig) {
        this.cache = new TTLCache<number, () => void>({
            ttl: config.timeoutMs,
            dispose: (action, _id, reason) => {
                if (reason === "stale") {
                    action();
                }
            },
        });
    }

    add(id: number, onFire: () => void): void {
        this.cache.set(id, onFire);
    }

    cancel(id: number): boolean {
        return this.cache.delete(id);
    }

    reset(id: number): boolean {
        if (!this.cache.has(id)) {
            return false;
        }
        this.cache.setTTL(id);
        return true;
    }

    pending(): number {
        return this.cache.size;
    }

    close(): void {
        this.cache.clear();
    }
}
