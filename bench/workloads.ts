import type { Operation, WorkloadConfig } from "./types";
import { seededRandom } from "./utils";

const DEFAULT_SEED = 42;

/**
 * Session keep-alive pattern: most entries are reset a few times, some are
 * cancelled (clean logout), the rest time out.
 */
export const KEEPALIVE: WorkloadConfig = {
    name: "keepalive",
    description: "Idle-session timeouts (100ms) with frequent resets and some cancels",
    totalOps: 200_000,
    timeoutMs: 100,
    initialCapacity: 1024,
    cancelPercent: 15,
    resetPercent: 45,
    targetWindow: 2_000,
    opsPerBatch: 1_000,
    batchIntervalMs: 1,
    seed: DEFAULT_SEED,
};

/**
 * Request-timeout pattern: nearly every entry is cancelled shortly after
 * insertion (the request answered in time); few ever fire.
 */
export const REQUEST_TIMEOUT: WorkloadConfig = {
    name: "request-timeout",
    description: "Short timeouts (50ms) cancelled soon after insertion",
    totalOps: 200_000,
    timeoutMs: 50,
    initialCapacity: 1024,
    cancelPercent: 48,
    resetPercent: 0,
    targetWindow: 200,
    opsPerBatch: 1_000,
    batchIntervalMs: 1,
    seed: DEFAULT_SEED,
};

/**
 * Expiration storm: adds only, everything fires.
 */
export const EXPIRATION_STORM: WorkloadConfig = {
    name: "expiration-storm",
    description: "Adds only (20ms timeout) - every entry fires",
    totalOps: 100_000,
    timeoutMs: 20,
    initialCapacity: 1024,
    cancelPercent: 0,
    resetPercent: 0,
    targetWindow: 1,
    opsPerBatch: 2_000,
    batchIntervalMs: 1,
    seed: DEFAULT_SEED,
};

/**
 * Map of all workloads by name
 */
export const WORKLOADS = new Map<string, WorkloadConfig>([
    [KEEPALIVE.name, KEEPALIVE],
    [REQUEST_TIMEOUT.name, REQUEST_TIMEOUT],
    [EXPIRATION_STORM.name, EXPIRATION_STORM],
]);

/**
 * Pre-generate the operation sequence so every implementation replays the same one.
 * Cancels and resets may target entries that already fired or were cancelled.
 */
export function generateOperations(config: WorkloadConfig): Operation[] {
    const ops: Operation[] = [];
    const rng = seededRandom(config.seed);
    let adds = 0;

    for (let i = 0; i < config.totalOps; i++) {
        const roll = rng() * 100;

        if (adds === 0 || roll >= config.cancelPercent + config.resetPercent) {
            ops.push({ type: "add", target: adds++ });
            continue;
        }

        const window = Math.min(config.targetWindow, adds);
        const target = adds - 1 - Math.floor(rng() * window);
        ops.push({ type: roll < config.cancelPercent ? "cancel" : "reset", target });
    }

    return ops;
}
