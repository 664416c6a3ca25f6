/**
 * Workload configuration parameters
 */
export interface WorkloadConfig {
    name: string;
    description: string;

    totalOps: number;        // Total operations to perform
    timeoutMs: number;       // Shared timeout of every entry
    initialCapacity: number; // Queue arena capacity hint

    // Operation mix (rest are adds)
    cancelPercent: number;   // 0-100
    resetPercent: number;    // 0-100

    // cancel/reset pick a target among the most recent `targetWindow` adds
    targetWindow: number;

    // Pacing: yield to the event loop between batches so entries can fire
    opsPerBatch: number;
    batchIntervalMs: number;

    // Reproducibility
    seed: number;
}

/**
 * Single operation to execute.
 * `target` is the sequence number of the add the operation refers to.
 */
export interface Operation {
    type: OperationType;
    target: number;
}

export type OperationType = "add" | "cancel" | "reset";

/**
 * Raw latency sample (for violin plots / CDFs)
 */
export interface LatencySample {
    timestamp: number;       // Relative time in ms from benchmark start
    nanos: number;
    operation: OperationType;
}

/**
 * Latency statistics (in nanoseconds)
 */
export interface LatencyStats {
    p05: number;
    p25: number;
    p50: number;
    p75: number;
    p90: number;
    p95: number;
    p99: number;
    p999: number;
    max: number;
    mean: number;
    count: number;
}

/**
 * Per-operation latency breakdown
 */
export interface OperationLatencies {
    add: LatencyStats;
    cancel: LatencyStats;
    reset: LatencyStats;
    total: LatencyStats;
}

/**
 * What happened to the scheduled actions
 */
export interface FiringMetrics {
    fired: number;
    cancelled: number;
    resets: number;
    unfired: number;          // still pending when the drain wait gave up
    lateness: LatencyStats;   // fire time minus deadline, nanoseconds
}

/**
 * Memory usage snapshot
 */
export interface MemorySample {
    timestamp: number;      // Relative time in ms from benchmark start
    heapUsed: number;       // Bytes
    heapTotal: number;      // Bytes
    external: number;       // Bytes
    rss: number;            // Bytes (Resident Set Size)
}

/**
 * Result from a single benchmark run
 */
export interface BenchmarkResult {
    implementation: string;
    workload: string;

    // Throughput
    totalOps: number;
    durationMs: number;
    opsPerSec: number;
    drainMs: number;

    latencies: OperationLatencies;
    samples: LatencySample[];

    firing: FiringMetrics;
    memorySamples: MemorySample[];
}

/**
 * Common interface for every deferred-action implementation in benchmarks.
 * Entries are identified by the sequence number of their add.
 */
export interface DeferredBenchmark {
    add(id: number, onFire: () => void): void;
    cancel(id: number): boolean;
    reset(id: number): boolean;
    pending(): number;
    close(): void;
}

/**
 * Full benchmark suite results
 */
export interface BenchmarkSuiteResult {
    workload: WorkloadConfig;
    timestamp: Date;
    results: BenchmarkResult[];
    winner?: string;  // Implementation with best composite latency
}

/**
 * Runner options
 */
export interface RunnerOptions {
    maxSamples?: number;      // Max samples per operation (default: 10000)
    drainTimeoutMs?: number;  // How long to wait for pending actions (default: 5000)
    verbose?: boolean;
}
