import { performance } from "node:perf_hooks";
import type {
    BenchmarkResult,
    DeferredBenchmark,
    MemorySample,
    Operation,
    WorkloadConfig,
    RunnerOptions,
} from "./types";
import { LatencyHistogram, MultiHistogram } from "./latency";
import { sleep } from "./utils";

/**
 * Run a benchmark for a single deferred-action implementation
 *
 * @param implName - Name of implementation (for result)
 * @param operations - Pre-generated operation sequence
 */
export async function runBenchmark(
    workload: WorkloadConfig,
    implementation: DeferredBenchmark,
    implName: string,
    operations: Operation[],
    options: RunnerOptions = {}
): Promise<BenchmarkResult> {
    const {
        maxSamples = 10000,
        drainTimeoutMs = 5000,
        verbose = false,
    } = options;

    if (verbose) {
        console.error(`  Running ${implName}...`);
    }

    const multiHistogram = new MultiHistogram(maxSamples);
    const lateness = new LatencyHistogram();
    const memorySamples: MemorySample[] = [];

    // Expected fire time per live entry, moved forward by resets
    const deadlines = new Map<number, number>();
    let fired = 0;
    let cancelled = 0;
    let resets = 0;

    const startTime = Date.now();
    let lastMemSampleTime = -1;

    for (let i = 0; i < operations.length; i++) {
        const op = operations[i];
        const currentTime = Date.now() - startTime;

        if (currentTime - lastMemSampleTime >= 1) {
            const mem = process.memoryUsage();
            memorySamples.push({
                timestamp: currentTime,
                heapUsed: mem.heapUsed,
                heapTotal: mem.heapTotal,
                external: mem.external,
                rss: mem.rss,
            });
            lastMemSampleTime = currentTime;
        }

        const start = process.hrtime.bigint();
        if (op.type === "add") {
            const id = op.target;
            implementation.add(id, () => {
                const deadline = deadlines.get(id);
                if (deadline !== undefined) {
                    lateness.record(Math.max(0, performance.now() - deadline) * 1e6);
                    deadlines.delete(id);
                }
                fired++;
            });
        } else if (op.type === "cancel") {
            if (implementation.cancel(op.target)) {
                deadlines.delete(op.target);
                cancelled++;
            }
        } else if (implementation.reset(op.target)) {
            resets++;
        }
        multiHistogram.record(op.type, process.hrtime.bigint() - start, currentTime);

        // Bookkeeping stays outside the measured span
        if (op.type === "add") {
            deadlines.set(op.target, performance.now() + workload.timeoutMs);
        } else if (op.type === "reset" && deadlines.has(op.target)) {
            deadlines.set(op.target, performance.now() + workload.timeoutMs);
        }

        if ((i + 1) % workload.opsPerBatch === 0) {
            await sleep(workload.batchIntervalMs);
        }
    }

    const durationMs = Date.now() - startTime;

    // Let every remaining entry fire
    const drainStart = Date.now();
    while (implementation.pending() > 0 && Date.now() - drainStart < drainTimeoutMs) {
        await sleep(workload.timeoutMs);
    }
    // Actions may still be queued behind the last timer callback
    await sleep(1);
    const drainMs = Date.now() - drainStart;
    const unfired = implementation.pending();

    implementation.close();

    return {
        implementation: implName,
        workload: workload.name,
        totalOps: operations.length,
        durationMs,
        opsPerSec: (operations.length / Math.max(durationMs, 1)) * 1000,
        drainMs,
        latencies: multiHistogram.getAllStats(),
        samples: multiHistogram.getAllSamples(),
        firing: {
            fired,
            cancelled,
            resets,
            unfired,
            lateness: lateness.stats(),
        },
        memorySamples,
    };
}

/**
 * Determine the winner based on a composite latency score
 *
 * Score = p50 * 0.3 + p99 * 0.7 over all operations.
 */
export function determineWinner(results: BenchmarkResult[]): string | undefined {
    let best: BenchmarkResult | undefined;
    let bestScore = Infinity;

    for (const result of results) {
        const latency = result.latencies.total;
        const score = latency.p50 * 0.3 + latency.p99 * 0.7;

        if (score < bestScore) {
            best = result;
            bestScore = score;
        }
    }

    return best?.implementation;
}
