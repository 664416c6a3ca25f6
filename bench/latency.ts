import type { LatencyStats, OperationType, OperationLatencies, LatencySample } from "./types";
import { mean } from "./utils";


const EMPTY_STATS: LatencyStats = {
    p05: 0,
    p25: 0,
    p50: 0,
    p75: 0,
    p90: 0,
    p95: 0,
    p99: 0,
    p999: 0,
    max: 0,
    mean: 0,
    count: 0,
};

const OPERATION_TYPES: readonly OperationType[] = ["add", "cancel", "reset"];

/**
 * Raw nanosecond samples with on-demand percentiles.
 */
export class LatencyHistogram {
    private samples: number[] = [];
    private sorted = true;

    record(nanos: number): void {
        this.samples.push(nanos);
        this.sorted = false;
    }

    count(): number {
        return this.samples.length;
    }

    /**
     * @param p - Percentile as a fraction (0.95 for p95)
     */
    percentile(p: number): number {
        if (this.samples.length === 0) return 0;
        this.ensureSorted();

        const index = Math.ceil(p * this.samples.length) - 1;
        const clampedIndex = Math.max(0, Math.min(index, this.samples.length - 1));
        return this.samples[clampedIndex];
    }

    stats(): LatencyStats {
        if (this.samples.length === 0) return { ...EMPTY_STATS };
        this.ensureSorted();

        return {
            p05: this.percentile(0.05),
            p25: this.percentile(0.25),
            p50: this.percentile(0.50),
            p75: this.percentile(0.75),
            p90: this.percentile(0.90),
            p95: this.percentile(0.95),
            p99: this.percentile(0.99),
            p999: this.percentile(0.999),
            max: this.samples[this.samples.length - 1],
            mean: mean(this.samples),
            count: this.samples.length,
        };
    }

    /**
     * Samples in recording order (until the first percentile query sorts them).
     */
    getSamples(): readonly number[] {
        return this.samples;
    }

    private ensureSorted(): void {
        if (this.sorted) return;
        this.samples.sort((a, b) => a - b);
        this.sorted = true;
    }
}

/**
 * Per-operation-type latency tracking
 */
export class MultiHistogram {
    private readonly histograms = new Map<OperationType, LatencyHistogram>();
    private readonly timeline = new Map<OperationType, { timestamp: number; nanos: number }[]>();
    private readonly maxSamplesPerOperation: number;

    constructor(maxSamplesPerOperation: number = 10000) {
        this.maxSamplesPerOperation = maxSamplesPerOperation;
        for (const type of OPERATION_TYPES) {
            this.histograms.set(type, new LatencyHistogram());
            this.timeline.set(type, []);
        }
    }

    /**
     * @param timestamp - Relative time in ms from benchmark start
     */
    record(operation: OperationType, nanos: bigint, timestamp: number): void {
        const value = Number(nanos);
        this.histograms.get(operation)?.record(value);
        this.timeline.get(operation)?.push({ timestamp, nanos: value });
    }

    getStats(operation: OperationType): LatencyStats {
        return this.histograms.get(operation)?.stats() ?? { ...EMPTY_STATS };
    }

    getAllStats(): OperationLatencies {
        const total = new LatencyHistogram();
        for (const histogram of this.histograms.values()) {
            for (const sample of histogram.getSamples()) {
                total.record(sample);
            }
        }

        return {
            add: this.getStats("add"),
            cancel: this.getStats("cancel"),
            reset: this.getStats("reset"),
            total: total.stats(),
        };
    }

    /**
     * Timeline samples, downsampled with MAX aggregation so spikes survive.
     */
    getAllSamples(): LatencySample[] {
        const samples: LatencySample[] = [];
        for (const [operation, points] of this.timeline) {
            const bucketSize = Math.max(1, Math.ceil(points.length / this.maxSamplesPerOperation));

            for (let i = 0; i < points.length; i += bucketSize) {
                let worst = points[i];
                for (let j = i + 1; j < Math.min(i + bucketSize, points.length); j++) {
                    if (points[j].nanos > worst.nanos) {
                        worst = points[j];
                    }
                }
                samples.push({ timestamp: worst.timestamp, nanos: worst.nanos, operation });
            }
        }
        return samples;
    }
}
