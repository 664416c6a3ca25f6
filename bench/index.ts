#!/usr/bin/env node

import { Command } from "commander";
import fs from "node:fs";
import type { BenchmarkResult, BenchmarkSuiteResult, DeferredBenchmark, WorkloadConfig } from "./types";
import { WORKLOADS, generateOperations } from "./workloads";
import {
    TimeoutQueueBenchmark,
    SetTimeoutBenchmark,
    LruCacheBenchmark,
    TTLCacheBenchmark,
} from "./baselines";
import { runBenchmark, determineWinner } from "./runner";
import { formatLatency, formatNumber } from "./utils";

/**
 * Available implementations
 */
const IMPLEMENTATIONS: Record<string, new (config: WorkloadConfig) => DeferredBenchmark> = {
    "timeout-queue": TimeoutQueueBenchmark,
    "set-timeout": SetTimeoutBenchmark,
    "lru-cache": LruCacheBenchmark,
    "ttlcache": TTLCacheBenchmark,
};

interface CliOptions {
    workload?: string;
    implementations: string;
    output?: string;
    ops?: number;
    timeout?: number;
    maxSamples?: number;
    seed?: number;
    quiet: boolean;
}

function parseInteger(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (Number.isNaN(parsed)) {
        throw new Error(`not an integer: ${value}`);
    }
    return parsed;
}

/**
 * Main CLI program
 */
const program = new Command();

program
    .name("bench")
    .description("TimeoutQueue benchmark suite - outputs JSON")
    .version("1.0.0")
    .option("-w, --workload <name>", "Run specific workload (default: all)")
    .option(
        "-i, --implementations <list>",
        "Comma-separated list: timeout-queue,set-timeout,lru-cache,ttlcache (default: all)",
        "timeout-queue,set-timeout,lru-cache,ttlcache"
    )
    .option("-o, --output <file>", "Output file path (default: stdout)")
    .option("--ops <number>", "Override total operations", parseInteger)
    .option("--timeout <ms>", "Override the shared timeout", parseInteger)
    .option("--max-samples <number>", "Max samples per operation for JSON size control (default: 10000)", parseInteger)
    .option("--seed <number>", "Random seed for reproducibility", parseInteger)
    .option("--quiet", "Suppress progress output", false)
    .parse();

const options = program.opts<CliOptions>();

/**
 * Log to stderr (so stdout is clean JSON)
 */
function log(...args: unknown[]): void {
    if (!options.quiet) {
        console.error(...args);
    }
}

function summarize(result: BenchmarkResult): string {
    const { latencies, firing } = result;
    return [
        `${formatNumber(Math.round(result.opsPerSec))} ops/s`,
        `add p99 ${formatLatency(latencies.add.p99)}`,
        `fired ${formatNumber(firing.fired)}`,
        `lateness p99 ${formatLatency(firing.lateness.p99)}`,
    ].join(", ");
}

async function main(): Promise<void> {
    log("TimeoutQueue Benchmark Suite");
    log("");

    const implNames = options.implementations
        .split(",")
        .map((s) => s.trim());

    for (const name of implNames) {
        if (!(name in IMPLEMENTATIONS)) {
            console.error(`Unknown implementation: ${name}`);
            console.error(`   Available: ${Object.keys(IMPLEMENTATIONS).join(", ")}`);
            process.exit(1);
        }
    }

    const workloadsToRun: WorkloadConfig[] = [];

    if (options.workload) {
        const workload = WORKLOADS.get(options.workload);
        if (!workload) {
            console.error(`Unknown workload: ${options.workload}`);
            console.error(`   Available: ${Array.from(WORKLOADS.keys()).join(", ")}`);
            process.exit(1);
        }
        workloadsToRun.push({ ...workload });
    } else {
        workloadsToRun.push(...Array.from(WORKLOADS.values(), (w) => ({ ...w })));
    }

    for (const workload of workloadsToRun) {
        if (options.ops !== undefined) workload.totalOps = options.ops;
        if (options.timeout !== undefined) workload.timeoutMs = options.timeout;
        if (options.seed !== undefined) workload.seed = options.seed;
    }

    const suiteResults: BenchmarkSuiteResult[] = [];
    let completedCount = 0;
    const totalRuns = workloadsToRun.length * implNames.length;

    for (const workload of workloadsToRun) {
        log(`Workload: ${workload.name}`);
        log(`   ${workload.description}`);

        // Generate operations once (same for all implementations)
        const operations = generateOperations(workload);
        const results: BenchmarkResult[] = [];

        for (const implName of implNames) {
            completedCount++;
            log(`   [${completedCount}/${totalRuns}] Running ${implName}...`);

            const ImplClass = IMPLEMENTATIONS[implName];
            const result = await runBenchmark(
                workload,
                new ImplClass(workload),
                implName,
                operations,
                {
                    maxSamples: options.maxSamples ?? 10000,
                    verbose: false,
                }
            );
            log(`      ${summarize(result)}`);
            results.push(result);
        }

        suiteResults.push({
            workload,
            timestamp: new Date(),
            results,
            winner: determineWinner(results),
        });
        log("");
    }

    const output = JSON.stringify(suiteResults, null, 2);

    if (options.output) {
        fs.writeFileSync(options.output, output, "utf-8");
        log(`Results written to ${options.output}`);
    } else {
        console.log(output);
    }

    log("Benchmark complete!");
}

main().catch((error: unknown) => {
    console.error("Error:", error instanceof Error ? error.stack ?? error.message : error);
    process.exit(1);
});
