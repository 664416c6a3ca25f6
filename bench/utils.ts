/**
 * Seeded random number generator (Mulberry32)
 * Returns numbers in [0, 1)
 *
 * @param seed - Integer seed value
 * @returns Function that generates next random number
 */
export function seededRandom(seed: number): () => number {
    return function() {
        seed |= 0;
        seed = seed + 0x6D2B79F5 | 0;
        let t = Math.imul(seed ^ seed >>> 15, 1 | seed);
        t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
        return ((t ^ t >>> 14) >>> 0) / 4294967296;
    };
}

/**
 * Format a number with thousand separators (e.g. "125,430")
 */
export function formatNumber(n: number): string {
    return n.toLocaleString('en-US');
}

/**
 * Format latency in appropriate unit (ns, μs, or ms)
 * @param nanos - Latency in nanoseconds
 */
export function formatLatency(nanos: number): string {
    if (nanos < 1000) {
        return `${nanos.toFixed(0)} ns`;
    } else if (nanos < 1_000_000) {
        return `${(nanos / 1000).toFixed(1)} μs`;
    } else {
        return `${(nanos / 1_000_000).toFixed(2)} ms`;
    }
}

export function mean(values: number[]): number {
    if (values.length === 0) return 0;
    const sum = values.reduce((acc, val) => acc + val, 0);
    return sum / values.length;
}

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}
