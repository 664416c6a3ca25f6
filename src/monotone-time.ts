import { performance } from "node:perf_hooks";

export interface TimeSource {
    nowMs(): number;
}

export class PerfTimeSource implements TimeSource {
    nowMs(): number {
        return performance.now();
    }
}
