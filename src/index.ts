export { TimeoutQueue, createTimeoutQueue } from "./timeout-queue";
export type { TimeoutQueueDebug } from "./timeout-queue";
export type { Token } from "./token";
export type { Options, Stats, TimeoutAction } from "./types";
export { PerfTimeSource } from "./monotone-time";
export type { TimeSource } from "./monotone-time";
