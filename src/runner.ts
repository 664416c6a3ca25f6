import { TIMER_MAX_MS } from "./constants";

/**
 * What a runner drives. `wake` runs one critical section for the runner that
 * owns `epoch` and returns how long to sleep before the next one, or null
 * when that runner must stop (queue went idle, or another runner took over).
 */
export interface RunnerHost {
    wake(epoch: number): number | null;
}

export interface RunnerOptions {
    unref: boolean;
}

/**
 * Start a background runner tagged with `epoch`, first waking after `delayMs`.
 *
 * A runner is never stopped from outside. When it is superseded it simply
 * finds out on its next wake (the host compares epochs) and does not re-arm.
 */
export function spawnRunner(
    host: RunnerHost,
    epoch: number,
    delayMs: number,
    options: RunnerOptions
): void {
    const arm = (ms: number): void => {
        // A wake before the deadline just sleeps again for what is left
        const timer: NodeJS.Timeout = setTimeout(onWake, Math.min(Math.max(0, ms), TIMER_MAX_MS));
        if (options.unref) {
            timer.unref();
        }
    };

    const onWake = (): void => {
        const next = host.wake(epoch);
        if (next !== null) {
            arm(next);
        }
    };

    arm(delayMs);
}
