import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { spawnRunner, type RunnerHost } from "../src/runner";
import { TIMER_MAX_MS } from "../src/constants";

/**
 * Host that answers wake-ups from a fixed script and records when they happened.
 */
class ScriptedHost implements RunnerHost {
    public readonly wakes: Array<{ epoch: number; at: number }> = [];
    private readonly replies: Array<number | null>;
    private readonly start = Date.now();

    constructor(replies: Array<number | null>) {
        this.replies = replies;
    }

    wake(epoch: number): number | null {
        this.wakes.push({ epoch, at: Date.now() - this.start });
        return this.replies.shift() ?? null;
    }
}

describe("spawnRunner", () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it("should first wake after the initial delay", () => {
        const host = new ScriptedHost([null]);
        spawnRunner(host, 1, 50, { unref: false });

        vi.advanceTimersByTime(49);
        expect(host.wakes).toEqual([]);

        vi.advanceTimersByTime(1);
        expect(host.wakes).toEqual([{ epoch: 1, at: 50 }]);
    });

    it("should sleep for whatever the host returns until it returns null", () => {
        const host = new ScriptedHost([20, 5, null]);
        spawnRunner(host, 3, 10, { unref: false });

        vi.advanceTimersByTime(1000);

        expect(host.wakes).toEqual([
            { epoch: 3, at: 10 },
            { epoch: 3, at: 30 },
            { epoch: 3, at: 35 },
        ]);
        expect(vi.getTimerCount()).toBe(0);
    });

    it("should clamp negative delays to zero", () => {
        const host = new ScriptedHost([-5, null]);
        spawnRunner(host, 1, -10, { unref: false });

        vi.advanceTimersByTime(5);

        expect(host.wakes).toHaveLength(2);
        expect(host.wakes[0]).toEqual({ epoch: 1, at: 0 });
        expect(host.wakes[1].at).toBeLessThanOrEqual(1);
    });

    it("should cap delays at the longest timer Node accepts", () => {
        const host = new ScriptedHost([5, null]);
        spawnRunner(host, 1, 2 ** 32, { unref: false });

        vi.advanceTimersByTime(5);
        expect(host.wakes).toEqual([]);

        vi.advanceTimersByTime(TIMER_MAX_MS - 5);
        expect(host.wakes).toEqual([{ epoch: 1, at: TIMER_MAX_MS }]);

        vi.advanceTimersByTime(5);
        expect(host.wakes).toEqual([
            { epoch: 1, at: TIMER_MAX_MS },
            { epoch: 1, at: TIMER_MAX_MS + 5 },
        ]);
    });

    it("should keep capping when the host asks for another long sleep", () => {
        const host = new ScriptedHost([2 ** 32, null]);
        spawnRunner(host, 1, TIMER_MAX_MS, { unref: false });

        vi.advanceTimersByTime(TIMER_MAX_MS + 10);
        expect(host.wakes).toEqual([{ epoch: 1, at: TIMER_MAX_MS }]);

        vi.advanceTimersByTime(TIMER_MAX_MS);
        expect(host.wakes).toEqual([
            { epoch: 1, at: TIMER_MAX_MS },
            { epoch: 1, at: 2 * TIMER_MAX_MS },
        ]);
        expect(vi.getTimerCount()).toBe(0);
    });

    it("should keep independent runners apart", () => {
        const host = new ScriptedHost([null, null]);
        spawnRunner(host, 1, 30, { unref: true });
        spawnRunner(host, 2, 10, { unref: true });

        vi.advanceTimersByTime(30);

        expect(host.wakes).toEqual([
            { epoch: 2, at: 10 },
            { epoch: 1, at: 30 },
        ]);
    });
});

describe("spawnRunner timer references", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it.each([
        { unref: true, hasRef: false },
        { unref: false, hasRef: true },
    ])("should leave hasRef() $hasRef when unref is $unref", ({ unref, hasRef }) => {
        const spy = vi.spyOn(globalThis, "setTimeout");
        spawnRunner(new ScriptedHost([null]), 1, 60_000, { unref });

        expect(spy).toHaveBeenCalledTimes(1);
        const timer: NodeJS.Timeout = spy.mock.results[0].value;
        expect(timer.hasRef()).toBe(hasRef);

        clearTimeout(timer);
    });
});
