import { NIL } from "./constants";
import type { TimeoutAction } from "./types";

export type NodeId = number;

export interface NodeStoreDebug {
    cap: number;
    sizeAllocated: number;
    freeCount: number;
}

/**
 * NodeStore = SoA storage + node allocator + free list + growth.
 *
 * Conventions:
 * - nodeId: integer in [0, sizeAllocated-1]
 * - free slot: actionRef[id] === undefined (source of truth)
 * - free slots are chained through next[], starting at freeHead
 * - list pointers: -1 means null pointer
 * - generation[id] is bumped on every release and survives reuse
 */
export class NodeStore {
    private cap: number;
    private sizeAllocated: number; // next fresh id
    private freeHead: NodeId;
    private freeCount: number;

    public readonly actionRef: Array<TimeoutAction | undefined>;

    public deadline: Float64Array;
    public generation: Uint32Array;
    public next: Int32Array;
    public prev: Int32Array;

    constructor(opts: { initialCap: number }) {
        const { initialCap } = opts;
        if (!Number.isInteger(initialCap) || initialCap < 0) {
            throw new Error("initialCap must be a non-negative integer");
        }

        this.cap = initialCap;
        this.sizeAllocated = 0;
        this.freeHead = NIL;
        this.freeCount = 0;

        this.actionRef = new Array<TimeoutAction | undefined>(this.cap);

        this.deadline = new Float64Array(this.cap);
        this.generation = new Uint32Array(this.cap);
        this.next = new Int32Array(this.cap).fill(NIL);
        this.prev = new Int32Array(this.cap).fill(NIL);
    }

    debug(): NodeStoreDebug {
        return {
            cap: this.cap,
            sizeAllocated: this.sizeAllocated,
            freeCount: this.freeCount,
        };
    }

    /**
     * Take a slot for `action`, reusing the most recently released one if any.
     * A reused slot keeps its generation.
     */
    allocate(action: TimeoutAction, deadline: number): NodeId {
        let id: NodeId;

        if (this.freeHead !== NIL) {
            id = this.freeHead;
            this.freeHead = this.next[id];
            this.freeCount--;
        } else {
            id = this.sizeAllocated++;
            if (id >= this.cap) {
                this.ensureCapacity(id + 1);
            }
        }

        this.actionRef[id] = action;
        this.deadline[id] = deadline;
        this.next[id] = NIL;
        this.prev[id] = NIL;
        return id;
    }

    /**
     * Return a slot to the free list and invalidate every handle to it.
     * Throws on double-release.
     */
    release(id: NodeId): void {
        if (!Number.isInteger(id) || id < 0 || id >= this.sizeAllocated) {
            throw new Error(`invalid nodeId: ${id}`);
        }
        if (this.actionRef[id] === undefined) {
            throw new Error(`double-release detected for nodeId=${id}`);
        }

        this.actionRef[id] = undefined;
        this.deadline[id] = 0;
        this.generation[id] = (this.generation[id] + 1) >>> 0;

        this.prev[id] = NIL;
        this.next[id] = this.freeHead;
        this.freeHead = id;
        this.freeCount++;
    }

    /**
     * True when `id` is occupied by the same logical entry that `generation` was taken from.
     */
    isLive(id: NodeId, generation: number): boolean {
        if (!Number.isInteger(id) || id < 0 || id >= this.sizeAllocated) {
            return false;
        }
        return this.actionRef[id] !== undefined && this.generation[id] === generation;
    }

    /**
     * Growth strategy: doubling. Copies typed arrays.
     */
    private ensureCapacity(required: number): void {
        if (required <= this.cap) return;

        let newCap = Math.max(this.cap, 1);
        while (newCap < required) {
            newCap *= 2;
        }

        this.actionRef.length = newCap;

        const oldDeadline = this.deadline;
        this.deadline = new Float64Array(newCap);
        this.deadline.set(oldDeadline);

        const oldGeneration = this.generation;
        this.generation = new Uint32Array(newCap);
        this.generation.set(oldGeneration);

        const oldNext = this.next;
        const oldPrev = this.prev;
        this.next = new Int32Array(newCap).fill(NIL);
        this.prev = new Int32Array(newCap).fill(NIL);
        this.next.set(oldNext);
        this.prev.set(oldPrev);

        this.cap = newCap;
    }
}
