import type { NodeId } from "./node-store";

/**
 * Handle to one action registered with a TimeoutQueue.
 *
 * A token only ever refers to the logical entry it was issued for: once that
 * entry fires or is cancelled, the slot may be reused, but this token stays
 * invalid.
 */
export interface Token {
    /**
     * Remove the action from the queue. Returns false when it was already
     * cancelled or has already fired.
     */
    cancel(): boolean;

    /**
     * Restart the action's timeout from now, moving it behind every other
     * pending action. Returns false under the same conditions as cancel().
     */
    reset(): boolean;

    /** True while the action is still waiting to fire. */
    readonly pending: boolean;
}

/**
 * Queue-side operations a token is allowed to call.
 * Kept off the queue's public surface so only tokens reach them.
 */
export interface TokenOwner {
    cancelNode(id: NodeId, generation: number): boolean;
    resetNode(id: NodeId, generation: number): boolean;
    isPending(id: NodeId, generation: number): boolean;
}

export class QueueToken implements Token {
    private readonly owner: TokenOwner;
    private readonly id: NodeId;
    private readonly generation: number;

    constructor(owner: TokenOwner, id: NodeId, generation: number) {
        this.owner = owner;
        this.id = id;
        this.generation = generation;
    }

    cancel(): boolean {
        return this.owner.cancelNode(this.id, this.generation);
    }

    reset(): boolean {
        return this.owner.resetNode(this.id, this.generation);
    }

    get pending(): boolean {
        return this.owner.isPending(this.id, this.generation);
    }
}
