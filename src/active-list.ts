import { NodeStore, type NodeId } from "./node-store";
import { NIL } from "./constants";

/**
 * ActiveList is the doubly-linked list of pending node IDs in firing order.
 * Uses the NodeStore's next and prev arrays for O(1) operations.
 *
 * Every entry is appended at the tail with deadline = now + timeout, so as long
 * as the timeout is shared, head-to-tail order is also deadline order.
 */
export class ActiveList {
    private readonly store: NodeStore;
    private head: NodeId;
    private tail: NodeId;

    constructor(store: NodeStore) {
        this.store = store;
        this.head = NIL;
        this.tail = NIL;
    }

    /**
     * Link a node at the tail (last to fire).
     */
    append(id: NodeId): void {
        const oldTail = this.tail;

        this.store.prev[id] = oldTail;
        this.store.next[id] = NIL;

        if (oldTail !== NIL) {
            this.store.next[oldTail] = id;
        } else {
            // List was empty, this is also the head
            this.head = id;
        }

        this.tail = id;
    }

    /**
     * Remove a node from the list.
     */
    unlink(id: NodeId): void {
        const prev = this.store.prev[id];
        const next = this.store.next[id];

        if (prev !== NIL) {
            this.store.next[prev] = next;
        } else {
            this.head = next;
        }

        if (next !== NIL) {
            this.store.prev[next] = prev;
        } else {
            this.tail = prev;
        }

        this.store.next[id] = NIL;
        this.store.prev[id] = NIL;
    }

    /**
     * Move a node behind every other pending node.
     */
    moveToTail(id: NodeId): void {
        if (this.tail === id) {
            return;
        }

        this.unlink(id);
        this.append(id);
    }

    /**
     * Get the head (next to fire) node ID, or NIL when empty.
     */
    getHead(): NodeId {
        return this.head;
    }

    isEmpty(): boolean {
        return this.head === NIL;
    }

    /**
     * Visit every node front-to-back. `fn` may unlink the node it is given.
     */
    forEach(fn: (id: NodeId) => void): void {
        let cursor = this.head;
        while (cursor !== NIL) {
            const id = cursor;
            cursor = this.store.next[id];
            fn(id);
        }
    }
}
