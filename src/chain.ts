import { NodeStore, type NodeId } from "./node-store";
import { NIL } from "./constants";

/**
 * Chain manages the singly-linked head-to-tail order of node ids.
 * Links live in the NodeStore's `next` array; the chain only owns the head.
 * Every id reachable from the head is reachable exactly once.
 */
export class Chain<K> {
    readonly store: NodeStore<K>;
    private headId: NodeId;

    constructor(store: NodeStore<K>) {
        this.store = store;
        this.headId = NIL;
    }

    head(): NodeId {
        return this.headId;
    }

    next(id: NodeId): NodeId {
        return this.store.next[id];
    }

    /**
     * Link a detached node in front of the current head.
     */
    linkHead(id: NodeId): void {
        this.store.next[id] = this.headId;
        this.headId = id;
    }

    /**
     * Detach the node following `prev` (or the head when `prev` is NIL)
     * and return its id. The detached node keeps no link.
     */
    unlinkAfter(prev: NodeId): NodeId {
        const id = prev === NIL ? this.headId : this.store.next[prev];
        if (id === NIL) {
            return NIL;
        }

        if (prev === NIL) {
            this.headId = this.store.next[id];
        } else {
            this.store.next[prev] = this.store.next[id];
        }

        this.store.next[id] = NIL;
        return id;
    }

    /**
     * Link a detached node right after `prev`.
     */
    linkAfter(prev: NodeId, id: NodeId): void {
        this.store.next[id] = this.store.next[prev];
        this.store.next[prev] = id;
    }

    /**
     * Find the node whose successor is `id`.
     * Returns NIL when `id` is the head or not reachable.
     */
    predecessorOf(id: NodeId): NodeId {
        let prev = NIL;
        let current = this.headId;
        while (current !== NIL && current !== id) {
            prev = current;
            current = this.store.next[current];
        }
        return current === NIL ? NIL : prev;
    }

    isEmpty(): boolean {
        return this.headId === NIL;
    }

    /**
     * Ids from head to tail.
     */
    *ids(): IterableIterator<NodeId> {
        for (let id = this.headId; id !== NIL; id = this.store.next[id]) {
            yield id;
        }
    }

    /**
     * Reset the chain to empty state. Slots are not freed.
     */
    reset(): void {
        this.headId = NIL;
    }
}
