import { MAX_CAPACITY, NIL } from "./constants";

export type NodeId = number;

export interface NodeStoreDebug {
    cap: number;
    sizeAllocated: number;
    freeCount: number;
}

/**
 * NodeStore = SoA storage for chain nodes + id allocator + free list + growth.
 *
 * Conventions:
 * - nodeId: integer in [0, cap-1]
 * - free slot: keyRef[id] === undefined (source of truth)
 * - next[id] === NIL means "end of chain" (or unlinked)
 */
export class NodeStore<K> {
    private readonly maxNodes: number;
    private cap: number;
    private sizeAllocated: number; // next fresh id
    private freeList: Int32Array; // LIFO stack of free ids, never longer than cap
    private freeCount: number;

    public readonly keyRef: Array<K | undefined>;

    public next: Int32Array;
    public accessCount: Float64Array;
    public lastAccessed: Float64Array;
    public insertedAt: Float64Array;

    constructor(opts: { maxNodes: number; initialCap?: number }) {
        const { maxNodes } = opts;
        if (!Number.isInteger(maxNodes) || maxNodes <= 0) {
            throw new Error("maxNodes must be a positive integer");
        }
        if (maxNodes > MAX_CAPACITY) {
            throw new Error(`maxNodes cannot exceed ${MAX_CAPACITY}`);
        }
        this.maxNodes = maxNodes;

        const initialCap = opts.initialCap ?? Math.min(1024, maxNodes);
        if (!Number.isInteger(initialCap) || initialCap <= 0) {
            throw new Error("initialCap must be a positive integer");
        }
        if (initialCap > maxNodes) {
            throw new Error("initialCap cannot exceed maxNodes");
        }

        this.cap = initialCap;
        this.sizeAllocated = 0;
        this.freeList = new Int32Array(this.cap);
        this.freeCount = 0;

        this.keyRef = new Array<K | undefined>(this.cap);
        this.next = new Int32Array(this.cap).fill(NIL);
        this.accessCount = new Float64Array(this.cap);
        this.lastAccessed = new Float64Array(this.cap);
        this.insertedAt = new Float64Array(this.cap);
    }

    debug(): NodeStoreDebug {
        return {
            cap: this.cap,
            sizeAllocated: this.sizeAllocated,
            freeCount: this.freeCount,
        };
    }

    /**
     * Allocate a node id.
     * Returns NIL if impossible (at maxNodes and no free slot).
     */
    allocId(): NodeId {
        if (this.freeCount > 0) {
            const reused = this.freeList[--this.freeCount];
            this.resetSlot(reused);
            return reused;
        }

        if (this.sizeAllocated >= this.maxNodes) return NIL;

        const id = this.sizeAllocated++;
        if (id >= this.cap) {
            this.ensureCapacity(id + 1);
        }

        this.resetSlot(id);
        return id;
    }

    /**
     * Fill a freshly allocated slot. Both stamps start at `stamp`.
     */
    setNode(id: NodeId, key: K, stamp: number): void {
        this.assertId(id);
        this.keyRef[id] = key;
        this.accessCount[id] = 0;
        this.lastAccessed[id] = stamp;
        this.insertedAt[id] = stamp;
    }

    /**
     * Key stored at a live slot. Throws on a free slot.
     */
    keyOf(id: NodeId): K {
        this.assertId(id);
        const key = this.keyRef[id];
        if (key === undefined) {
            throw new Error(`nodeId ${id} is not allocated`);
        }
        return key;
    }

    /**
     * Free a node id back to the free list.
     * Throws on double-free.
     */
    freeId(id: NodeId): void {
        this.assertId(id);
        if (this.keyRef[id] === undefined) {
            throw new Error(`double-free detected for nodeId=${id}`);
        }

        this.resetSlot(id);
        this.freeList[this.freeCount++] = id;
    }

    /**
     * Forget every slot at once. Ids are handed out from 0 again.
     */
    reset(): void {
        for (let id = 0; id < this.sizeAllocated; id++) {
            this.resetSlot(id);
        }
        this.sizeAllocated = 0;
        this.freeCount = 0;
    }

    private resetSlot(id: NodeId): void {
        this.keyRef[id] = undefined;
        this.next[id] = NIL;
        this.accessCount[id] = 0;
        this.lastAccessed[id] = 0;
        this.insertedAt[id] = 0;
    }

    private assertId(id: NodeId): void {
        if (!Number.isInteger(id) || id < 0 || id >= this.cap) {
            throw new Error(`invalid nodeId: ${id}`);
        }
    }

    /**
     * Growth strategy: doubling, capped at maxNodes.
     * Copies typed arrays.
     */
    private ensureCapacity(required: number): void {
        if (required <= this.cap) return;

        let newCap = this.cap;
        while (newCap < required) {
            const prevCap = newCap;
            newCap = Math.min(newCap * 2, this.maxNodes);
            if (newCap === prevCap) {
                throw new Error(
                    `cannot grow capacity to ${required} (maxNodes=${this.maxNodes})`
                );
            }
        }

        this.keyRef.length = newCap;

        const oldNext = this.next;
        this.next = new Int32Array(newCap).fill(NIL);
        this.next.set(oldNext);

        const oldCounts = this.accessCount;
        this.accessCount = new Float64Array(newCap);
        this.accessCount.set(oldCounts);

        const oldFree = this.freeList;
        this.freeList = new Int32Array(newCap);
        this.freeList.set(oldFree);

        const oldLast = this.lastAccessed;
        this.lastAccessed = new Float64Array(newCap);
        this.lastAccessed.set(oldLast);

        const oldInserted = this.insertedAt;
        this.insertedAt = new Float64Array(newCap);
        this.insertedAt.set(oldInserted);

        this.cap = newCap;
    }
}
