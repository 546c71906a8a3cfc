import type { EvictReason, ListKey, PerformanceReport, SearchResult, SelfOrganizingListOptions } from "./types";
import { NodeStore, type NodeId, type NodeStoreDebug } from "./node-store";
import { Chain } from "./chain";
import { MonotoneClock } from "./monotone-time";
import { MetricsRecorder, type OperationLabel } from "./metrics";
import { ReadWriteLock } from "./rw-lock";
import { STRATEGIES, isStrategyKind, reorganize, type StrategyKind } from "./strategies";
import { findLeastRecentlyAccessed } from "./eviction";
import { InvalidConfigurationError } from "./errors";
import { MAX_CAPACITY, NIL } from "./constants";

export interface ListDebug<K> {
    size: number;
    chainKeys: K[];
    indexKeys: K[];
    store: NodeStoreDebug;
}

interface Located {
    id: NodeId;
    cost: number;
    operation: string;
}

// SameValueZero, the equality the key index uses
function sameKey(a: ListKey, b: ListKey): boolean {
    return a === b || (Number.isNaN(a) && Number.isNaN(b));
}

export class SelfOrganizingList<K extends ListKey> {
    // Core components
    private readonly store: NodeStore<K>;
    private readonly chain: Chain<K>;
    private readonly keyIndex: Map<K, NodeId>;
    private readonly clock: MonotoneClock;
    private readonly metrics: MetricsRecorder;
    private readonly lock: ReadWriteLock;

    // Configuration
    private readonly maxSize: number;
    private readonly onEvict?: (key: K, reason: EvictReason) => void | Promise<void>;
    private strategy: StrategyKind;

    private count: number;

    constructor(options: SelfOrganizingListOptions<K>) {
        const { capacity, strategy } = options;
        if (!Number.isInteger(capacity) || capacity <= 0) {
            throw new InvalidConfigurationError("capacity", "capacity must be a positive integer");
        }
        if (capacity > MAX_CAPACITY) {
            throw new InvalidConfigurationError("capacity", `capacity cannot exceed ${MAX_CAPACITY}`);
        }
        if (!isStrategyKind(strategy)) {
            throw new InvalidConfigurationError("strategy", `unknown strategy: ${String(strategy)}`);
        }

        this.maxSize = capacity;
        this.strategy = strategy;
        this.onEvict = options.onEvict;

        this.store = new NodeStore<K>({ maxNodes: capacity });
        this.chain = new Chain(this.store);
        this.keyIndex = new Map<K, NodeId>();
        this.clock = new MonotoneClock(options.time);
        this.metrics = new MetricsRecorder(options.time);
        this.lock = new ReadWriteLock();
        this.count = 0;
    }

    /**
     * Link `key` as the new head. Resolves false, changing nothing, when
     * the key is already present. At capacity the least recently accessed
     * node is evicted first; `onEvict` runs once the new key is linked.
     */
    insert(key: K): Promise<boolean> {
        return this.lock.write(() => this.insertLocked(key));
    }

    /**
     * Walk the chain for `key`, count the steps and let the active
     * strategy reorganize on a hit. Always a write: hits bump access
     * metadata and may move nodes.
     */
    search(key: K): Promise<SearchResult<K>> {
        return this.lock.write(() => {
            const start = process.hrtime.bigint();
            const { id, cost, operation } = this.locate(key);
            const searchTimeNs = Number(process.hrtime.bigint() - start);
            this.metrics.recordSearchTime(searchTimeNs);

            return Object.freeze({
                key: id === NIL ? undefined : key,
                found: id !== NIL,
                accessCost: cost,
                searchTimeNs,
                searchTimeMs: searchTimeNs / 1_000_000,
                operation,
            });
        });
    }

    /**
     * Insert every key in order under one write section. The bulk-load
     * event counts the keys offered, duplicates included. A failing
     * `onEvict` does not stop the load; the first such error is rethrown
     * once every key has been inserted.
     */
    loadAll(keys: Iterable<K>): Promise<void> {
        return this.lock.write(async () => {
            let offered = 0;
            let failure: { error: unknown } | undefined;
            for (const key of keys) {
                offered++;
                try {
                    await this.insertLocked(key);
                } catch (error) {
                    if (failure === undefined) {
                        failure = { error };
                    }
                }
            }
            this.metrics.recordBulkLoad(offered);

            if (failure !== undefined) {
                throw failure.error;
            }
        });
    }

    /**
     * Swap the reorganization policy for subsequent searches.
     * The current chain order is kept as is.
     */
    setStrategy(strategy: StrategyKind): Promise<void> {
        return this.lock.write(() => {
            if (!isStrategyKind(strategy)) {
                throw new InvalidConfigurationError("strategy", `unknown strategy: ${String(strategy)}`);
            }
            this.strategy = strategy;
            this.metrics.recordStrategyChange(STRATEGIES[strategy].name);
        });
    }

    clear(): Promise<void> {
        return this.lock.write(async () => {
            const keys = this.orderedKeys();

            this.chain.reset();
            this.store.reset();
            this.keyIndex.clear();
            this.count = 0;
            this.metrics.reset();

            if (this.onEvict) {
                for (const key of keys) {
                    await this.onEvict(key, "clear");
                }
            }
        });
    }

    has(key: K): Promise<boolean> {
        return this.lock.read(() => this.keyIndex.has(key));
    }

    toOrderedSequence(): Promise<K[]> {
        return this.lock.read(() => this.orderedKeys());
    }

    toDiagnosticText(): Promise<string> {
        return this.lock.read(() => {
            const now = this.clock.nowMs();
            const lines = [
                "SelfOrganizingList {",
                `  Strategy: ${this.currentStrategyName()}`,
                `  Size: ${this.count}/${this.maxSize}`,
                "  Elements:",
            ];

            let position = 0;
            for (const id of this.chain.ids()) {
                const key = this.store.keyOf(id);
                const accesses = this.store.accessCount[id];
                const idleMs = Math.round(now - this.store.lastAccessed[id]);
                lines.push(`    [${position++}] ${key} (accesses: ${accesses}, last: ${idleMs}ms)`);
            }

            lines.push(`  Performance: ${this.metrics.hitRate().toFixed(2)}% hit rate`);
            lines.push("}");
            return lines.join("\n");
        });
    }

    /**
     * Reads the recorder directly; may land between two events of an
     * in-flight operation.
     */
    report(): PerformanceReport {
        return this.metrics.report();
    }

    recentOperations(count?: number): OperationLabel[] {
        return this.metrics.recentOperations(count);
    }

    size(): number {
        return this.count;
    }

    capacity(): number {
        return this.maxSize;
    }

    isEmpty(): boolean {
        return this.count === 0;
    }

    currentStrategy(): StrategyKind {
        return this.strategy;
    }

    currentStrategyName(): string {
        return STRATEGIES[this.strategy].name;
    }

    debug(): ListDebug<K> {
        return {
            size: this.count,
            chainKeys: this.orderedKeys(),
            indexKeys: Array.from(this.keyIndex.keys()),
            store: this.store.debug(),
        };
    }

    toString(): string {
        return `[${this.orderedKeys().join(" → ")}]`;
    }

    private async insertLocked(key: K): Promise<boolean> {
        if (this.keyIndex.has(key)) {
            return false;
        }

        const evicted = this.count >= this.maxSize ? this.evictLeastRecentlyAccessed() : undefined;

        const id = this.store.allocId();
        if (id === NIL) {
            throw new Error("Failed to allocate node id");
        }

        this.store.setNode(id, key, this.clock.stamp());
        this.chain.linkHead(id);
        this.keyIndex.set(key, id);
        this.count++;
        this.metrics.recordInsertion();

        if (evicted !== undefined && this.onEvict) {
            await this.onEvict(evicted, "capacity");
        }

        return true;
    }

    /**
     * The head probe costs one step on its own. When it misses, the walk
     * starts over from the head and every node visited costs one more.
     */
    private locate(key: K): Located {
        const head = this.chain.head();
        if (head === NIL) {
            this.metrics.recordMiss();
            return { id: NIL, cost: 0, operation: "Empty list" };
        }

        let cost = 1;
        let prev = NIL;
        let current = head;

        if (!sameKey(this.store.keyOf(head), key)) {
            for (current = head; current !== NIL; current = this.chain.next(current)) {
                cost++;
                if (sameKey(this.store.keyOf(current), key)) break;
                prev = current;
            }
        }

        if (current === NIL) {
            this.metrics.recordMiss();
            return { id: NIL, cost, operation: "Element not found" };
        }

        this.store.accessCount[current]++;
        this.store.lastAccessed[current] = this.clock.stamp();

        const operation = reorganize(this.strategy, this.chain, prev, current);
        this.metrics.recordHit(cost);

        return { id: current, cost, operation };
    }

    /**
     * Unlink and free the victim. Returns its key, or undefined on an
     * empty chain.
     */
    private evictLeastRecentlyAccessed(): K | undefined {
        const { prev, id } = findLeastRecentlyAccessed(this.chain);
        if (id === NIL) {
            return undefined;
        }

        const key = this.store.keyOf(id);

        this.chain.unlinkAfter(prev);
        this.keyIndex.delete(key);
        this.store.freeId(id);
        this.count--;
        this.metrics.recordEviction();

        return key;
    }

    private orderedKeys(): K[] {
        return Array.from(this.chain.ids(), (id) => this.store.keyOf(id));
    }
}
