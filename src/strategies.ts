import type { Chain } from "./chain";
import type { NodeId } from "./node-store";
import { NIL } from "./constants";
import { InvalidConfigurationError } from "./errors";

export type StrategyKind = "move-to-front" | "transpose" | "frequency-count" | "lru";

export interface StrategyInfo {
    kind: StrategyKind;
    name: string;
    description: string;
    timeComplexity: string;
}

export const STRATEGIES: Readonly<Record<StrategyKind, StrategyInfo>> = {
    "move-to-front": {
        kind: "move-to-front",
        name: "Move-to-Front (MTF)",
        description: "Moves accessed element to list head. Excellent for temporal locality.",
        timeComplexity: "O(1)",
    },
    "transpose": {
        kind: "transpose",
        name: "Transpose",
        description: "Swaps accessed element with its predecessor. Good for sequential access.",
        timeComplexity: "O(1)",
    },
    "frequency-count": {
        kind: "frequency-count",
        name: "Frequency Count",
        description: "Orders elements by access frequency. Best for skewed distributions.",
        timeComplexity: "O(n)",
    },
    "lru": {
        kind: "lru",
        name: "LRU (Least Recently Used)",
        description: "Moves accessed element to head. Simple LRU implementation.",
        timeComplexity: "O(1)",
    },
};

export const STRATEGY_KINDS: readonly StrategyKind[] = [
    "move-to-front",
    "transpose",
    "frequency-count",
    "lru",
];

export function isStrategyKind(value: unknown): value is StrategyKind {
    return STRATEGY_KINDS.some(kind => kind === value);
}

/**
 * Map a user-supplied name (CLI flag, config value) to a strategy kind.
 */
export function parseStrategy(value: string): StrategyKind {
    const normalized = value.trim().toLowerCase();
    if (!isStrategyKind(normalized)) {
        throw new InvalidConfigurationError(
            "strategy",
            `unknown strategy: ${value} (expected one of ${STRATEGY_KINDS.join(", ")})`
        );
    }
    return normalized;
}

/**
 * Reorganize the chain after `id` was matched right after `prev`
 * (`prev` is NIL when `id` is the head). Access counts must already
 * include the current hit. Only links change; the caller's index is untouched.
 *
 * @returns what was done, for the search result
 */
export function reorganize<K>(kind: StrategyKind, chain: Chain<K>, prev: NodeId, id: NodeId): string {
    switch (kind) {
        case "move-to-front":
            if (prev === NIL) {
                return "Already at front";
            }
            moveToHead(chain, prev);
            return "Moved to front";

        case "lru":
            if (prev === NIL) {
                return "Already at head (LRU)";
            }
            moveToHead(chain, prev);
            return "Moved to head (LRU)";

        case "transpose":
            return transpose(chain, prev, id);

        case "frequency-count":
            return promoteByFrequency(chain, prev, id);
    }
}

function moveToHead<K>(chain: Chain<K>, prev: NodeId): void {
    const id = chain.unlinkAfter(prev);
    chain.linkHead(id);
}

function transpose<K>(chain: Chain<K>, prev: NodeId, id: NodeId): string {
    if (prev === NIL) {
        return "Already at head (no transpose)";
    }

    if (chain.head() === prev) {
        chain.unlinkAfter(prev);
        chain.linkHead(id);
        return "Transposed with head";
    }

    // Singly linked: the predecessor's predecessor needs a second walk
    const prevPrev = chain.predecessorOf(prev);
    if (prevPrev === NIL) {
        return "No transposition performed";
    }

    chain.unlinkAfter(prev);
    chain.linkAfter(prevPrev, id);
    return "Transposed with predecessor";
}

/**
 * Assumes the chain is descending by access count. After a swap from
 * another strategy it may not be; the chain is not re-sorted.
 */
function promoteByFrequency<K>(chain: Chain<K>, prev: NodeId, id: NodeId): string {
    if (prev === NIL) {
        return "Already at head (frequency unchanged)";
    }

    const counts = chain.store.accessCount;
    chain.unlinkAfter(prev);

    const head = chain.head();
    if (counts[head] <= counts[id]) {
        chain.linkHead(id);
        return "Moved to head (higher frequency)";
    }

    let searchPrev = head;
    let search = chain.next(head);
    while (search !== NIL && counts[search] > counts[id]) {
        searchPrev = search;
        search = chain.next(search);
    }

    chain.linkAfter(searchPrev, id);
    return `Moved to position (frequency: ${counts[id]})`;
}
