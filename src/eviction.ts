import type { Chain } from "./chain";
import type { NodeId } from "./node-store";
import { NIL } from "./constants";

export interface EvictionCandidate {
    prev: NodeId; // NIL when the victim is the head
    id: NodeId;   // NIL when the chain is empty
}

/**
 * Global least-recently-accessed scan.
 * The head's stamp is the first candidate and is only replaced by a
 * strictly smaller one, so the earliest node in chain order wins ties.
 */
export function findLeastRecentlyAccessed<K>(chain: Chain<K>): EvictionCandidate {
    const head = chain.head();
    if (head === NIL) {
        return { prev: NIL, id: NIL };
    }

    const stamps = chain.store.lastAccessed;
    let victimPrev = NIL;
    let victim = head;
    let oldest = stamps[head];

    let prev = head;
    for (let current = chain.next(head); current !== NIL; current = chain.next(current)) {
        if (stamps[current] < oldest) {
            oldest = stamps[current];
            victim = current;
            victimPrev = prev;
        }
        prev = current;
    }

    return { prev: victimPrev, id: victim };
}
