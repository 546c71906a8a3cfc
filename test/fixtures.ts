import { NodeStore, type NodeId } from "../src/node-store";
import { Chain } from "../src/chain";
import type { TimeSource } from "../src/monotone-time";

/**
 * Fake time source for deterministic testing
 */
export class FakeTimeSource implements TimeSource {
    private currentMs = 0;

    nowMs(): number {
        return this.currentMs;
    }

    advance(ms: number): void {
        this.currentMs += ms;
    }

    setTime(ms: number): void {
        this.currentMs = ms;
    }
}

export interface ChainFixture {
    store: NodeStore<string>;
    chain: Chain<string>;
    idOf(key: string): NodeId;
    order(): string[];
}

/**
 * Chain holding `keys` head to tail. `counts[i]` is the access count of
 * `keys[i]`, `stamps[i]` its last-accessed stamp.
 */
export function buildChain(keys: string[], counts: number[] = [], stamps: number[] = []): ChainFixture {
    const store = new NodeStore<string>({ maxNodes: 64 });
    const chain = new Chain(store);
    const ids = new Map<string, NodeId>();

    for (let i = keys.length - 1; i >= 0; i--) {
        const id = store.allocId();
        store.setNode(id, keys[i], stamps[i] ?? 0);
        store.accessCount[id] = counts[i] ?? 0;
        chain.linkHead(id);
        ids.set(keys[i], id);
    }

    return {
        store,
        chain,
        idOf(key: string): NodeId {
            const id = ids.get(key);
            if (id === undefined) {
                throw new Error(`no node for ${key}`);
            }
            return id;
        },
        order(): string[] {
            return Array.from(chain.ids(), (id) => store.keyOf(id));
        },
    };
}
