import { describe, it, expect } from "vitest";
import { Chain } from "../src/chain";
import { NodeStore } from "../src/node-store";
import { NIL } from "../src/constants";
import { buildChain } from "./fixtures";

describe("Chain", () => {
    describe("Construction and Initialization", () => {
        it("should start empty", () => {
            const chain = new Chain(new NodeStore<string>({ maxNodes: 10 }));

            expect(chain.isEmpty()).toBe(true);
            expect(chain.head()).toBe(NIL);
            expect(Array.from(chain.ids())).toEqual([]);
        });
    });

    describe("linkHead", () => {
        it("should link first node with no successor", () => {
            const store = new NodeStore<string>({ maxNodes: 10 });
            const chain = new Chain(store);
            const id = store.allocId();

            chain.linkHead(id);

            expect(chain.isEmpty()).toBe(false);
            expect(chain.head()).toBe(id);
            expect(store.next[id]).toBe(NIL);
        });

        it("should put the latest node in front", () => {
            const store = new NodeStore<string>({ maxNodes: 10 });
            const chain = new Chain(store);

            const id0 = store.allocId();
            const id1 = store.allocId();
            const id2 = store.allocId();
            chain.linkHead(id0);
            chain.linkHead(id1);
            chain.linkHead(id2);

            // id2 -> id1 -> id0
            expect(chain.head()).toBe(id2);
            expect(store.next[id2]).toBe(id1);
            expect(store.next[id1]).toBe(id0);
            expect(store.next[id0]).toBe(NIL);
        });
    });

    describe("unlinkAfter", () => {
        it("should detach the head when prev is NIL", () => {
            const f = buildChain(["a", "b", "c"]);

            const detached = f.chain.unlinkAfter(NIL);

            expect(detached).toBe(f.idOf("a"));
            expect(f.store.next[detached]).toBe(NIL);
            expect(f.order()).toEqual(["b", "c"]);
        });

        it("should splice around a middle node", () => {
            const f = buildChain(["a", "b", "c"]);

            const detached = f.chain.unlinkAfter(f.idOf("a"));

            expect(detached).toBe(f.idOf("b"));
            expect(f.order()).toEqual(["a", "c"]);
        });

        it("should detach the tail", () => {
            const f = buildChain(["a", "b", "c"]);

            f.chain.unlinkAfter(f.idOf("b"));

            expect(f.order()).toEqual(["a", "b"]);
            expect(f.store.next[f.idOf("b")]).toBe(NIL);
        });

        it("should return NIL past the tail or on an empty chain", () => {
            const f = buildChain(["a"]);
            expect(f.chain.unlinkAfter(f.idOf("a"))).toBe(NIL);
            expect(f.order()).toEqual(["a"]);

            const empty = new Chain(new NodeStore<string>({ maxNodes: 2 }));
            expect(empty.unlinkAfter(NIL)).toBe(NIL);
        });

        it("should leave an empty chain after removing the only node", () => {
            const f = buildChain(["a"]);
            f.chain.unlinkAfter(NIL);
            expect(f.chain.isEmpty()).toBe(true);
        });
    });

    describe("linkAfter", () => {
        it("should insert between two nodes", () => {
            const f = buildChain(["a", "c"]);
            const id = f.store.allocId();
            f.store.setNode(id, "b", 0);

            f.chain.linkAfter(f.idOf("a"), id);

            expect(f.order()).toEqual(["a", "b", "c"]);
        });

        it("should append after the tail", () => {
            const f = buildChain(["a", "b"]);
            const id = f.store.allocId();
            f.store.setNode(id, "c", 0);

            f.chain.linkAfter(f.idOf("b"), id);

            expect(f.order()).toEqual(["a", "b", "c"]);
            expect(f.store.next[id]).toBe(NIL);
        });
    });

    describe("predecessorOf", () => {
        it("should find the node in front", () => {
            const f = buildChain(["a", "b", "c", "d"]);
            expect(f.chain.predecessorOf(f.idOf("c"))).toBe(f.idOf("b"));
            expect(f.chain.predecessorOf(f.idOf("d"))).toBe(f.idOf("c"));
        });

        it("should return NIL for the head", () => {
            const f = buildChain(["a", "b"]);
            expect(f.chain.predecessorOf(f.idOf("a"))).toBe(NIL);
        });

        it("should return NIL for a node not in the chain", () => {
            const f = buildChain(["a", "b"]);
            const stray = f.store.allocId();
            f.store.setNode(stray, "x", 0);
            expect(f.chain.predecessorOf(stray)).toBe(NIL);
        });
    });

    describe("reset", () => {
        it("should empty the chain", () => {
            const f = buildChain(["a", "b"]);
            f.chain.reset();
            expect(f.chain.isEmpty()).toBe(true);
            expect(f.order()).toEqual([]);
        });
    });
});
