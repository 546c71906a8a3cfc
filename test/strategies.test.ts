import { describe, it, expect } from "vitest";
import {
    STRATEGIES,
    STRATEGY_KINDS,
    isStrategyKind,
    parseStrategy,
    reorganize,
} from "../src/strategies";
import { InvalidConfigurationError } from "../src/errors";
import { NIL } from "../src/constants";
import { buildChain } from "./fixtures";

describe("Strategies", () => {
    describe("Catalogue", () => {
        it("should describe every kind", () => {
            for (const kind of STRATEGY_KINDS) {
                expect(STRATEGIES[kind].kind).toBe(kind);
                expect(STRATEGIES[kind].name.length).toBeGreaterThan(0);
                expect(STRATEGIES[kind].description.length).toBeGreaterThan(0);
            }
        });

        it("should mark only frequency-count as O(n)", () => {
            expect(STRATEGY_KINDS.filter(kind => STRATEGIES[kind].timeComplexity === "O(n)")).toEqual([
                "frequency-count",
            ]);
        });

        it("should recognize kinds", () => {
            expect(isStrategyKind("lru")).toBe(true);
            expect(isStrategyKind("LRU")).toBe(false);
            expect(isStrategyKind(undefined)).toBe(false);
            expect(isStrategyKind(3)).toBe(false);
        });

        it("should parse names case-insensitively", () => {
            expect(parseStrategy(" Move-To-Front ")).toBe("move-to-front");
            expect(parseStrategy("transpose")).toBe("transpose");
        });

        it("should reject unknown names with a configuration error", () => {
            expect(() => parseStrategy("random")).toThrow(InvalidConfigurationError);
            expect(() => parseStrategy("random")).toThrow(/unknown strategy: random/);
        });
    });

    describe("move-to-front", () => {
        it("should move a middle match to the head", () => {
            const f = buildChain(["a", "b", "c", "d"]);

            const op = reorganize("move-to-front", f.chain, f.idOf("b"), f.idOf("c"));

            expect(op).toBe("Moved to front");
            expect(f.order()).toEqual(["c", "a", "b", "d"]);
        });

        it("should move the tail to the head", () => {
            const f = buildChain(["a", "b", "c"]);

            reorganize("move-to-front", f.chain, f.idOf("b"), f.idOf("c"));

            expect(f.order()).toEqual(["c", "a", "b"]);
            expect(f.store.next[f.idOf("b")]).toBe(NIL);
        });

        it("should leave the head in place", () => {
            const f = buildChain(["a", "b"]);

            const op = reorganize("move-to-front", f.chain, NIL, f.idOf("a"));

            expect(op).toBe("Already at front");
            expect(f.order()).toEqual(["a", "b"]);
        });
    });

    describe("lru", () => {
        it("should move the match to the head like move-to-front", () => {
            const f = buildChain(["a", "b", "c", "d"]);

            const op = reorganize("lru", f.chain, f.idOf("c"), f.idOf("d"));

            expect(op).toBe("Moved to head (LRU)");
            expect(f.order()).toEqual(["d", "a", "b", "c"]);
        });

        it("should report a head match as a no-op", () => {
            const f = buildChain(["a", "b"]);

            expect(reorganize("lru", f.chain, NIL, f.idOf("a"))).toBe("Already at head (LRU)");
            expect(f.order()).toEqual(["a", "b"]);
        });
    });

    describe("transpose", () => {
        it("should swap the second node with the head", () => {
            const f = buildChain(["a", "b", "c"]);

            const op = reorganize("transpose", f.chain, f.idOf("a"), f.idOf("b"));

            expect(op).toBe("Transposed with head");
            expect(f.order()).toEqual(["b", "a", "c"]);
        });

        it("should swap a deeper node with its predecessor only", () => {
            const f = buildChain(["a", "b", "c", "d"]);

            const op = reorganize("transpose", f.chain, f.idOf("c"), f.idOf("d"));

            expect(op).toBe("Transposed with predecessor");
            expect(f.order()).toEqual(["a", "b", "d", "c"]);
        });

        it("should move one position per call", () => {
            const f = buildChain(["a", "b", "c", "d"]);

            reorganize("transpose", f.chain, f.idOf("c"), f.idOf("d"));
            reorganize("transpose", f.chain, f.idOf("b"), f.idOf("d"));
            reorganize("transpose", f.chain, f.idOf("a"), f.idOf("d"));

            expect(f.order()).toEqual(["d", "a", "b", "c"]);
        });

        it("should leave the head in place", () => {
            const f = buildChain(["a", "b"]);

            expect(reorganize("transpose", f.chain, NIL, f.idOf("a"))).toBe("Already at head (no transpose)");
            expect(f.order()).toEqual(["a", "b"]);
        });

        it("should do nothing when the predecessor is not in the chain", () => {
            const f = buildChain(["a", "b"]);
            const stray = f.store.allocId();
            f.store.setNode(stray, "x", 0);

            expect(reorganize("transpose", f.chain, stray, f.idOf("b"))).toBe("No transposition performed");
            expect(f.order()).toEqual(["a", "b"]);
        });
    });

    describe("frequency-count", () => {
        it("should insert in front of the first node with a count not greater", () => {
            const f = buildChain(["a", "b", "c", "d"], [5, 3, 2, 3]);

            const op = reorganize("frequency-count", f.chain, f.idOf("c"), f.idOf("d"));

            expect(op).toBe("Moved to position (frequency: 3)");
            expect(f.order()).toEqual(["a", "d", "b", "c"]);
        });

        it("should stop at the tail when every other count is greater", () => {
            const f = buildChain(["a", "b", "c"], [9, 8, 1]);

            const op = reorganize("frequency-count", f.chain, f.idOf("b"), f.idOf("c"));

            expect(op).toBe("Moved to position (frequency: 1)");
            expect(f.order()).toEqual(["a", "b", "c"]);
        });

        it("should promote to head when the head count is equal", () => {
            const f = buildChain(["a", "b", "c"], [2, 1, 2]);

            const op = reorganize("frequency-count", f.chain, f.idOf("b"), f.idOf("c"));

            expect(op).toBe("Moved to head (higher frequency)");
            expect(f.order()).toEqual(["c", "a", "b"]);
        });

        it("should promote to head when the head count is lower", () => {
            const f = buildChain(["a", "b"], [1, 4]);

            expect(reorganize("frequency-count", f.chain, f.idOf("a"), f.idOf("b"))).toBe(
                "Moved to head (higher frequency)"
            );
            expect(f.order()).toEqual(["b", "a"]);
        });

        it("should leave the head in place", () => {
            const f = buildChain(["a", "b"], [1, 9]);

            expect(reorganize("frequency-count", f.chain, NIL, f.idOf("a"))).toBe(
                "Already at head (frequency unchanged)"
            );
            expect(f.order()).toEqual(["a", "b"]);
        });

        it("should not re-sort a chain left unordered by another strategy", () => {
            const f = buildChain(["a", "b", "c"], [1, 9, 3]);

            reorganize("frequency-count", f.chain, f.idOf("b"), f.idOf("c"));

            // head count 1 <= 3, so c is promoted ahead of b despite b's 9
            expect(f.order()).toEqual(["c", "a", "b"]);
        });
    });

    it("should never touch access counts", () => {
        for (const kind of STRATEGY_KINDS) {
            const f = buildChain(["a", "b", "c"], [3, 2, 1]);
            reorganize(kind, f.chain, f.idOf("b"), f.idOf("c"));
            expect(Array.from(f.store.accessCount.slice(0, 3)).sort()).toEqual([1, 2, 3]);
        }
    });
});
