/**
 * Randomized operation sequences checked step by step against an
 * independent ordered-set oracle (functional-red-black-tree), with the
 * treap's own invariant check after every mutation.
 */

import { describe, it, expect } from 'vitest';
import createRBTree from 'functional-red-black-tree';
import { TreapSet, mulberry32, randomPriorities } from '../src/index';

const KEY_RANGE = 120;
const STEPS = 1500;

function createRNG(seed: number) {
    const step = mulberry32(seed);
    return {
        int: (n: number) => step() % n,
    };
}

type Oracle = ReturnType<typeof createRBTree<number, boolean>>;

function oracleInsert(oracle: Oracle, key: number): [Oracle, boolean] {
    if (oracle.get(key) !== undefined) return [oracle, false];
    return [oracle.insert(key, true), true];
}

function oracleLowerBound(oracle: Oracle, key: number): number | undefined {
    const it = oracle.ge(key);
    return it.valid ? it.key : undefined;
}

function oracleUpperBound(oracle: Oracle, key: number): number | undefined {
    const it = oracle.gt(key);
    return it.valid ? it.key : undefined;
}

describe.each([1, 7, 1337, 90210])('random operations (seed %i)', (seed) => {
    it('agree with a red-black tree oracle', () => {
        const rng = createRNG(seed);
        const set = new TreapSet<number>({ compare: (a, b) => a - b, priorities: randomPriorities(seed ^ 0x5bd1e995) });
        let oracle: Oracle = createRBTree<number, boolean>((a, b) => a - b);

        for (let step = 0; step < STEPS; step++) {
            const key = rng.int(KEY_RANGE);
            const op = rng.int(6);

            if (op === 0 || op === 1) {
                const res = set.insert(key);
                const [next, inserted] = oracleInsert(oracle, key);
                oracle = next;
                expect(res.inserted).toBe(inserted);
                expect(res.position.value).toBe(key);
            } else if (op === 2) {
                const hintKey = rng.int(KEY_RANGE + 10);
                const hint = set.lowerBound(hintKey);
                expect(set.insertHint(hint, key).value).toBe(key);
                oracle = oracleInsert(oracle, key)[0];
            } else if (op === 3) {
                const expected = oracle.get(key) !== undefined;
                expect(set.erase(key)).toBe(expected);
                if (expected) oracle = oracle.remove(key);
            } else if (op === 4) {
                const pos = set.lowerBound(key);
                if (pos.valid) {
                    const removed = pos.value;
                    const following = oracleUpperBound(oracle, removed);
                    const next = set.eraseAt(pos);
                    oracle = oracle.remove(removed);
                    expect(next.valid ? next.value : undefined).toBe(following);
                }
            } else {
                const lower = set.lowerBound(key);
                const upper = set.upperBound(key);
                expect(lower.valid ? lower.value : undefined).toBe(oracleLowerBound(oracle, key));
                expect(upper.valid ? upper.value : undefined).toBe(oracleUpperBound(oracle, key));
                expect(set.contains(key)).toBe(oracle.get(key) !== undefined);
            }

            set.validate();
            expect(set.size).toBe(oracle.length);
        }

        expect(set.toArray()).toEqual(oracle.keys);

        const copy = set.clone();
        expect(copy.toShape()).toEqual(set.toShape());
        expect(copy.equals(set)).toBe(true);
    });

    it('erases down to empty in random order', () => {
        const rng = createRNG(seed);
        const set = new TreapSet<number>({ priorities: randomPriorities(seed ^ 0x5bd1e995) });
        for (let i = 0; i < 200; i++) set.insert(rng.int(1000));
        expect(set.size).toBeGreaterThan(100);

        const live = set.toArray();
        while (live.length > 0) {
            const [victim] = live.splice(rng.int(live.length), 1);
            expect(set.erase(victim)).toBe(true);
            set.validate();
            expect(set.contains(victim)).toBe(false);
        }

        expect(set.isEmpty()).toBe(true);
        expect(set.begin().equals(set.end())).toBe(true);
    });
});
