/**
 * @module arena
 * Node storage for the treap.
 *
 * Architecture: **Structure of Arrays (SoA)**
 * A node is a slot index into parallel columns:
 * - `left`, `right`, `parent`: child/back links (`NIL` for none).
 * - `priority`: the heap key drawn when the node was created.
 * - `cells`: the payload, boxed so a released slot is distinguishable.
 *
 * Released slots go on a free list and are handed out again by `allocate`.
 * Nothing outside the core that owns an arena ever writes to it.
 */

import { CapacityExceededError, StalePositionError } from './errors';
import { Priority } from './priority';

/** The absent link; as an iterator position it is past-the-end. */
export const NIL = -1;

const INITIAL_CAPACITY = 16;

interface Cell<T> {
    value: T;
}

/**
 * Anchor of a tree: the root and the cached extremes.
 * All three are `NIL` exactly when the tree is empty.
 */
export interface Header {
    root: number;
    lowest: number;
    highest: number;
}

export function emptyHeader(): Header {
    return { root: NIL, lowest: NIL, highest: NIL };
}

export class NodeArena<T> {
    #left = new Int32Array(INITIAL_CAPACITY);
    #right = new Int32Array(INITIAL_CAPACITY);
    #parent = new Int32Array(INITIAL_CAPACITY);
    #priority = new Int32Array(INITIAL_CAPACITY);
    #cells: Array<Cell<T> | undefined> = [];
    #free: number[] = [];
    #live = 0;

    readonly maxSize: number;

    constructor(maxSize: number = Infinity) {
        this.maxSize = maxSize;
    }

    /** Number of slots currently holding an element. */
    get live(): number { return this.#live; }

    /** Number of slots ever handed out (live + free). */
    get slots(): number { return this.#cells.length; }

    ensureCapacity(capacity: number) {
        if (capacity <= this.#left.length) return;
        let target = this.#left.length;
        while (target < capacity) target *= 2;

        const grow = (column: Int32Array) => {
            const next = new Int32Array(target);
            next.set(column);
            return next;
        };
        this.#left = grow(this.#left);
        this.#right = grow(this.#right);
        this.#parent = grow(this.#parent);
        this.#priority = grow(this.#priority);
    }

    /**
     * Hands out a detached slot holding `value`.
     * @throws CapacityExceededError when `maxSize` slots are already live.
     */
    allocate(value: T, priority: Priority): number {
        if (this.#live >= this.maxSize) throw new CapacityExceededError(this.maxSize);

        let slot = this.#free.pop();
        if (slot === undefined) {
            slot = this.#cells.length;
            this.ensureCapacity(slot + 1);
            this.#cells.push(undefined);
        }

        this.#cells[slot] = { value };
        this.#priority[slot] = priority;
        this.#left[slot] = NIL;
        this.#right[slot] = NIL;
        this.#parent[slot] = NIL;
        this.#live++;
        return slot;
    }

    /** Returns a slot to the free list. Links are not touched. */
    release(slot: number) {
        if (this.#cells[slot] === undefined) throw new StalePositionError(slot);
        this.#cells[slot] = undefined;
        this.#free.push(slot);
        this.#live--;
    }

    /** Drops every slot at once (whole-tree teardown). */
    reset() {
        this.#cells = [];
        this.#free = [];
        this.#live = 0;
    }

    isLive(slot: number): boolean {
        return slot >= 0 && this.#cells[slot] !== undefined;
    }

    value(slot: number): T {
        const cell = this.#cells[slot];
        if (cell === undefined) throw new StalePositionError(slot);
        return cell.value;
    }

    setValue(slot: number, value: T) {
        const cell = this.#cells[slot];
        if (cell === undefined) throw new StalePositionError(slot);
        cell.value = value;
    }

    priority(slot: number): Priority { return this.#priority[slot]; }

    left(slot: number): number { return this.#left[slot]; }
    right(slot: number): number { return this.#right[slot]; }
    parent(slot: number): number { return this.#parent[slot]; }

    setLeft(slot: number, child: number) { this.#left[slot] = child; }
    setRight(slot: number, child: number) { this.#right[slot] = child; }
    setParent(slot: number, parent: number) { this.#parent[slot] = parent; }
}
