/**
 * @module treap-set
 * @description
 * Ordered set backed by a randomized treap.
 *
 * * Features:
 * - Expected O(log N) insert / erase / find / lowerBound / upperBound.
 * - Bidirectional cursors that survive unrelated inserts and erases.
 * - Value semantics: `clone()` copies shape and priorities exactly,
 *   `moveFrom()` / `swap()` are O(1).
 *
 * * Contracts:
 * - The comparator must be a strict weak ordering and stay stable.
 * - Elements must not be mutated in a way that changes their order.
 * - Single-threaded use only.
 */

import { NIL } from './arena';
import { EmptySetError, EndIteratorError, ForeignIteratorError } from './errors';
import { ConstTreapIterator, ReverseTreapIterator, TreapIterator } from './iterator';
import { createDebugLogger } from './logger';
import { Comparator, TreapSetOptions, resolveOptions } from './options';
import { InsertOutcome, TreapCore, TreapShape } from './tree';

const { log } = createDebugLogger('ordered-treap:set');

export interface InsertResult<T> {
    readonly position: TreapIterator<T>;
    readonly inserted: boolean;
}

function isIterable<T>(value: Iterable<T> | TreapSetOptions<T> | undefined): value is Iterable<T> {
    if (typeof value === 'string') return true;
    return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

export class TreapSet<T> implements Iterable<T> {
    #core: TreapCore<T>;

    /**
     * Constructs a new set.
     * @param elements - Initial elements, inserted one by one; duplicates are skipped.
     */
    constructor(options?: TreapSetOptions<T>);
    constructor(elements: Iterable<T>, options?: TreapSetOptions<T>);
    constructor(first?: Iterable<T> | TreapSetOptions<T>, second?: TreapSetOptions<T>) {
        if (isIterable(first)) {
            this.#core = new TreapCore(resolveOptions(second));
            this.insertAll(first);
        } else {
            this.#core = new TreapCore(resolveOptions(first));
        }
    }

    static of<U>(...elements: U[]): TreapSet<U> {
        return new TreapSet(elements);
    }

    static from<U>(elements: Iterable<U>, options?: TreapSetOptions<U>): TreapSet<U> {
        return new TreapSet(elements, options);
    }

    /** Takes over the contents of `source`, leaving it empty. O(1). */
    static moveFrom<U>(source: TreapSet<U>): TreapSet<U> {
        const target = new TreapSet<U>(source.#core.options);
        target.swap(source);
        return target;
    }

    // --- Accessors ---

    get size(): number { return this.#core.size; }
    isEmpty(): boolean { return this.#core.isEmpty(); }

    get comparator(): Comparator<T> { return this.#core.options.compare; }

    /** Smallest element. @throws EmptySetError */
    lowest(): T {
        if (this.isEmpty()) throw new EmptySetError('lowest');
        return this.#core.arena.value(this.#core.header.lowest);
    }

    /** Largest element. @throws EmptySetError */
    highest(): T {
        if (this.isEmpty()) throw new EmptySetError('highest');
        return this.#core.arena.value(this.#core.header.highest);
    }

    #at(slot: number): TreapIterator<T> {
        return new TreapIterator(this.#core, slot);
    }

    #own(position: ConstTreapIterator<T>, op: string): number {
        if (!position.belongsTo(this.#core)) throw new ForeignIteratorError(op);
        return position.position;
    }

    #result(outcome: InsertOutcome): InsertResult<T> {
        return { position: this.#at(outcome.slot), inserted: outcome.inserted };
    }

    // --- Iteration ---

    begin(): TreapIterator<T> { return this.#at(this.#core.header.lowest); }
    end(): TreapIterator<T> { return this.#at(NIL); }
    cbegin(): ConstTreapIterator<T> { return this.begin().toConst(); }
    cend(): ConstTreapIterator<T> { return this.end().toConst(); }

    rbegin(): ReverseTreapIterator<T> { return new ReverseTreapIterator(this.#at(this.#core.header.highest)); }
    rend(): ReverseTreapIterator<T> { return new ReverseTreapIterator(this.end()); }
    crbegin(): ReverseTreapIterator<T> { return new ReverseTreapIterator(this.#at(this.#core.header.highest).toConst()); }
    crend(): ReverseTreapIterator<T> { return new ReverseTreapIterator(this.cend()); }

    *values(): IterableIterator<T> {
        const core = this.#core;
        for (let slot = core.header.lowest; slot !== NIL; slot = core.successor(slot)) {
            yield core.arena.value(slot);
        }
    }

    [Symbol.iterator](): IterableIterator<T> { return this.values(); }

    /** Elements in ascending order. */
    toArray(): T[] { return Array.from(this); }

    // --- Lookup ---

    find(key: T): TreapIterator<T> { return this.#at(this.#core.find(key)); }
    contains(key: T): boolean { return this.#core.find(key) !== NIL; }
    lowerBound(key: T): TreapIterator<T> { return this.#at(this.#core.lowerBound(key)); }
    upperBound(key: T): TreapIterator<T> { return this.#at(this.#core.upperBound(key)); }

    // --- Insertion ---

    /** Inserts `value` unless an equal element exists. */
    insert(value: T): InsertResult<T> {
        return this.#result(this.#core.insert(value));
    }

    /**
     * Inserts `value` using `hint` as a guess for its position; O(1) when
     * `value` belongs directly before `hint`.
     * @returns Cursor to the inserted element or to the equal one already present.
     */
    insertHint(hint: ConstTreapIterator<T>, value: T): TreapIterator<T> {
        const slot = this.#own(hint, 'insertHint');
        return this.#at(this.#core.insertHint(slot, value).slot);
    }

    insertAll(elements: Iterable<T>): void {
        for (const el of elements) this.#core.insert(el);
    }

    /**
     * Builds the element with `make(...args)`, then inserts it. The element
     * and its priority are produced before the duplicate check.
     */
    emplace<A extends unknown[]>(make: (...args: A) => T, ...args: A): InsertResult<T> {
        const core = this.#core;
        return this.#result(core.emplace(make(...args), v => core.findInsertPos(v)));
    }

    emplaceHint<A extends unknown[]>(
        hint: ConstTreapIterator<T>,
        make: (...args: A) => T,
        ...args: A
    ): TreapIterator<T> {
        const core = this.#core;
        const slot = this.#own(hint, 'emplaceHint');
        return this.#at(core.emplace(make(...args), v => core.findInsertPosHint(slot, v)).slot);
    }

    // --- Erasure ---

    /** @returns Whether an element equal to `key` was removed. */
    erase(key: T): boolean {
        const slot = this.#core.find(key);
        if (slot === NIL) return false;
        this.#core.erase(slot);
        return true;
    }

    /** Removes the element at `position`. @returns Cursor to the following element. */
    eraseAt(position: ConstTreapIterator<T>): TreapIterator<T> {
        const slot = this.#own(position, 'eraseAt');
        if (slot === NIL) throw new EndIteratorError('erase');
        const following = this.#core.successor(slot);
        this.#core.erase(slot);
        return this.#at(following);
    }

    /** Removes [first, last). @returns `last`. */
    eraseRange(first: ConstTreapIterator<T>, last: ConstTreapIterator<T>): TreapIterator<T> {
        let slot = this.#own(first, 'eraseRange');
        const stop = this.#own(last, 'eraseRange');
        while (slot !== stop) {
            if (slot === NIL) throw new EndIteratorError('erase');
            const following = this.#core.successor(slot);
            this.#core.erase(slot);
            slot = following;
        }
        return this.#at(stop);
    }

    clear(): this {
        this.#core.clear();
        return this;
    }

    // --- Value Semantics ---

    /** Deep copy with identical shape and priorities. The source is never modified. */
    clone(): TreapSet<T> {
        const copy = new TreapSet<T>(this.#core.options);
        copy.#core = this.#core.copy();
        return copy;
    }

    /**
     * Copy assignment. From a set: copies its contents and configuration,
     * leaving `this` unchanged if the copy fails. From any other iterable:
     * clears and inserts.
     */
    assign(source: TreapSet<T> | Iterable<T>): this {
        if (source instanceof TreapSet) {
            if (source !== this) this.#core = source.#core.copy();
            return this;
        }
        const elements = Array.from(source);
        this.clear();
        this.insertAll(elements);
        return this;
    }

    /** Move assignment: takes `source`'s contents and leaves it empty. */
    moveAssign(source: TreapSet<T>): this {
        if (source === this) return this;
        this.clear();
        this.swap(source);
        return this;
    }

    /** Exchanges contents and configuration with `other`. O(1). */
    swap(other: TreapSet<T>): void {
        log('swap: %d <-> %d elements', this.size, other.size);
        const core = this.#core;
        this.#core = other.#core;
        other.#core = core;
    }

    /** Element-wise comparison in order, using this set's comparator. */
    equals(other: TreapSet<T>): boolean {
        if (this === other) return true;
        if (this.size !== other.size) return false;
        const cmp = this.comparator;
        const b = other[Symbol.iterator]();
        for (const a of this) {
            const next = b.next();
            if (next.done || cmp(a, next.value) !== 0) return false;
        }
        return true;
    }

    // --- Diagnostics ---

    /** @throws InvariantViolationError if the tree is internally inconsistent. */
    validate(): void { this.#core.validate(); }

    toShape(): TreapShape<T> | null { return this.#core.toShape(); }

    toString(): string { return `{${this.toArray().join(', ')}}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}

/** Free-function form of {@link TreapSet.swap}. */
export function swap<T>(a: TreapSet<T>, b: TreapSet<T>): void {
    a.swap(b);
}
