/**
 * @module iterator
 * Bidirectional cursors over a `TreapSet`.
 *
 * A cursor is just (core, slot). Traversal is derived from the parent/child
 * links alone, so erasing an element invalidates only cursors on that
 * element. Stepping is cyclic through end(): `next()` from end() lands on
 * the lowest element and `prev()` from end() on the highest.
 */

import { NIL } from './arena';
import { EndIteratorError, OrderingViolationError } from './errors';
import { TreapCore } from './tree';

/** Read-only cursor. */
export class ConstTreapIterator<T> {
    protected readonly core: TreapCore<T>;
    protected slot: number;

    /** @internal Created by `TreapSet`. */
    constructor(core: TreapCore<T>, slot: number) {
        this.core = core;
        this.slot = slot;
    }

    /** False exactly at end(). */
    get valid(): boolean { return this.slot !== NIL; }

    /** @throws EndIteratorError at end(). */
    get value(): T {
        if (this.slot === NIL) throw new EndIteratorError('dereference');
        return this.core.arena.value(this.slot);
    }

    /** @internal */
    get position(): number { return this.slot; }

    /** @internal */
    belongsTo(core: TreapCore<T>): boolean { return this.core === core; }

    next(): this {
        this.slot = this.core.successor(this.slot);
        return this;
    }

    prev(): this {
        this.slot = this.core.predecessor(this.slot);
        return this;
    }

    clone(): ConstTreapIterator<T> {
        return new ConstTreapIterator(this.core, this.slot);
    }

    equals(other: ConstTreapIterator<T>): boolean {
        return this.core === other.core && this.slot === other.slot;
    }
}

/**
 * Cursor that may also replace the element it points at.
 * Usable anywhere a `ConstTreapIterator` is expected.
 */
export class TreapIterator<T> extends ConstTreapIterator<T> {
    /**
     * Replaces the element in place. The new value must compare equal to the
     * old one, otherwise the tree order would break.
     */
    update(value: T): void {
        if (this.slot === NIL) throw new EndIteratorError('update');
        const current = this.core.arena.value(this.slot);
        if (this.core.options.compare(current, value) !== 0) throw new OrderingViolationError();
        this.core.arena.setValue(this.slot, value);
    }

    override clone(): TreapIterator<T> {
        return new TreapIterator(this.core, this.slot);
    }

    toConst(): ConstTreapIterator<T> {
        return new ConstTreapIterator(this.core, this.slot);
    }
}

/**
 * Walks from the highest element down. Points directly at its element;
 * `base()` gives the forward cursor one past it (so `rbegin().base()` is
 * end() and `rend().base()` is begin()).
 */
export class ReverseTreapIterator<T> {
    readonly #cursor: ConstTreapIterator<T>;

    constructor(cursor: ConstTreapIterator<T>) {
        this.#cursor = cursor.clone();
    }

    get valid(): boolean { return this.#cursor.valid; }
    get value(): T { return this.#cursor.value; }

    next(): this {
        this.#cursor.prev();
        return this;
    }

    prev(): this {
        this.#cursor.next();
        return this;
    }

    base(): ConstTreapIterator<T> {
        return this.#cursor.clone().next();
    }

    clone(): ReverseTreapIterator<T> {
        return new ReverseTreapIterator(this.#cursor);
    }

    equals(other: ReverseTreapIterator<T>): boolean {
        return this.#cursor.equals(other.#cursor);
    }
}
