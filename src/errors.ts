/**
 * @module errors
 * Error hierarchy for the treap container.
 *
 * Logical no-ops (inserting a duplicate, erasing an absent key) never throw.
 * Everything here is either resource exhaustion or a detected misuse.
 */

export class TreapError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Allocation past the configured `maxSize`. */
export class CapacityExceededError extends TreapError {
    readonly capacity: number;

    constructor(capacity: number) {
        super(`CapacityExceeded: set is limited to ${capacity} elements.`);
        this.capacity = capacity;
    }
}

export class PrioritySourceExhaustedError extends TreapError {
    constructor(drawn: number) {
        super(`PrioritySourceExhausted: sequence ran out after ${drawn} priorities.`);
    }
}

export class EmptySetError extends TreapError {
    constructor(op: string) {
        super(`InvalidOperation: Cannot call ${op}() on an empty TreapSet.`);
    }
}

export class EndIteratorError extends TreapError {
    constructor(op: string) {
        super(`InvalidIterator: Cannot ${op} the end() position.`);
    }
}

/** The slot behind an iterator was released by erase/clear. */
export class StalePositionError extends TreapError {
    readonly slot: number;

    constructor(slot: number) {
        super(`StalePosition: slot ${slot} no longer holds an element.`);
        this.slot = slot;
    }
}

export class ForeignIteratorError extends TreapError {
    constructor(op: string) {
        super(`InvalidIterator: ${op}() was given an iterator from another TreapSet.`);
    }
}

export class OrderingViolationError extends TreapError {
    constructor() {
        super('OrderingViolation: update() requires a value that compares equal to the current one.');
    }
}

export class InvariantViolationError extends TreapError {
    readonly invariant: string;

    constructor(invariant: string, detail: string) {
        super(`InvariantViolation [${invariant}]: ${detail}`);
        this.invariant = invariant;
    }
}

export class InvalidOptionError extends TreapError {
    constructor(option: string, detail: string) {
        super(`InvalidOption: '${option}' ${detail}`);
    }
}
