/**
 * @module ordered-treap
 * Generic ordered set on a randomized treap.
 */

export { TreapSet, swap } from './treap-set';
export type { InsertResult } from './treap-set';
export { ConstTreapIterator, TreapIterator, ReverseTreapIterator } from './iterator';
export { naturalOrder } from './options';
export type { Comparator, TreapSetOptions, ResolvedOptions } from './options';
export { randomPriorities, sequencePriorities, fromFunction, forkPriorities, mulberry32 } from './priority';
export type { Priority, PrioritySource, ForkablePrioritySource } from './priority';
export type { TreapShape } from './tree';
export {
    TreapError,
    CapacityExceededError,
    PrioritySourceExhaustedError,
    EmptySetError,
    EndIteratorError,
    StalePositionError,
    ForeignIteratorError,
    OrderingViolationError,
    InvariantViolationError,
    InvalidOptionError,
} from './errors';
