/**
 * @module priority
 * Sources of the random balancing key attached to every new node.
 *
 * A priority is a signed 32-bit integer. The treap keeps a max-heap on it,
 * so the expected height stays logarithmic as long as draws are independent
 * of the keys.
 */

import { randomBytes } from 'crypto';
import { PrioritySourceExhaustedError } from './errors';

export type Priority = number;

/** Called once per node created by insertion. */
export interface PrioritySource {
    next(): Priority;
}

/** A source whose state can be duplicated. Copies of a set draw from a fork. */
export interface ForkablePrioritySource extends PrioritySource {
    /** Independent source continuing from the current state. */
    fork(): ForkablePrioritySource;
}

function isForkable(source: PrioritySource): source is ForkablePrioritySource {
    return 'fork' in source && typeof source.fork === 'function';
}

/** The source a copy should draw from: a fork where possible, else `source` itself. */
export function forkPriorities(source: PrioritySource): PrioritySource {
    return isForkable(source) ? source.fork() : source;
}

const GOLDEN = 0x6D2B79F5;

function mix(state: number): number {
    let t = Math.imul(state ^ (state >>> 15), state | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
}

/**
 * Mulberry32 step function. Returns unsigned 32-bit outputs.
 * @param seed - The initial seed value.
 */
export function mulberry32(seed: number): () => number {
    let state = seed | 0;
    return function () {
        state = (state + GOLDEN) | 0;
        return mix(state);
    };
}

function mulberrySource(state: number): ForkablePrioritySource {
    return {
        next: () => {
            state = (state + GOLDEN) | 0;
            return mix(state) | 0;
        },
        fork: () => mulberrySource(state),
    };
}

function entropySeed(): number {
    return randomBytes(4).readInt32LE(0);
}

/**
 * Uniform priorities over the full signed 32-bit range.
 * Without a seed the generator is seeded from process entropy.
 */
export function randomPriorities(seed: number = entropySeed()): ForkablePrioritySource {
    return mulberrySource(seed | 0);
}

/**
 * Replays a fixed list of priorities, then throws.
 * Intended for tests that need a known tree shape.
 */
export function sequencePriorities(values: Iterable<Priority>): ForkablePrioritySource {
    return replay(Array.from(values, v => v | 0), 0);
}

function replay(queue: readonly Priority[], cursor: number): ForkablePrioritySource {
    return {
        next: () => {
            if (cursor >= queue.length) throw new PrioritySourceExhaustedError(cursor);
            return queue[cursor++];
        },
        fork: () => replay(queue, cursor),
    };
}

/** Wraps a plain function. Not forkable, so copies share it. */
export function fromFunction(fn: () => Priority): PrioritySource {
    return { next: () => fn() | 0 };
}
