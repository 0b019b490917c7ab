import { InvalidOptionError } from './errors';
import { PrioritySource, randomPriorities } from './priority';

/** Three-way comparator. Must be a strict weak ordering. */
export type Comparator<T> = (a: T, b: T) => number;

export interface TreapSetOptions<T> {
    /** Ordering of elements. Defaults to the natural `<` ordering. */
    compare?: Comparator<T>;
    /** Balancing key source. Defaults to {@link randomPriorities}. */
    priorities?: PrioritySource;
    /** Upper bound on live elements. Defaults to `Infinity`. */
    maxSize?: number;
    /** Payload copy used by `clone()` and `assign()`. Defaults to identity. */
    cloneValue?: (value: T) => T;
}

export interface ResolvedOptions<T> {
    readonly compare: Comparator<T>;
    readonly priorities: PrioritySource;
    readonly maxSize: number;
    readonly cloneValue: (value: T) => T;
    /** Runs before a new element is placed. Throws if it cannot be ordered. */
    readonly admit: (value: T) => void;
}

// Sort order across kinds: numbers and bigints (0) < strings (1) < dates (2).
function rankOf(v: unknown): number {
    if (typeof v === 'number') {
        if (Number.isNaN(v)) throw new InvalidOptionError('compare', 'NaN is not supported by the natural ordering.');
        return 0;
    }
    if (typeof v === 'bigint') return 0;
    if (typeof v === 'string') return 1;
    if (v instanceof Date) {
        if (Number.isNaN(v.getTime())) throw new InvalidOptionError('compare', 'an invalid Date is not supported by the natural ordering.');
        return 2;
    }
    throw new InvalidOptionError('compare', 'is required for elements that are not numbers, strings, bigints or dates.');
}

function threeWay(a: number | bigint | string, b: number | bigint | string): number {
    if (a < b) return -1;
    if (b < a) return 1;
    return 0;
}

/**
 * Default comparator. Numbers and bigints compare by value, strings with
 * `<`, dates by timestamp; mixed kinds order by kind. NaN, invalid dates
 * and every other kind of element throw `InvalidOptionError`.
 */
export function naturalOrder<T>(a: T, b: T): number {
    const rank = rankOf(a) - rankOf(b);
    if (rank !== 0) return rank < 0 ? -1 : 1;
    if (a instanceof Date && b instanceof Date) return threeWay(a.getTime(), b.getTime());
    if (typeof a === 'string' && typeof b === 'string') return threeWay(a, b);
    if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
        return threeWay(a, b);
    }
    return 0;
}

function identity<T>(value: T): T { return value; }

function admitNaturallyOrdered(value: unknown): void { rankOf(value); }

function admitAny(): void {}

export function resolveOptions<T>(options: TreapSetOptions<T> = {}): ResolvedOptions<T> {
    const { compare = naturalOrder, maxSize = Infinity, cloneValue = identity } = options;

    if (typeof compare !== 'function') {
        throw new InvalidOptionError('compare', 'must be a function (a, b) => number.');
    }
    if (typeof cloneValue !== 'function') {
        throw new InvalidOptionError('cloneValue', 'must be a function.');
    }
    if (maxSize !== Infinity && !(Number.isInteger(maxSize) && maxSize > 0)) {
        throw new InvalidOptionError('maxSize', `must be a positive integer or Infinity, got ${maxSize}.`);
    }

    return {
        compare,
        priorities: options.priorities ?? randomPriorities(),
        maxSize,
        cloneValue,
        admit: options.compare === undefined ? admitNaturallyOrdered : admitAny,
    };
}
