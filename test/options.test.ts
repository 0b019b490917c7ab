import { describe, it, expect, afterEach } from 'vitest';
import debug from 'debug';
import { InvalidOptionError } from '../src/errors';
import { createDebugLogger } from '../src/logger';
import { naturalOrder, resolveOptions } from '../src/options';
import { sequencePriorities } from '../src/priority';

describe('resolveOptions', () => {
    it('fills in defaults', () => {
        const resolved = resolveOptions<number>();
        expect(resolved.compare).toBe(naturalOrder);
        expect(resolved.maxSize).toBe(Infinity);
        expect(resolved.cloneValue(4)).toBe(4);
        expect(Number.isInteger(resolved.priorities.next())).toBe(true);
    });

    it('keeps supplied collaborators', () => {
        const priorities = sequencePriorities([1]);
        const compare = (a: number, b: number) => b - a;
        const resolved = resolveOptions({ compare, priorities, maxSize: 3 });
        expect(resolved.compare).toBe(compare);
        expect(resolved.priorities).toBe(priorities);
        expect(resolved.maxSize).toBe(3);
    });

    it('admits only naturally ordered elements under the default comparator', () => {
        const natural = resolveOptions<number>();
        expect(() => natural.admit(NaN)).toThrow(InvalidOptionError);
        natural.admit(4);

        const custom = resolveOptions<number>({ compare: (a, b) => a - b });
        custom.admit(NaN);
    });

    it('rejects a bad maxSize', () => {
        expect(() => resolveOptions<number>({ maxSize: -1 })).toThrow(InvalidOptionError);
        expect(() => resolveOptions<number>({ maxSize: NaN })).toThrow(InvalidOptionError);
    });
});

describe('naturalOrder', () => {
    it('orders numbers and strings', () => {
        expect(naturalOrder(1, 2)).toBe(-1);
        expect(naturalOrder(2, 1)).toBe(1);
        expect(naturalOrder('a', 'a')).toBe(0);
    });

    it('orders dates by timestamp and rejects other objects', () => {
        expect(naturalOrder(new Date(1000), new Date(4000))).toBe(-1);
        expect(naturalOrder(new Date(4000), new Date(4000))).toBe(0);
        expect(() => naturalOrder({ k: 1 }, { k: 2 })).toThrow(InvalidOptionError);
    });

    it('orders mixed kinds by kind', () => {
        expect(naturalOrder<number | string>(1, 'a')).toBe(-1);
        expect(naturalOrder<number | string>('a', 1)).toBe(1);
        expect(naturalOrder<string | Date>('z', new Date(0))).toBe(-1);
        expect(naturalOrder<number | bigint>(2, 10n)).toBe(-1);
        expect(naturalOrder<number | bigint>(3, 3n)).toBe(0);
    });

    it('rejects NaN and invalid dates', () => {
        expect(() => naturalOrder(NaN, 1)).toThrow("InvalidOption: 'compare' NaN is not supported by the natural ordering.");
        expect(() => naturalOrder(1, NaN)).toThrow(InvalidOptionError);
        expect(() => naturalOrder(new Date(NaN), new Date(0))).toThrow(
            "InvalidOption: 'compare' an invalid Date is not supported by the natural ordering.",
        );
    });
});

describe('createDebugLogger', () => {
    const originalLog = debug.log;

    afterEach(() => {
        debug.log = originalLog;
        debug.disable();
    });

    it('writes to the namespace only when enabled', () => {
        const lines: string[] = [];
        debug.log = (...args: unknown[]) => { lines.push(args.map(String).join(' ')); };

        const logger = createDebugLogger('ordered-treap:probe');
        logger.log('hidden %d', 1);
        expect(lines).toEqual([]);

        debug.enable('ordered-treap:probe*');
        logger.warn('visible %d', 42);
        expect(lines).toHaveLength(1);
        expect(lines[0]).toContain('ordered-treap:probe:warn');
        expect(lines[0]).toContain('visible 42');
    });
});
