/**
 * @module tree
 * @description
 * The treap engine behind `TreapSet`.
 *
 * A treap is a binary search tree in which every node also carries a random
 * priority. Two orders are kept at once:
 * - BST order on values (via the comparator).
 * - Max-heap order on priorities (a parent's priority is >= its children's).
 *
 * Because priorities are independent random draws, the resulting shape is the
 * one a random insertion order would produce, so the expected height is
 * O(log N) without any balance bookkeeping.
 *
 * Every shape change goes through `rotateLeft` / `rotateRight`.
 * Positions are arena slot indices; `NIL` doubles as the end() position.
 */

import { Header, NIL, NodeArena, emptyHeader } from './arena';
import { CapacityExceededError, InvariantViolationError, StalePositionError } from './errors';
import { createDebugLogger } from './logger';
import { ResolvedOptions } from './options';
import { Priority, forkPriorities } from './priority';

const treeLog = createDebugLogger('ordered-treap:tree');
const copyLog = createDebugLogger('ordered-treap:copy');

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

/**
 * Result of the position locator.
 * `parent === NIL` with kind `left` means "attach as the root of an empty tree".
 */
export type InsertPosition =
    | { readonly kind: 'left'; readonly parent: number }
    | { readonly kind: 'right'; readonly parent: number }
    | { readonly kind: 'duplicate'; readonly slot: number };

export type AttachPosition = Exclude<InsertPosition, { kind: 'duplicate' }>;

export interface InsertOutcome {
    readonly slot: number;
    readonly inserted: boolean;
}

/** Plain snapshot of a subtree, for inspection and tests. */
export interface TreapShape<T> {
    readonly value: T;
    readonly priority: Priority;
    readonly left: TreapShape<T> | null;
    readonly right: TreapShape<T> | null;
}

interface CopyJob {
    readonly from: number;
    readonly parent: number;
    readonly side: 'left' | 'right';
}

// ============================================================================
// 2. CORE
// ============================================================================

export class TreapCore<T> {
    readonly arena: NodeArena<T>;
    readonly header: Header = emptyHeader();
    readonly options: ResolvedOptions<T>;

    constructor(options: ResolvedOptions<T>) {
        this.options = options;
        this.arena = new NodeArena<T>(options.maxSize);
    }

    get size(): number { return this.arena.live; }
    isEmpty(): boolean { return this.header.root === NIL; }

    #resetHeader() {
        this.header.root = NIL;
        this.header.lowest = NIL;
        this.header.highest = NIL;
    }

    // --- Position Locator ---

    /** First slot whose value is not less than `key`, or NIL. */
    lowerBound(key: T): number {
        const { arena } = this;
        const cmp = this.options.compare;
        let x = this.header.root;
        let candidate = NIL;
        while (x !== NIL) {
            if (cmp(arena.value(x), key) >= 0) {
                candidate = x;
                x = arena.left(x);
            } else {
                x = arena.right(x);
            }
        }
        return candidate;
    }

    /** First slot whose value is greater than `key`, or NIL. */
    upperBound(key: T): number {
        const { arena } = this;
        const cmp = this.options.compare;
        let x = this.header.root;
        let candidate = NIL;
        while (x !== NIL) {
            if (cmp(key, arena.value(x)) < 0) {
                candidate = x;
                x = arena.left(x);
            } else {
                x = arena.right(x);
            }
        }
        return candidate;
    }

    find(key: T): number {
        const slot = this.lowerBound(key);
        if (slot === NIL || this.options.compare(key, this.arena.value(slot)) < 0) return NIL;
        return slot;
    }

    /**
     * Descends to the leaf position where `key` would attach.
     * An equal element met on the way is reported as a duplicate; since every
     * element equal to `key` lies on this search path, this is the same answer
     * a `lowerBound` check would give.
     */
    findInsertPos(key: T): InsertPosition {
        const { arena } = this;
        const cmp = this.options.compare;
        let x = this.header.root;
        let parent = NIL;
        let c = -1;
        while (x !== NIL) {
            c = cmp(key, arena.value(x));
            if (c === 0) return { kind: 'duplicate', slot: x };
            parent = x;
            x = c < 0 ? arena.left(x) : arena.right(x);
        }
        return c < 0 ? { kind: 'left', parent } : { kind: 'right', parent };
    }

    /**
     * O(1) placement when `key` belongs right before `hint` (or after the
     * highest element for an end() hint); full descent otherwise.
     */
    findInsertPosHint(hint: number, key: T): InsertPosition {
        const { arena, header } = this;
        const cmp = this.options.compare;

        if (header.root === NIL) return { kind: 'left', parent: NIL };

        if (hint === NIL) {
            if (cmp(arena.value(header.highest), key) < 0) {
                return { kind: 'right', parent: header.highest };
            }
            return this.findInsertPos(key);
        }

        if (cmp(key, arena.value(hint)) < 0) {
            if (hint === header.lowest) return { kind: 'left', parent: hint };

            const before = this.predecessor(hint);
            if (cmp(arena.value(before), key) < 0) {
                // `key` falls strictly between two neighbours: one of the two
                // facing child links is free.
                return arena.right(before) === NIL
                    ? { kind: 'right', parent: before }
                    : { kind: 'left', parent: hint };
            }
        }

        return this.findInsertPos(key);
    }

    // --- Traversal ---

    leftmost(slot: number): number {
        if (slot === NIL) return NIL;
        let x = slot;
        for (let l = this.arena.left(x); l !== NIL; l = this.arena.left(x)) x = l;
        return x;
    }

    rightmost(slot: number): number {
        if (slot === NIL) return NIL;
        let x = slot;
        for (let r = this.arena.right(x); r !== NIL; r = this.arena.right(x)) x = r;
        return x;
    }

    /** In-order successor. Cyclic: the successor of NIL is the lowest slot. */
    successor(slot: number): number {
        if (slot === NIL) return this.header.lowest;
        const { arena } = this;
        const right = arena.right(slot);
        if (right !== NIL) return this.leftmost(right);

        let child = slot;
        let up = arena.parent(slot);
        while (up !== NIL && arena.right(up) === child) {
            child = up;
            up = arena.parent(up);
        }
        return up;
    }

    /** In-order predecessor. Cyclic: the predecessor of NIL is the highest slot. */
    predecessor(slot: number): number {
        if (slot === NIL) return this.header.highest;
        const { arena } = this;
        const left = arena.left(slot);
        if (left !== NIL) return this.rightmost(left);

        let child = slot;
        let up = arena.parent(slot);
        while (up !== NIL && arena.left(up) === child) {
            child = up;
            up = arena.parent(up);
        }
        return up;
    }

    // --- Rotations (In-Place) ---

    /** Points whatever held `from` (grandparent link or root) at `to`. */
    #replaceChild(grand: number, from: number, to: number) {
        if (grand === NIL) {
            this.header.root = to;
        } else if (this.arena.left(grand) === from) {
            this.arena.setLeft(grand, to);
        } else {
            this.arena.setRight(grand, to);
        }
    }

    /**
     * Promotes `pivot`, a left child, into its parent's place.
     *
     * Transformation:
     *       p           x
     *      / \         / \
     *     x   C  -->  A   p
     *    / \             / \
     *   A   B           B   C
     */
    rotateRight(pivot: number) {
        const { arena } = this;
        const parent = arena.parent(pivot);
        const inner = arena.right(pivot);

        arena.setLeft(parent, inner);
        if (inner !== NIL) arena.setParent(inner, parent);

        const grand = arena.parent(parent);
        arena.setParent(pivot, grand);
        this.#replaceChild(grand, parent, pivot);

        arena.setRight(pivot, parent);
        arena.setParent(parent, pivot);
    }

    /**
     * Promotes `pivot`, a right child, into its parent's place.
     *
     * Transformation:
     *     p               y
     *    / \             / \
     *   A   y    -->    p   C
     *      / \         / \
     *     B   C       A   B
     */
    rotateLeft(pivot: number) {
        const { arena } = this;
        const parent = arena.parent(pivot);
        const inner = arena.left(pivot);

        arena.setRight(parent, inner);
        if (inner !== NIL) arena.setParent(inner, parent);

        const grand = arena.parent(parent);
        arena.setParent(pivot, grand);
        this.#replaceChild(grand, parent, pivot);

        arena.setLeft(pivot, parent);
        arena.setParent(parent, pivot);
    }

    // --- Insertion ---

    /**
     * Links a fresh slot at `pos`, then rotates it up while its parent has a
     * strictly lower priority.
     */
    attach(pos: AttachPosition, node: number) {
        const { arena, header } = this;
        const parent = pos.parent;

        arena.setParent(node, parent);
        if (parent === NIL) {
            header.root = node;
            header.lowest = node;
            header.highest = node;
            return;
        }

        if (pos.kind === 'left') {
            arena.setLeft(parent, node);
            if (parent === header.lowest) header.lowest = node;
        } else {
            arena.setRight(parent, node);
            if (parent === header.highest) header.highest = node;
        }

        const priority = arena.priority(node);
        for (let up = arena.parent(node); up !== NIL && arena.priority(up) < priority; up = arena.parent(node)) {
            if (arena.left(up) === node) this.rotateRight(node);
            else this.rotateLeft(node);
        }
    }

    /** Inserts unless an equal element exists. A duplicate draws no priority. */
    insert(value: T): InsertOutcome {
        this.options.admit(value);
        return this.insertAt(this.findInsertPos(value), value);
    }

    insertHint(hint: number, value: T): InsertOutcome {
        this.options.admit(value);
        return this.insertAt(this.findInsertPosHint(hint, value), value);
    }

    insertAt(pos: InsertPosition, value: T): InsertOutcome {
        if (pos.kind === 'duplicate') return { slot: pos.slot, inserted: false };
        const slot = this.#allocate(value, this.options.priorities.next());
        this.attach(pos, slot);
        return { slot, inserted: true };
    }

    #allocate(value: T, priority: Priority): number {
        try {
            return this.arena.allocate(value, priority);
        } catch (err) {
            if (err instanceof CapacityExceededError) treeLog.error('insert: %s', err.message);
            throw err;
        }
    }

    /**
     * Node-first insertion: the priority is drawn before the position is
     * known, so a duplicate still consumes one draw.
     */
    emplace(value: T, locate: (value: T) => InsertPosition): InsertOutcome {
        this.options.admit(value);
        const priority = this.options.priorities.next();
        const pos = locate(value);
        if (pos.kind === 'duplicate') return { slot: pos.slot, inserted: false };
        const slot = this.#allocate(value, priority);
        this.attach(pos, slot);
        return { slot, inserted: true };
    }

    // --- Deletion ---

    /**
     * Rotates `node` down past its higher-priority child until it is a leaf,
     * then unlinks and releases it. On a priority tie the right child rises.
     * @throws StalePositionError if `node` was already released; the tree is untouched.
     */
    erase(node: number) {
        const { arena, header } = this;
        if (!arena.isLive(node)) throw new StalePositionError(node);

        for (;;) {
            const left = arena.left(node);
            const right = arena.right(node);
            if (left !== NIL && (right === NIL || arena.priority(left) > arena.priority(right))) {
                this.rotateRight(left);
            } else if (right !== NIL) {
                this.rotateLeft(right);
            } else {
                break;
            }
        }

        const parent = arena.parent(node);
        if (parent === NIL) {
            this.#resetHeader();
        } else {
            if (arena.left(parent) === node) arena.setLeft(parent, NIL);
            else arena.setRight(parent, NIL);
            if (node === header.lowest) header.lowest = this.leftmost(header.root);
            if (node === header.highest) header.highest = this.rightmost(header.root);
        }

        arena.release(node);
    }

    /** Whole-tree teardown. */
    clear() {
        if (this.isEmpty()) return;
        treeLog.log('clear: releasing %d nodes', this.size);
        this.arena.reset();
        this.#resetHeader();
    }

    // ============================================================================
    // 3. DEEP COPY
    // ============================================================================

    /**
     * Creates an isomorphic core: same shape, same priorities, payloads passed
     * through `cloneValue`. Iterative pre-order walk with an explicit stack.
     *
     * The copy draws later priorities from a fork of this core's source where
     * the source has one. If anything throws midway, every slot built so far
     * is released before the error propagates. `this` is never written to.
     */
    copy(): TreapCore<T> {
        const target = new TreapCore<T>({ ...this.options, priorities: forkPriorities(this.options.priorities) });
        const root = this.header.root;
        if (root === NIL) return target;

        const src = this.arena;
        const dst = target.arena;
        const clone = this.options.cloneValue;
        const built: number[] = [];
        const stack: CopyJob[] = [{ from: root, parent: NIL, side: 'left' }];

        copyLog.log('copy: %d nodes', this.size);
        dst.ensureCapacity(this.size);

        try {
            for (let job = stack.pop(); job !== undefined; job = stack.pop()) {
                const { from, parent, side } = job;
                const slot = dst.allocate(clone(src.value(from)), src.priority(from));
                built.push(slot);

                dst.setParent(slot, parent);
                if (parent === NIL) target.header.root = slot;
                else if (side === 'left') dst.setLeft(parent, slot);
                else dst.setRight(parent, slot);

                const right = src.right(from);
                const left = src.left(from);
                if (right !== NIL) stack.push({ from: right, parent: slot, side: 'right' });
                if (left !== NIL) stack.push({ from: left, parent: slot, side: 'left' });
            }
        } catch (err) {
            copyLog.warn('copy: rolled back %d of %d nodes: %O', built.length, this.size, err);
            for (const slot of built) dst.release(slot);
            target.#resetHeader();
            throw err;
        }

        target.header.lowest = target.leftmost(target.header.root);
        target.header.highest = target.rightmost(target.header.root);
        copyLog.log('copy: done, %d nodes', target.size);
        return target;
    }

    // ============================================================================
    // 4. DIAGNOSTICS
    // ============================================================================

    /**
     * Walks the whole tree and checks links, BST order, uniqueness, heap
     * order, cached extremes and the live count.
     * @throws InvariantViolationError naming the first broken invariant.
     */
    validate() {
        const { arena, header } = this;
        const cmp = this.options.compare;

        if (header.root === NIL) {
            if (header.lowest !== NIL || header.highest !== NIL) {
                throw new InvariantViolationError('extremes', 'empty tree with cached extremes');
            }
            if (arena.live !== 0) {
                throw new InvariantViolationError('size', `empty tree but ${arena.live} live slots`);
            }
            return;
        }

        if (arena.parent(header.root) !== NIL) {
            throw new InvariantViolationError('links', 'root has a parent');
        }

        // In-order walk: strictly increasing <=> BST order + uniqueness.
        const stack: number[] = [];
        let count = 0;
        let previous = NIL;
        let x = header.root;
        while (x !== NIL || stack.length > 0) {
            while (x !== NIL) {
                for (const child of [arena.left(x), arena.right(x)]) {
                    if (child === NIL) continue;
                    if (arena.parent(child) !== x) {
                        throw new InvariantViolationError('links', `slot ${child} does not point back to ${x}`);
                    }
                    if (arena.priority(child) > arena.priority(x)) {
                        throw new InvariantViolationError(
                            'heap-order',
                            `child ${child} (${arena.priority(child)}) outranks parent ${x} (${arena.priority(x)})`,
                        );
                    }
                }
                stack.push(x);
                x = arena.left(x);
            }
            const top = stack.pop();
            if (top === undefined) break;

            if (previous !== NIL) {
                const c = cmp(arena.value(previous), arena.value(top));
                if (c === 0) throw new InvariantViolationError('uniqueness', `slots ${previous} and ${top} compare equal`);
                if (c > 0) throw new InvariantViolationError('bst-order', `slot ${previous} sorts after slot ${top}`);
            }
            previous = top;
            count++;
            x = arena.right(top);
        }

        if (header.lowest !== this.leftmost(header.root)) {
            throw new InvariantViolationError('extremes', 'cached lowest is not the leftmost node');
        }
        if (header.highest !== this.rightmost(header.root)) {
            throw new InvariantViolationError('extremes', 'cached highest is not the rightmost node');
        }
        if (count !== arena.live) {
            throw new InvariantViolationError('size', `${count} reachable nodes but ${arena.live} live slots`);
        }
    }

    toShape(slot: number = this.header.root): TreapShape<T> | null {
        if (slot === NIL) return null;
        return {
            value: this.arena.value(slot),
            priority: this.arena.priority(slot),
            left: this.toShape(this.arena.left(slot)),
            right: this.toShape(this.arena.right(slot)),
        };
    }
}
