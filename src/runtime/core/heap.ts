/**
 * Heap and Collector
 *
 * Owns every Cinder value. Values sit in an arena of slots addressed by
 * Expr handles; reclaimed slots are reused with a bumped generation.
 *
 * Collection is explicit and never triggered by allocation. Contract: every
 * Expr the embedder keeps using after `collect` must be reachable from the
 * roots passed to that call. Values captured inside a native's host context
 * are not traced.
 */

import { CINDER_ERROR_CODES, HeapError } from '../../types.js';
import type { NativeProcedure } from './types.js';
import type { Expr, ExprData, ExprKind } from './values.js';

/** Options for creating a heap */
export interface HeapOptions {
  /** Maximum number of slots; allocating past it throws HEAP_EXHAUSTED */
  maxSlots?: number | undefined;
}

/** Outcome of one collection pass */
export interface CollectStats {
  /** Allocations still live after the sweep (including nil) */
  readonly live: number;
  /** Allocations reclaimed by the sweep */
  readonly freed: number;
}

// Internal cell: pairs stay mutable for setHead/setTail
type Cell =
  | { readonly kind: 'nil' }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'symbol'; readonly name: string }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'pair'; head: Expr; tail: Expr }
  | { readonly kind: 'native'; readonly procedure: NativeProcedure };

let nextHeapId = 1;

export class Heap {
  readonly id: number;
  readonly maxSlots: number;

  private cells: (Cell | undefined)[] = [];
  private handles: (Expr | undefined)[] = [];
  private generations: number[] = [];
  private freeSlots: number[] = [];
  private liveCount = 0;
  private destroyed = false;
  private readonly nilExpr: Expr;

  constructor(options: HeapOptions = {}) {
    const maxSlots = options.maxSlots ?? Number.POSITIVE_INFINITY;
    if (!(maxSlots >= 1)) {
      throw new RangeError(`maxSlots must be at least 1, got ${maxSlots}`);
    }
    this.id = nextHeapId++;
    this.maxSlots = maxSlots;
    this.nilExpr = this.allocate({ kind: 'nil' });
  }

  // ============================================================
  // ALLOCATION
  // ============================================================

  /** The nil singleton (always the same handle) */
  nil(): Expr {
    this.assertUsable();
    return this.nilExpr;
  }

  number(value: number): Expr {
    return this.allocate({ kind: 'number', value });
  }

  symbol(name: string): Expr {
    return this.allocate({ kind: 'symbol', name });
  }

  string(value: string): Expr {
    return this.allocate({ kind: 'string', value });
  }

  pair(head: Expr, tail: Expr): Expr {
    this.cell(head);
    this.cell(tail);
    return this.allocate({ kind: 'pair', head, tail });
  }

  /** Alias of pair() */
  cons(head: Expr, tail: Expr): Expr {
    return this.pair(head, tail);
  }

  native(procedure: NativeProcedure): Expr {
    return this.allocate({ kind: 'native', procedure });
  }

  // ============================================================
  // PAIR MUTATION
  // ============================================================

  setHead(pair: Expr, value: Expr): void {
    const cell = this.pairCell(pair, 'setHead');
    this.cell(value);
    cell.head = value;
  }

  setTail(pair: Expr, value: Expr): void {
    const cell = this.pairCell(pair, 'setTail');
    this.cell(value);
    cell.tail = value;
  }

  // ============================================================
  // INSPECTION
  // ============================================================

  /** Read-only view of a live value; pair views follow later mutation */
  inspect(expr: Expr): ExprData {
    return this.cell(expr);
  }

  kindOf(expr: Expr): ExprKind {
    return this.cell(expr).kind;
  }

  /** Whether the handle still names a live allocation of this heap */
  isLive(expr: Expr): boolean {
    if (this.destroyed || expr.heap !== this.id) return false;
    return (
      this.cells[expr.slot] !== undefined &&
      this.generations[expr.slot] === expr.generation
    );
  }

  /** Number of live allocations */
  get size(): number {
    return this.liveCount;
  }

  get isDestroyed(): boolean {
    return this.destroyed;
  }

  /** Enumerate the live set */
  *liveHandles(): IterableIterator<Expr> {
    this.assertUsable();
    for (const handle of this.handles) {
      if (handle !== undefined) yield handle;
    }
  }

  // ============================================================
  // COLLECTION
  // ============================================================

  /**
   * Mark-and-sweep from the given roots only.
   * Marking uses a work-list and a bit set indexed by slot, so shared
   * structure is visited once and cycles terminate.
   */
  collect(roots: Iterable<Expr>): CollectStats {
    this.assertUsable();

    const marks = new Uint8Array(this.cells.length);
    const work: number[] = [this.nilExpr.slot];
    for (const root of roots) {
      this.cell(root);
      work.push(root.slot);
    }

    for (let slot = work.pop(); slot !== undefined; slot = work.pop()) {
      if (marks[slot] === 1) continue;
      marks[slot] = 1;
      const cell = this.cells[slot];
      if (cell?.kind === 'pair') {
        work.push(cell.head.slot, cell.tail.slot);
      }
    }

    let freed = 0;
    for (let slot = 0; slot < marks.length; slot++) {
      if (this.cells[slot] !== undefined && marks[slot] !== 1) {
        this.release(slot);
        freed++;
      }
    }

    return { live: this.liveCount, freed };
  }

  /**
   * Free every allocation regardless of reachability.
   * The heap is unusable afterwards.
   */
  destroy(): number {
    const freed = this.liveCount;
    this.cells = [];
    this.handles = [];
    this.generations = [];
    this.freeSlots = [];
    this.liveCount = 0;
    this.destroyed = true;
    return freed;
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private assertUsable(): void {
    if (this.destroyed) {
      throw new HeapError(
        CINDER_ERROR_CODES.HEAP_DESTROYED,
        'Heap has been destroyed',
        { heap: this.id }
      );
    }
  }

  private allocate(cell: Cell): Expr {
    this.assertUsable();

    let slot = this.freeSlots.pop();
    if (slot === undefined) {
      if (this.cells.length >= this.maxSlots) {
        throw new HeapError(
          CINDER_ERROR_CODES.HEAP_EXHAUSTED,
          `Heap exhausted: ${this.maxSlots} slots in use`,
          { heap: this.id, maxSlots: this.maxSlots }
        );
      }
      slot = this.cells.length;
      this.generations[slot] = 0;
    }

    const handle: Expr = Object.freeze({
      heap: this.id,
      slot,
      generation: this.generations[slot] ?? 0,
    });
    this.cells[slot] = cell;
    this.handles[slot] = handle;
    this.liveCount++;
    return handle;
  }

  private release(slot: number): void {
    this.cells[slot] = undefined;
    this.handles[slot] = undefined;
    this.generations[slot] = (this.generations[slot] ?? 0) + 1;
    this.freeSlots.push(slot);
    this.liveCount--;
  }

  private cell(expr: Expr): Cell {
    this.assertUsable();
    if (expr.heap !== this.id) {
      throw new HeapError(
        CINDER_ERROR_CODES.HEAP_FOREIGN_HANDLE,
        `Handle belongs to heap ${expr.heap}, not heap ${this.id}`,
        { heap: this.id, slot: expr.slot }
      );
    }
    const cell = this.cells[expr.slot];
    if (cell === undefined || this.generations[expr.slot] !== expr.generation) {
      throw new HeapError(
        CINDER_ERROR_CODES.HEAP_STALE_HANDLE,
        `Handle to slot ${expr.slot} was reclaimed by a collection`,
        { heap: this.id, slot: expr.slot, generation: expr.generation }
      );
    }
    return cell;
  }

  private pairCell(
    expr: Expr,
    operation: string
  ): { kind: 'pair'; head: Expr; tail: Expr } {
    const cell = this.cell(expr);
    if (cell.kind !== 'pair') {
      throw new TypeError(`${operation} expects a pair, got ${cell.kind}`);
    }
    return cell;
  }
}

// ============================================================
// LIFECYCLE
// ============================================================

export function createHeap(options: HeapOptions = {}): Heap {
  return new Heap(options);
}

/** Free everything the heap ever tracked; returns the number freed */
export function destroyHeap(heap: Heap): number {
  return heap.destroy();
}
