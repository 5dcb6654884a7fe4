/**
 * Cinder Value Types and Utilities
 *
 * Every runtime value lives in a Heap slot and is referred to by an Expr
 * handle. Public API for host applications.
 */

import type { Heap } from './heap.js';
import type { NativeProcedure } from './types.js';

/**
 * Opaque handle to a heap-resident value.
 * `generation` changes every time the slot is reclaimed, so a handle that
 * outlived its value is rejected instead of aliasing a newer one.
 */
export interface Expr {
  readonly heap: number;
  readonly slot: number;
  readonly generation: number;
}

export type ExprKind = 'nil' | 'number' | 'symbol' | 'string' | 'pair' | 'native';

/** Read-only view of the value behind a handle */
export type ExprData =
  | { readonly kind: 'nil' }
  | { readonly kind: 'number'; readonly value: number }
  | { readonly kind: 'symbol'; readonly name: string }
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'pair'; readonly head: Expr; readonly tail: Expr }
  | { readonly kind: 'native'; readonly procedure: NativeProcedure };

/** Handle identity: same heap, same slot, same generation */
export function sameExpr(a: Expr, b: Expr): boolean {
  return (
    a.heap === b.heap && a.slot === b.slot && a.generation === b.generation
  );
}

// ============================================================
// NARROWING ACCESSORS
// ============================================================

export function isNil(heap: Heap, expr: Expr): boolean {
  return heap.kindOf(expr) === 'nil';
}

export function asNumber(heap: Heap, expr: Expr): number | undefined {
  const data = heap.inspect(expr);
  return data.kind === 'number' ? data.value : undefined;
}

export function symbolName(heap: Heap, expr: Expr): string | undefined {
  const data = heap.inspect(expr);
  return data.kind === 'symbol' ? data.name : undefined;
}

export function asPair(
  heap: Heap,
  expr: Expr
): { readonly head: Expr; readonly tail: Expr } | undefined {
  const data = heap.inspect(expr);
  return data.kind === 'pair' ? data : undefined;
}

/** Text of a symbol or string atom */
export function atomText(heap: Heap, expr: Expr): string | undefined {
  const data = heap.inspect(expr);
  if (data.kind === 'symbol') return data.name;
  if (data.kind === 'string') return data.value;
  return undefined;
}

// ============================================================
// LISTS
// ============================================================

/**
 * Elements of a proper list.
 * Returns undefined for an improper or cyclic list.
 */
export function listToArray(heap: Heap, list: Expr): Expr[] | undefined {
  const items: Expr[] = [];
  const seen = new Set<number>();
  let cursor = list;
  for (;;) {
    const data = heap.inspect(cursor);
    if (data.kind === 'nil') return items;
    if (data.kind !== 'pair' || seen.has(cursor.slot)) return undefined;
    seen.add(cursor.slot);
    items.push(data.head);
    cursor = data.tail;
  }
}

/** Build a right-nested list, terminated by `tail` (nil by default) */
export function arrayToList(heap: Heap, items: Expr[], tail?: Expr): Expr {
  let list = tail ?? heap.nil();
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (item !== undefined) {
      list = heap.pair(item, list);
    }
  }
  return list;
}
