/**
 * Scope Chain
 *
 * A scope is a heap list of frames: `(frame . parent-chain)`. Each frame is
 * a list of `(symbol . value)` bindings, newest first. Because the chain is
 * made of ordinary pairs, `scope.expr` is what the embedder passes to
 * `collect` to keep it alive.
 */

import type { Heap } from './heap.js';
import { asPair, symbolName, type Expr } from './values.js';

export interface Scope {
  readonly expr: Expr;
}

/** Binding as reported by scopeBindings() */
export interface ScopeBinding {
  readonly name: string;
  readonly value: Expr;
}

/** Root scope: one empty frame, no parent */
export function createScope(heap: Heap): Scope {
  return { expr: heap.pair(heap.nil(), heap.nil()) };
}

/** Child scope whose lookups fall back to `parent` */
export function pushFrame(heap: Heap, parent: Scope): Scope {
  return { expr: heap.pair(heap.nil(), parent.expr) };
}

/**
 * Prepend a binding to the local frame.
 * Earlier bindings of the same name stay in the frame but are shadowed.
 */
export function bind(heap: Heap, scope: Scope, symbol: Expr, value: Expr): void {
  if (symbolName(heap, symbol) === undefined) {
    throw new TypeError(`bind expects a symbol, got ${heap.kindOf(symbol)}`);
  }
  const chain = chainOf(heap, scope);
  const binding = heap.pair(symbol, value);
  heap.setHead(scope.expr, heap.pair(binding, chain.head));
}

/** Most recent binding of `symbol`, searching outward; undefined when unbound */
export function lookup(heap: Heap, scope: Scope, symbol: Expr): Expr | undefined {
  const name = symbolName(heap, symbol);
  if (name === undefined) return undefined;
  return lookupName(heap, scope, name);
}

/** lookup() by symbol text */
export function lookupName(
  heap: Heap,
  scope: Scope,
  name: string
): Expr | undefined {
  for (
    let frames = asPair(heap, scope.expr);
    frames !== undefined;
    frames = asPair(heap, frames.tail)
  ) {
    for (
      let cursor = asPair(heap, frames.head);
      cursor !== undefined;
      cursor = asPair(heap, cursor.tail)
    ) {
      const binding = asPair(heap, cursor.head);
      if (binding !== undefined && symbolName(heap, binding.head) === name) {
        return binding.tail;
      }
    }
  }
  return undefined;
}

/** Bindings of the local frame, newest first, shadowed ones included */
export function scopeBindings(heap: Heap, scope: Scope): ScopeBinding[] {
  const bindings: ScopeBinding[] = [];
  const chain = chainOf(heap, scope);
  for (
    let cursor = asPair(heap, chain.head);
    cursor !== undefined;
    cursor = asPair(heap, cursor.tail)
  ) {
    const binding = asPair(heap, cursor.head);
    const name = binding && symbolName(heap, binding.head);
    if (binding !== undefined && name !== undefined) {
      bindings.push({ name, value: binding.tail });
    }
  }
  return bindings;
}

function chainOf(heap: Heap, scope: Scope): { head: Expr; tail: Expr } {
  const chain = asPair(heap, scope.expr);
  if (chain === undefined) {
    throw new TypeError('Scope chain must be a pair');
  }
  return chain;
}
