/**
 * Runtime Context Factory
 *
 * Creates and configures the heap, root scope, and callbacks shared by every
 * read → eval → collect cycle. Public API for host applications.
 */

import { BUILTIN_NATIVES } from '../ext/builtins.js';
import { installNatives } from '../ext/extensions.js';
import { defaultCallbacks, evaluate } from './evaluate.js';
import { createHeap, type CollectStats } from './heap.js';
import { native } from './native.js';
import { bind, createScope } from './scope.js';
import type {
  EvalResult,
  NativeFn,
  RuntimeContext,
  RuntimeOptions,
} from './types.js';
import type { Expr } from './values.js';

function validateLimit(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}

/**
 * Create a runtime context for script execution.
 * This is the main entry point for configuring the Cinder runtime.
 */
export function createRuntimeContext(
  options: RuntimeOptions = {}
): RuntimeContext {
  validateLimit('stepLimit', options.stepLimit);
  validateLimit('depthLimit', options.depthLimit);
  validateLimit('maxHeapSlots', options.maxHeapSlots);

  const heap = createHeap({ maxSlots: options.maxHeapSlots });
  const scope = createScope(heap);

  // Set built-in natives
  if (options.builtins ?? true) {
    installNatives(heap, scope, BUILTIN_NATIVES);
  }

  // Set custom natives (shadow built-ins)
  if (options.natives) {
    installNatives(heap, scope, options.natives);
  }

  return {
    heap,
    scope,
    callbacks: { ...defaultCallbacks, ...options.callbacks },
    observability: options.observability ?? {},
    stepLimit: options.stepLimit,
    depthLimit: options.depthLimit,
  };
}

/**
 * Register a host capability under a symbol in the root scope.
 *
 * @example
 * ```typescript
 * bindNative(ctx, 'rect-apply-force', rectApplyForce, level);
 * ```
 */
export function bindNative<C>(
  ctx: RuntimeContext,
  name: string,
  fn: NativeFn<C>,
  hostContext: C
): void {
  const { heap, scope } = ctx;
  const procedure = native(name, fn, hostContext);
  bind(heap, scope, heap.symbol(name), heap.native(procedure));
}

/** Evaluate an expression in the root scope with the context's settings */
export function evaluateInContext(
  ctx: RuntimeContext,
  expr: Expr
): EvalResult {
  return evaluate(ctx.heap, ctx.scope, expr, ctx);
}

/**
 * Collect garbage, keeping the root scope and any extra roots alive.
 * Handles not reachable from them are invalid afterwards.
 */
export function collectGarbage(
  ctx: RuntimeContext,
  extraRoots: Iterable<Expr> = []
): CollectStats {
  const stats = ctx.heap.collect([ctx.scope.expr, ...extraRoots]);
  ctx.observability.onCollect?.({ live: stats.live, freed: stats.freed });
  return stats;
}

/** Tear down the context's heap; returns the number of values freed */
export function destroyRuntimeContext(ctx: RuntimeContext): number {
  return ctx.heap.destroy();
}
