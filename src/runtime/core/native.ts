/**
 * Native Procedures
 *
 * Host capabilities callable from script text. Natives are fexprs: they
 * receive the raw argument list and evaluate only what they choose to,
 * through the session they are handed.
 *
 * Public API for host applications.
 */

import { CINDER_ERROR_CODES, type RuntimeErrorCode } from '../../types.js';
import type { Heap } from './heap.js';
import type { Scope } from './scope.js';
import type {
  EvalFailure,
  EvalResult,
  EvalSession,
  NativeFn,
  NativeProcedure,
} from './types.js';
import { listToArray, type Expr } from './values.js';

// ============================================================
// RESULT CONSTRUCTORS
// ============================================================

export function evalSuccess(expr: Expr): EvalResult {
  return { isError: false, expr };
}

export function evalFailure(expr: Expr, code: RuntimeErrorCode): EvalFailure {
  return { isError: true, expr, code };
}

// ============================================================
// NATIVE CONSTRUCTION
// ============================================================

/**
 * Create a native procedure capturing a host context.
 *
 * @example
 * ```typescript
 * const push = native('rect-apply-force', rectApplyForce, level);
 * bind(heap, scope, heap.symbol('rect-apply-force'), heap.native(push));
 * ```
 */
export function native<C>(
  name: string,
  fn: NativeFn<C>,
  context: C
): NativeProcedure {
  return {
    name,
    call: (heap, scope, args, session) =>
      fn(context, heap, scope, args, session),
  };
}

/** Type guard for host values that implement NativeProcedure */
export function isNativeProcedure(value: unknown): value is NativeProcedure {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'call' in value &&
    typeof value.call === 'function'
  );
}

// ============================================================
// ARGUMENT HELPERS
// ============================================================

/**
 * Split a raw argument list, checking its length.
 * Fails with the argument list when it is improper or the wrong size.
 */
export function expectArgs(
  heap: Heap,
  args: Expr,
  min: number,
  max = min
): Expr[] | EvalFailure {
  const items = listToArray(heap, args);
  if (items === undefined) {
    return evalFailure(args, CINDER_ERROR_CODES.RUNTIME_TYPE_ERROR);
  }
  if (items.length < min || items.length > max) {
    return evalFailure(args, CINDER_ERROR_CODES.RUNTIME_ARITY);
  }
  return items;
}

/** Evaluate each argument in order, stopping at the first failure */
export function evaluateArgs(
  session: EvalSession,
  scope: Scope,
  args: readonly Expr[]
): Expr[] | EvalFailure {
  const values: Expr[] = [];
  for (const arg of args) {
    const result = session.evaluate(scope, arg);
    if (result.isError) return result;
    values.push(result.expr);
  }
  return values;
}

/** Narrow helper results: true when a failure was returned */
export function isFailure(value: Expr[] | EvalFailure): value is EvalFailure {
  return !Array.isArray(value);
}
