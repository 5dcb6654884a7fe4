/**
 * Built-in Natives
 *
 * Minimal set of list and arithmetic operations. Host applications provide
 * domain-specific natives via the runtime context.
 *
 * Every builtin is a fexpr like any host native: it evaluates its own
 * arguments through the session.
 */

import { CINDER_ERROR_CODES } from '../../types.js';
import type { Heap } from '../core/heap.js';
import {
  evalFailure,
  evalSuccess,
  evaluateArgs,
  expectArgs,
  isFailure,
} from '../core/native.js';
import { displayExpr } from '../core/print.js';
import { bind, type Scope } from '../core/scope.js';
import type { EvalResult, EvalSession, NativeProcedure } from '../core/types.js';
import {
  arrayToList,
  asNumber,
  asPair,
  symbolName,
  type Expr,
} from '../core/values.js';

type BuiltinFn = (
  heap: Heap,
  scope: Scope,
  args: Expr,
  session: EvalSession
) => EvalResult;

function builtin(name: string, call: BuiltinFn): NativeProcedure {
  return { name, call };
}

// ============================================================
// ARITHMETIC
// ============================================================

/**
 * Fold numeric arguments left to right.
 * With one argument, `unary` applies (negation, reciprocal).
 */
function arithmetic(
  name: string,
  identity: number | undefined,
  op: (a: number, b: number) => number,
  unary: (a: number) => number = (a) => a
): NativeProcedure {
  return builtin(name, (heap, scope, args, session) => {
    const items = expectArgs(
      heap,
      args,
      identity === undefined ? 1 : 0,
      Number.POSITIVE_INFINITY
    );
    if (isFailure(items)) return items;

    const values = evaluateArgs(session, scope, items);
    if (isFailure(values)) return values;

    const numbers: number[] = [];
    for (const [index, value] of values.entries()) {
      const n = asNumber(heap, value);
      if (n === undefined) {
        return evalFailure(
          items[index] ?? args,
          CINDER_ERROR_CODES.RUNTIME_TYPE_ERROR
        );
      }
      numbers.push(n);
    }

    const [first, ...rest] = numbers;
    if (first === undefined) return evalSuccess(heap.number(identity ?? 0));
    if (rest.length === 0) {
      const result =
        identity === undefined ? unary(first) : op(identity, first);
      return evalSuccess(heap.number(result));
    }
    return evalSuccess(heap.number(rest.reduce(op, first)));
  });
}

// ============================================================
// LIST OPERATIONS
// ============================================================

/** car/cdr: evaluate one argument, which must be a pair */
function pairAccessor(name: string, field: 'head' | 'tail'): NativeProcedure {
  return builtin(name, (heap, scope, args, session) => {
    const items = expectArgs(heap, args, 1);
    if (isFailure(items)) return items;

    const values = evaluateArgs(session, scope, items);
    if (isFailure(values)) return values;

    const [arg] = items;
    const [value] = values;
    const pair = value === undefined ? undefined : asPair(heap, value);
    if (arg === undefined || pair === undefined) {
      return evalFailure(arg ?? args, CINDER_ERROR_CODES.RUNTIME_TYPE_ERROR);
    }
    return evalSuccess(pair[field]);
  });
}

// ============================================================
// BUILT-IN TABLE
// ============================================================

export const BUILTIN_NATIVES: Record<string, NativeProcedure> = {
  /** Return the single argument unevaluated */
  quote: builtin('quote', (heap, _scope, args) => {
    const items = expectArgs(heap, args, 1);
    if (isFailure(items)) return items;
    const [quoted] = items;
    return quoted === undefined
      ? evalFailure(args, CINDER_ERROR_CODES.RUNTIME_ARITY)
      : evalSuccess(quoted);
  }),

  /** Evaluate arguments and collect them into a list */
  list: builtin('list', (heap, scope, args, session) => {
    const items = expectArgs(heap, args, 0, Number.POSITIVE_INFINITY);
    if (isFailure(items)) return items;
    const values = evaluateArgs(session, scope, items);
    if (isFailure(values)) return values;
    return evalSuccess(arrayToList(heap, values));
  }),

  cons: builtin('cons', (heap, scope, args, session) => {
    const items = expectArgs(heap, args, 2);
    if (isFailure(items)) return items;
    const values = evaluateArgs(session, scope, items);
    if (isFailure(values)) return values;
    const [head, tail] = values;
    if (head === undefined || tail === undefined) {
      return evalFailure(args, CINDER_ERROR_CODES.RUNTIME_ARITY);
    }
    return evalSuccess(heap.pair(head, tail));
  }),

  car: pairAccessor('car', 'head'),
  cdr: pairAccessor('cdr', 'tail'),

  '+': arithmetic('+', 0, (a, b) => a + b),
  '-': arithmetic('-', undefined, (a, b) => a - b, (a) => -a),
  '*': arithmetic('*', 1, (a, b) => a * b),
  '/': arithmetic('/', undefined, (a, b) => a / b, (a) => 1 / a),

  /** Evaluate arguments in order and return the last */
  begin: builtin('begin', (heap, scope, args, session) => {
    const items = expectArgs(heap, args, 0, Number.POSITIVE_INFINITY);
    if (isFailure(items)) return items;
    let last: EvalResult = evalSuccess(heap.nil());
    for (const item of items) {
      last = session.evaluate(scope, item);
      if (last.isError) return last;
    }
    return last;
  }),

  /** (set name expr): bind name in the current scope, shadowing */
  set: builtin('set', (heap, scope, args, session) => {
    const items = expectArgs(heap, args, 2);
    if (isFailure(items)) return items;
    const [name, valueExpr] = items;
    if (name === undefined || valueExpr === undefined) {
      return evalFailure(args, CINDER_ERROR_CODES.RUNTIME_ARITY);
    }
    if (symbolName(heap, name) === undefined) {
      return evalFailure(name, CINDER_ERROR_CODES.RUNTIME_TYPE_ERROR);
    }
    const value = session.evaluate(scope, valueExpr);
    if (value.isError) return value;
    bind(heap, scope, name, value.expr);
    return value;
  }),

  /** Evaluate arguments and write them to the host log */
  print: builtin('print', (heap, scope, args, session) => {
    const items = expectArgs(heap, args, 0, Number.POSITIVE_INFINITY);
    if (isFailure(items)) return items;
    const values = evaluateArgs(session, scope, items);
    if (isFailure(values)) return values;
    session.log(values.map((value) => displayExpr(heap, value)).join(' '));
    return evalSuccess(heap.nil());
  }),
};
