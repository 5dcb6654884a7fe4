/**
 * Expression Evaluator
 *
 * Walks an expression tree against a scope. The only evaluation rule beyond
 * self-evaluation and symbol lookup is application: the head of a list picks
 * a native, which receives the unevaluated tail.
 *
 * Evaluation is synchronous and runs to completion. `stepLimit` bounds a
 * runaway script; `depthLimit` bounds nesting so deep forms fail instead of
 * exhausting the call stack.
 */

import { CINDER_ERROR_CODES } from '../../types.js';
import type { Heap } from './heap.js';
import { evalFailure, evalSuccess } from './native.js';
import { lookup, type Scope } from './scope.js';
import type {
  EvalOptions,
  EvalResult,
  EvalSession,
  LogLevel,
  ObservabilityCallbacks,
  RuntimeCallbacks,
} from './types.js';
import type { Expr } from './values.js';

/** Default bound on nested applications */
export const MAX_EVAL_DEPTH = 256;

export const defaultCallbacks: RuntimeCallbacks = {
  onLog: (message, level) => {
    if (level === 'warn') {
      console.warn(message);
    } else {
      console.log(message);
    }
  },
};

/** Per-call state of one top-level evaluate() */
class Evaluation implements EvalSession {
  private stepCount = 0;
  private depth = 0;
  private readonly callbacks: RuntimeCallbacks;
  private readonly observability: ObservabilityCallbacks;
  private readonly stepLimit: number | undefined;
  private readonly depthLimit: number;

  constructor(
    private readonly heap: Heap,
    options: EvalOptions
  ) {
    this.callbacks = { ...defaultCallbacks, ...options.callbacks };
    this.observability = options.observability ?? {};
    this.stepLimit = options.stepLimit;
    this.depthLimit = options.depthLimit ?? MAX_EVAL_DEPTH;
  }

  get steps(): number {
    return this.stepCount;
  }

  log(message: string, level: LogLevel = 'info'): void {
    this.callbacks.onLog(message, level);
  }

  evaluate(scope: Scope, expr: Expr): EvalResult {
    const data = this.heap.inspect(expr);
    switch (data.kind) {
      case 'nil':
      case 'number':
      case 'string':
      case 'native':
        return evalSuccess(expr);
      case 'symbol': {
        const value = lookup(this.heap, scope, expr);
        return value === undefined
          ? evalFailure(expr, CINDER_ERROR_CODES.RUNTIME_UNBOUND_SYMBOL)
          : evalSuccess(value);
      }
      case 'pair':
        return this.nested(expr, () =>
          this.apply(scope, expr, data.head, data.tail)
        );
    }
  }

  private nested(form: Expr, run: () => EvalResult): EvalResult {
    if (this.depth >= this.depthLimit) {
      return evalFailure(form, CINDER_ERROR_CODES.RUNTIME_DEPTH_EXCEEDED);
    }
    this.depth++;
    try {
      return run();
    } finally {
      this.depth--;
    }
  }

  private apply(scope: Scope, form: Expr, head: Expr, args: Expr): EvalResult {
    this.stepCount++;
    if (this.stepLimit !== undefined && this.stepCount > this.stepLimit) {
      return evalFailure(form, CINDER_ERROR_CODES.RUNTIME_LIMIT_EXCEEDED);
    }

    const operator = this.resolveOperator(scope, head);
    if (operator.isError) return operator;

    const data = this.heap.inspect(operator.expr);
    if (data.kind !== 'native') {
      return evalFailure(head, CINDER_ERROR_CODES.RUNTIME_NOT_CALLABLE);
    }

    const { procedure } = data;
    this.observability.onNativeCall?.({ name: procedure.name, args });
    const startTime = Date.now();

    const result = procedure.call(this.heap, scope, args, this);

    this.observability.onNativeReturn?.({
      name: procedure.name,
      result,
      durationMs: Date.now() - startTime,
    });
    return result;
  }

  /** Symbols are looked up, nested forms evaluated, anything else used as is */
  private resolveOperator(scope: Scope, head: Expr): EvalResult {
    switch (this.heap.kindOf(head)) {
      case 'symbol':
      case 'pair':
        return this.evaluate(scope, head);
      default:
        return evalSuccess(head);
    }
  }
}

/**
 * Evaluate an expression.
 *
 * @param heap - Heap owning `expr` and `scope`
 * @param scope - Scope for symbol resolution
 * @param expr - Expression to evaluate
 * @param options - Step limit and callbacks for this evaluation
 * @returns The result, or a failure carrying the offending expression
 */
export function evaluate(
  heap: Heap,
  scope: Scope,
  expr: Expr,
  options: EvalOptions = {}
): EvalResult {
  const result = new Evaluation(heap, options).evaluate(scope, expr);
  if (result.isError) {
    options.observability?.onError?.({ expr: result.expr, code: result.code });
  }
  return result;
}

