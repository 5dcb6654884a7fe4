/**
 * Runtime Types
 *
 * Public types for evaluation results, native procedures, and runtime
 * configuration. These types are the primary interface for host applications.
 */

import type { RuntimeErrorCode, SourceLocation } from '../../types.js';
import type { Heap } from './heap.js';
import type { Scope } from './scope.js';
import type { Expr } from './values.js';

// ============================================================
// EVALUATION RESULTS
// ============================================================

/**
 * Outcome of evaluating an expression.
 * A failure carries the offending expression itself, plus a code.
 */
export type EvalResult =
  | { readonly isError: false; readonly expr: Expr }
  | {
      readonly isError: true;
      readonly expr: Expr;
      readonly code: RuntimeErrorCode;
    };

export type EvalFailure = Extract<EvalResult, { isError: true }>;

// ============================================================
// NATIVE PROCEDURES
// ============================================================

export type LogLevel = 'info' | 'warn';

/**
 * One top-level evaluation in flight.
 * Natives use it to evaluate sub-expressions under the same step budget
 * and to report through the host log channel.
 */
export interface EvalSession {
  /** Applications dispatched so far */
  readonly steps: number;
  /** Evaluate an expression within this session */
  evaluate(scope: Scope, expr: Expr): EvalResult;
  /** Send a line to the host log channel */
  log(message: string, level?: LogLevel): void;
}

/**
 * Host-supplied callable (fexpr).
 * Receives its argument list unevaluated and decides what to evaluate.
 */
export interface NativeProcedure {
  readonly name: string;
  call(heap: Heap, scope: Scope, args: Expr, session: EvalSession): EvalResult;
}

/**
 * Native function signature.
 * `context` is the host value captured when the native was created.
 */
export type NativeFn<C> = (
  context: C,
  heap: Heap,
  scope: Scope,
  args: Expr,
  session: EvalSession
) => EvalResult;

// ============================================================
// CALLBACKS
// ============================================================

/** I/O callbacks for runtime operations */
export interface RuntimeCallbacks {
  /** Called when a native writes to the host log */
  onLog: (message: string, level: LogLevel) => void;
}

/** Observability callbacks for monitoring execution */
export interface ObservabilityCallbacks {
  /** Called before a native is invoked */
  onNativeCall?: (event: NativeCallEvent) => void;
  /** Called after a native returns */
  onNativeReturn?: (event: NativeReturnEvent) => void;
  /** Called when a top-level evaluation fails */
  onError?: (event: EvalErrorEvent) => void;
  /** Called after a collection pass */
  onCollect?: (event: CollectEvent) => void;
}

/** Event emitted before a native call */
export interface NativeCallEvent {
  /** Native name */
  name: string;
  /** Unevaluated argument list */
  args: Expr;
}

/** Event emitted after a native returns */
export interface NativeReturnEvent {
  /** Native name */
  name: string;
  /** Result returned by the native */
  result: EvalResult;
  /** Execution time in milliseconds */
  durationMs: number;
}

/** Event emitted when a top-level evaluation fails */
export interface EvalErrorEvent {
  /** Offending expression */
  expr: Expr;
  /** Failure code */
  code: RuntimeErrorCode;
}

/** Event emitted after a collection */
export interface CollectEvent {
  /** Allocations still live */
  live: number;
  /** Allocations reclaimed */
  freed: number;
}

// ============================================================
// CONFIGURATION
// ============================================================

/** Options for a single top-level evaluation */
export interface EvalOptions {
  /** Maximum application steps (undefined = unbounded) */
  stepLimit?: number | undefined;
  /** Maximum nesting of applications (default MAX_EVAL_DEPTH) */
  depthLimit?: number | undefined;
  /** I/O callbacks */
  callbacks?: Partial<RuntimeCallbacks> | undefined;
  /** Observability callbacks */
  observability?: ObservabilityCallbacks | undefined;
}

/** Options for creating a runtime context */
export interface RuntimeOptions extends EvalOptions {
  /** Heap slot limit */
  maxHeapSlots?: number | undefined;
  /** Install the builtin natives (default true) */
  builtins?: boolean | undefined;
  /** Extra natives bound in the root scope, by symbol name */
  natives?: Record<string, NativeProcedure> | undefined;
}

/** Heap, root scope, and settings shared by every cycle */
export interface RuntimeContext {
  readonly heap: Heap;
  /** Root scope; always passed to collection */
  readonly scope: Scope;
  readonly callbacks: RuntimeCallbacks;
  readonly observability: ObservabilityCallbacks;
  readonly stepLimit: number | undefined;
  readonly depthLimit: number | undefined;
}

/** Result of one read → eval → collect cycle */
export type CycleResult =
  | {
      readonly status: 'parse-error';
      readonly message: string;
      readonly location: SourceLocation;
    }
  | {
      readonly status: 'eval-error';
      /** Printed form of the offending expression */
      readonly output: string;
      readonly code: RuntimeErrorCode;
    }
  | {
      readonly status: 'ok';
      /** Printed form of the result */
      readonly output: string;
    };
