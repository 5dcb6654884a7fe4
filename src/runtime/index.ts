/**
 * Cinder Runtime
 *
 * Public API for evaluating Cinder expressions.
 *
 * Module Structure:
 * - core/: Essential execution engine
 *   - values.ts: Expr handles, value views, list helpers
 *   - heap.ts: Heap allocation and mark-and-sweep collection
 *   - scope.ts: Heap-resident scope chain
 *   - types.ts: Public types (EvalResult, NativeProcedure, RuntimeContext, etc.)
 *   - native.ts: Native construction and argument helpers
 *   - evaluate.ts: Expression evaluation
 *   - print.ts: S-expression printer
 *   - context.ts: Runtime context factory
 *   - execute.ts: Read → eval → collect cycle
 * - ext/: Self-contained extensions
 *   - builtins.ts: Built-in natives
 *   - extensions.ts: Native sets and namespacing
 */

// ============================================================
// PUBLIC TYPES
// ============================================================

export type {
  CollectEvent,
  CycleResult,
  EvalErrorEvent,
  EvalFailure,
  EvalOptions,
  EvalResult,
  EvalSession,
  LogLevel,
  NativeCallEvent,
  NativeFn,
  NativeProcedure,
  NativeReturnEvent,
  ObservabilityCallbacks,
  RuntimeCallbacks,
  RuntimeContext,
  RuntimeOptions,
} from './core/types.js';

// ============================================================
// VALUES AND HEAP
// ============================================================

export {
  arrayToList,
  asNumber,
  asPair,
  atomText,
  type Expr,
  type ExprData,
  type ExprKind,
  isNil,
  listToArray,
  sameExpr,
  symbolName,
} from './core/values.js';

export {
  type CollectStats,
  createHeap,
  destroyHeap,
  Heap,
  type HeapOptions,
} from './core/heap.js';

export {
  bind,
  createScope,
  lookup,
  lookupName,
  pushFrame,
  type Scope,
  type ScopeBinding,
  scopeBindings,
} from './core/scope.js';

// ============================================================
// EVALUATION
// ============================================================

export {
  evalFailure,
  evalSuccess,
  evaluateArgs,
  expectArgs,
  isFailure,
  isNativeProcedure,
  native,
} from './core/native.js';
export { defaultCallbacks, evaluate, MAX_EVAL_DEPTH } from './core/evaluate.js';
export {
  CYCLE_MARKER,
  displayExpr,
  formatExpr,
  MAX_PRINT_DEPTH,
  MAX_PRINT_LENGTH,
  TRUNCATION_MARKER,
} from './core/print.js';
export {
  bindNative,
  collectGarbage,
  createRuntimeContext,
  destroyRuntimeContext,
  evaluateInContext,
} from './core/context.js';
export { execute } from './core/execute.js';

// ============================================================
// EXTENSIONS
// ============================================================

export { BUILTIN_NATIVES } from './ext/builtins.js';
export {
  installNatives,
  type NativeSet,
  prefixNatives,
} from './ext/extensions.js';
