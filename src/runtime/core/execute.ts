/**
 * Script Execution
 *
 * One read → eval → collect cycle, as an embedder runs it per submitted line.
 */

import { read } from '../../parser/index.js';
import { collectGarbage, evaluateInContext } from './context.js';
import { formatExpr } from './print.js';
import type { CycleResult, RuntimeContext } from './types.js';

/**
 * Read, evaluate, and collect one line of source.
 *
 * The result (or failure payload) is printed before collection, so nothing
 * returned here refers to the heap. Only the root scope survives the
 * collection.
 *
 * @param ctx The runtime context (from createRuntimeContext())
 * @param source One line of script text
 */
export function execute(ctx: RuntimeContext, source: string): CycleResult {
  const parsed = read(ctx.heap, source);
  if (parsed.isError) {
    collectGarbage(ctx);
    return {
      status: 'parse-error',
      message: parsed.message,
      location: parsed.location,
    };
  }

  const result = evaluateInContext(ctx, parsed.expr);
  const output = formatExpr(ctx.heap, result.expr);
  collectGarbage(ctx);

  return result.isError
    ? { status: 'eval-error', output, code: result.code }
    : { status: 'ok', output };
}
