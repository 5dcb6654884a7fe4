/**
 * Cinder Reader
 * Main entry point and re-exports
 */

import type { Heap } from '../runtime/core/heap.js';
import type { Expr } from '../runtime/core/values.js';
import { ParseError, type SourceLocation } from '../types.js';
import { readExpr } from './reader.js';
import { createParserState, isAtEnd } from './state.js';

// ============================================================
// RESULT TYPES
// ============================================================

/** Failed read: a message and where it applies, never a partial tree */
export interface ParseFailure {
  readonly isError: true;
  readonly message: string;
  readonly location: SourceLocation;
}

/** Result of read(): one expression and the offset just past it */
export type ParseResult =
  | { readonly isError: false; readonly expr: Expr; readonly end: number }
  | ParseFailure;

/** Result of readAll(): every expression in the text */
export type ParseAllResult =
  | { readonly isError: false; readonly exprs: Expr[] }
  | ParseFailure;

function toFailure(error: ParseError): ParseFailure {
  return { isError: true, message: error.message, location: error.location };
}

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Read one expression from source text.
 *
 * Text after the first complete expression is not examined; `end` tells the
 * caller where it starts.
 *
 * @param heap - Heap that will own the expression tree
 * @param source - The source text to read
 * @returns The expression, or a failure with a descriptive message
 *
 * @example
 * ```typescript
 * const result = read(heap, '(rect-apply-force "player" (10 0))');
 * if (result.isError) {
 *   console.log(result.message);
 * }
 * ```
 */
export function read(heap: Heap, source: string): ParseResult {
  const state = createParserState(heap, source);
  try {
    const expr = readExpr(state);
    return { isError: false, expr, end: state.lastEnd };
  } catch (error) {
    if (error instanceof ParseError) return toFailure(error);
    throw error;
  }
}

/**
 * Read every expression in source text.
 * Empty text (or only comments) reads as an empty array.
 */
export function readAll(heap: Heap, source: string): ParseAllResult {
  const state = createParserState(heap, source);
  const exprs: Expr[] = [];
  try {
    while (!isAtEnd(state)) {
      exprs.push(readExpr(state));
    }
    return { isError: false, exprs };
  } catch (error) {
    if (error instanceof ParseError) return toFailure(error);
    throw error;
  }
}

// ============================================================
// RE-EXPORTS
// ============================================================

export { isNumberLiteral, MAX_READ_DEPTH } from './reader.js';
