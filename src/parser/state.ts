/**
 * Parser State
 * Lazy token stream over the lexer
 */

import { nextToken } from '../lexer/index.js';
import { createLexerState, type LexerState } from '../lexer/state.js';
import type { Heap } from '../runtime/core/heap.js';
import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly heap: Heap;
  readonly lexer: LexerState;
  /** Next token, lexed on first peek */
  lookahead: Token | undefined;
  /** Offset just past the last consumed token */
  lastEnd: number;
  /** Lists and quotes currently open */
  depth: number;
}

export function createParserState(heap: Heap, source: string): ParserState {
  return {
    heap,
    lexer: createLexerState(source),
    lookahead: undefined,
    lastEnd: 0,
    depth: 0,
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/**
 * Tokens are lexed one at a time, so input after a complete expression is
 * never examined by read().
 * @internal
 */
export function peek(state: ParserState): Token {
  if (state.lookahead === undefined) {
    state.lookahead = nextToken(state.lexer);
  }
  return state.lookahead;
}

/** @internal */
export function check(state: ParserState, type: string): boolean {
  return peek(state).type === type;
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return check(state, TOKEN_TYPES.EOF);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = peek(state);
  if (token.type !== TOKEN_TYPES.EOF) {
    state.lookahead = undefined;
    state.lastEnd = token.span.end.offset;
  }
  return token;
}
