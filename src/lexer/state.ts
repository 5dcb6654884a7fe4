/**
 * Lexer State
 * A cursor over the source text; `at` is where the next character sits
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  at: SourceLocation;
}

export function createLexerState(source: string): LexerState {
  return { source, at: { line: 1, column: 1, offset: 0 } };
}

/** Snapshot of the cursor, safe to keep in a token span */
export function here(state: LexerState): SourceLocation {
  return { ...state.at };
}

/** Next character, or '' at end of input */
export function current(state: LexerState): string {
  return state.source[state.at.offset] ?? '';
}

export function atEnd(state: LexerState): boolean {
  return state.at.offset >= state.source.length;
}

/** Move past one character and return it */
export function consume(state: LexerState): string {
  const ch = current(state);
  const { line, column, offset } = state.at;
  state.at =
    ch === '\n'
      ? { line: line + 1, column: 1, offset: offset + 1 }
      : { line, column: column + 1, offset: offset + 1 };
  return ch;
}

/** Consume characters while `accept` holds; returns the consumed text */
export function consumeWhile(
  state: LexerState,
  accept: (ch: string) => boolean
): string {
  const from = state.at.offset;
  while (!atEnd(state) && accept(current(state))) {
    consume(state);
  }
  return state.source.slice(from, state.at.offset);
}
