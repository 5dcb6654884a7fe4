/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { consume, here, type LexerState } from './state.js';

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\r' || ch === '\n';
}

/** Characters that end an atom */
export function isDelimiter(ch: string): boolean {
  return (
    isWhitespace(ch) ||
    ch === '(' ||
    ch === ')' ||
    ch === "'" ||
    ch === '"' ||
    ch === ';'
  );
}

export function makeToken(
  type: TokenType,
  value: string,
  start: SourceLocation,
  end: SourceLocation
): Token {
  return { type, value, span: { start, end } };
}

/** Consume one character and return a token for it */
export function consumeToken(
  state: LexerState,
  type: TokenType,
  start: SourceLocation
): Token {
  const value = consume(state);
  return makeToken(type, value, start, here(state));
}
