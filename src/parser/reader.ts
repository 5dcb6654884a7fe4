/**
 * Reader
 * Builds heap expressions from tokens
 */

import type { Expr } from '../runtime/core/values.js';
import { arrayToList } from '../runtime/core/values.js';
import {
  CINDER_ERROR_CODES,
  ParseError,
  type SourceLocation,
  TOKEN_TYPES,
} from '../types.js';
import { advance, check, isAtEnd, peek, type ParserState } from './state.js';

/** Floating-point literal grammar for atoms */
const NUMBER_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/** Deepest nesting of lists and quotes the reader accepts */
export const MAX_READ_DEPTH = 512;

export function isNumberLiteral(text: string): boolean {
  return NUMBER_LITERAL.test(text);
}

/** Read a nested form one level deeper, failing past MAX_READ_DEPTH */
function descend(
  state: ParserState,
  at: SourceLocation,
  readNested: () => Expr
): Expr {
  if (state.depth >= MAX_READ_DEPTH) {
    throw new ParseError(
      CINDER_ERROR_CODES.PARSE_TOO_DEEP,
      `Nesting deeper than ${MAX_READ_DEPTH} levels`,
      at
    );
  }
  state.depth++;
  const expr = readNested();
  state.depth--;
  return expr;
}

/**
 * Read one expression starting at the next token.
 * @internal
 */
export function readExpr(state: ParserState): Expr {
  const token = peek(state);
  const { heap } = state;

  switch (token.type) {
    case TOKEN_TYPES.EOF:
      throw new ParseError(
        CINDER_ERROR_CODES.PARSE_EMPTY_INPUT,
        'Expected an expression',
        token.span.start
      );

    case TOKEN_TYPES.RPAREN:
      throw new ParseError(
        CINDER_ERROR_CODES.PARSE_UNBALANCED,
        "Unexpected ')'",
        token.span.start
      );

    case TOKEN_TYPES.LPAREN:
      return descend(state, token.span.start, () => readList(state));

    case TOKEN_TYPES.QUOTE:
      return descend(state, token.span.start, () => readQuoted(state));

    case TOKEN_TYPES.STRING:
      advance(state);
      return heap.string(token.value);

    case TOKEN_TYPES.ATOM:
      advance(state);
      return isNumberLiteral(token.value)
        ? heap.number(Number(token.value))
        : heap.symbol(token.value);
  }
}

/** 'x reads as (quote x) */
function readQuoted(state: ParserState): Expr {
  advance(state);
  if (isAtEnd(state) || check(state, TOKEN_TYPES.RPAREN)) {
    throw new ParseError(
      CINDER_ERROR_CODES.PARSE_UNEXPECTED_TOKEN,
      "Expected an expression after '",
      peek(state).span.start
    );
  }
  const quoted = readExpr(state);
  return arrayToList(state.heap, [state.heap.symbol('quote'), quoted]);
}

function readList(state: ParserState): Expr {
  const open = advance(state);
  const items: Expr[] = [];

  while (!check(state, TOKEN_TYPES.RPAREN)) {
    if (isAtEnd(state)) {
      throw new ParseError(
        CINDER_ERROR_CODES.PARSE_UNBALANCED,
        "Expected ')' to close list opened",
        open.span.start,
        { endOfInput: peek(state).span.start }
      );
    }
    items.push(readExpr(state));
  }
  advance(state); // consume )

  return arrayToList(state.heap, items);
}
