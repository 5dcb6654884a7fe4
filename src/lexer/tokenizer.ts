/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { consumeToken, isWhitespace, makeToken } from './helpers.js';
import { readAtom, readString } from './readers.js';
import {
  atEnd,
  consumeWhile,
  createLexerState,
  current,
  here,
  type LexerState,
} from './state.js';

/** Whitespace and `;` comments up to end of line */
function skipTrivia(state: LexerState): void {
  for (;;) {
    consumeWhile(state, isWhitespace);
    if (current(state) !== ';') return;
    consumeWhile(state, (ch) => ch !== '\n');
  }
}

export function nextToken(state: LexerState): Token {
  skipTrivia(state);

  const start = here(state);
  if (atEnd(state)) {
    return makeToken(TOKEN_TYPES.EOF, '', start, start);
  }

  switch (current(state)) {
    case '(':
      return consumeToken(state, TOKEN_TYPES.LPAREN, start);
    case ')':
      return consumeToken(state, TOKEN_TYPES.RPAREN, start);
    case "'":
      return consumeToken(state, TOKEN_TYPES.QUOTE, start);
    case '"':
      return readString(state);
    default:
      return readAtom(state);
  }
}

export function tokenize(source: string): Token[] {
  const state = createLexerState(source);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
