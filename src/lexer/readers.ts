/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { CINDER_ERROR_CODES, TOKEN_TYPES } from '../types.js';
import { LexerError } from './errors.js';
import { isDelimiter, makeToken } from './helpers.js';
import {
  atEnd,
  consume,
  consumeWhile,
  current,
  here,
  type LexerState,
} from './state.js';

/** Process escape sequence and return the unescaped character */
function processEscape(state: LexerState): string {
  const location = here(state);
  const escaped = consume(state);
  switch (escaped) {
    case 'n':
      return '\n';
    case 'r':
      return '\r';
    case 't':
      return '\t';
    case '\\':
      return '\\';
    case '"':
      return '"';
    default:
      throw new LexerError(
        CINDER_ERROR_CODES.LEX_INVALID_ESCAPE,
        `Invalid escape sequence: \\${escaped}`,
        location
      );
  }
}

export function readString(state: LexerState): Token {
  const start = here(state);
  consume(state); // opening "

  let value = '';
  for (;;) {
    value += consumeWhile(state, (ch) => ch !== '"' && ch !== '\\');
    if (current(state) !== '\\') break;
    consume(state); // backslash
    if (atEnd(state)) break;
    value += processEscape(state);
  }

  if (atEnd(state)) {
    throw new LexerError(
      CINDER_ERROR_CODES.LEX_UNTERMINATED_STRING,
      'Unterminated string literal',
      start
    );
  }
  consume(state); // closing "

  return makeToken(TOKEN_TYPES.STRING, value, start, here(state));
}

/** Read a bare atom; the parser decides between number and symbol */
export function readAtom(state: LexerState): Token {
  const start = here(state);
  const value = consumeWhile(state, (ch) => !isDelimiter(ch));
  return makeToken(TOKEN_TYPES.ATOM, value, start, here(state));
}
