/**
 * Cinder Lexer Tests
 */

import { describe, expect, it } from 'vitest';
import {
  CINDER_ERROR_CODES,
  LexerError,
  tokenize,
  TOKEN_TYPES,
} from '../../src/index.js';
import { captureError } from '../helpers/runtime.js';

describe('Cinder Lexer', () => {
  it('tokenizes parentheses, quotes, strings, and atoms', () => {
    expect(tokenize('(a "b" \'c)').map((t) => t.type)).toEqual([
      TOKEN_TYPES.LPAREN,
      TOKEN_TYPES.ATOM,
      TOKEN_TYPES.STRING,
      TOKEN_TYPES.QUOTE,
      TOKEN_TYPES.ATOM,
      TOKEN_TYPES.RPAREN,
      TOKEN_TYPES.EOF,
    ]);
  });

  it('ends atoms at delimiters', () => {
    expect(tokenize('ab(cd)ef"g"').map((t) => t.value)).toEqual([
      'ab',
      '(',
      'cd',
      ')',
      'ef',
      'g',
      '',
    ]);
  });

  it('processes string escapes', () => {
    const [token] = tokenize('"a\\nb\\t\\"c\\\\"');
    expect(token?.value).toBe('a\nb\t"c\\');
  });

  it('skips comments and tracks locations', () => {
    const [token] = tokenize('; hi\n x');
    expect(token).toEqual({
      type: TOKEN_TYPES.ATOM,
      value: 'x',
      span: {
        start: { line: 2, column: 2, offset: 6 },
        end: { line: 2, column: 3, offset: 7 },
      },
    });
  });

  it('ends at a comment that runs to end of input', () => {
    const tokens = tokenize('a ; trailing');
    expect(tokens.map((t) => t.type)).toEqual([
      TOKEN_TYPES.ATOM,
      TOKEN_TYPES.EOF,
    ]);
    expect(tokens[1]?.span.start).toEqual({ line: 1, column: 13, offset: 12 });
  });

  it('reports an unterminated string at its opening quote', () => {
    const err = captureError(() => tokenize('  "abc'), LexerError);
    expect(err.code).toBe(CINDER_ERROR_CODES.LEX_UNTERMINATED_STRING);
    expect(err.location).toEqual({ line: 1, column: 3, offset: 2 });
    expect(err.message).toBe('Unterminated string literal at 1:3');
  });

  it('reports an invalid escape at the escaped character', () => {
    const err = captureError(() => tokenize('"\\q"'), LexerError);
    expect(err.code).toBe(CINDER_ERROR_CODES.LEX_INVALID_ESCAPE);
    expect(err.toData().message).toBe('Invalid escape sequence: \\q');
    expect(err.location).toEqual({ line: 1, column: 3, offset: 2 });
  });
});
