/**
 * Cinder Error Tests
 * Structured data and formatting of the error hierarchy
 */

import { describe, expect, it } from 'vitest';
import {
  CINDER_ERROR_CODES,
  CinderError,
  ConfigError,
  HeapError,
  LexerError,
  ParseError,
} from '../../src/index.js';

describe('Cinder Errors', () => {
  it('appends the location to the message', () => {
    const err = new ParseError(
      CINDER_ERROR_CODES.PARSE_UNBALANCED,
      "Unexpected ')'",
      { line: 3, column: 7, offset: 20 }
    );
    expect(err.message).toBe("Unexpected ')' at 3:7");
    expect(err.name).toBe('ParseError');
  });

  it('strips the location in toData', () => {
    const err = new ParseError(
      CINDER_ERROR_CODES.PARSE_EMPTY_INPUT,
      'Expected an expression',
      { line: 1, column: 1, offset: 0 },
      { source: '' }
    );
    expect(err.toData()).toEqual({
      code: 'PARSE_EMPTY_INPUT',
      message: 'Expected an expression',
      location: { line: 1, column: 1, offset: 0 },
      context: { source: '' },
    });
  });

  it('formats with a host formatter', () => {
    const err = new HeapError(
      CINDER_ERROR_CODES.HEAP_DESTROYED,
      'Heap has been destroyed'
    );
    expect(err.format()).toBe('Heap has been destroyed');
    expect(err.format((data) => `[${data.code}] ${data.message}`)).toBe(
      '[HEAP_DESTROYED] Heap has been destroyed'
    );
  });

  it('keeps the hierarchy', () => {
    const lexer = new LexerError(
      CINDER_ERROR_CODES.LEX_INVALID_ESCAPE,
      'Invalid escape sequence: \\q',
      { line: 1, column: 3, offset: 2 }
    );
    const config = new ConfigError(
      CINDER_ERROR_CODES.CONFIG_INVALID,
      'Invalid configuration: must be a mapping',
      '.cinder.yaml'
    );

    expect(lexer).toBeInstanceOf(ParseError);
    expect(lexer).toBeInstanceOf(CinderError);
    expect(config).toBeInstanceOf(CinderError);
    expect(config.context).toEqual({ path: '.cinder.yaml' });
  });
});
