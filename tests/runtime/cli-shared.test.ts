/**
 * CLI Shared Utilities Tests
 * Tests for formatError, formatCycleError, and readVersion
 */

import { describe, expect, it } from 'vitest';
import {
  formatCycleError,
  formatError,
  readVersion,
} from '../../src/cli-shared.js';
import { LexerError } from '../../src/lexer/errors.js';
import {
  CINDER_ERROR_CODES,
  ConfigError,
  HeapError,
  ParseError,
} from '../../src/types.js';

describe('cli-shared', () => {
  describe('formatError', () => {
    it('formats ParseError as "Parse error at line N: message"', () => {
      const err = new ParseError(
        CINDER_ERROR_CODES.PARSE_UNBALANCED,
        "Unexpected ')'",
        { line: 2, column: 3, offset: 9 }
      );
      expect(formatError(err)).toBe("Parse error at line 2: Unexpected ')'");
    });

    it('formats LexerError as "Lexer error at line N: message"', () => {
      const err = new LexerError(
        CINDER_ERROR_CODES.LEX_UNTERMINATED_STRING,
        'Unterminated string literal',
        { line: 1, column: 4, offset: 3 }
      );
      expect(formatError(err)).toBe(
        'Lexer error at line 1: Unterminated string literal'
      );
    });

    it('formats HeapError', () => {
      const err = new HeapError(
        CINDER_ERROR_CODES.HEAP_EXHAUSTED,
        'Heap exhausted: 4 slots in use'
      );
      expect(formatError(err)).toBe('Heap error: Heap exhausted: 4 slots in use');
    });

    it('formats ConfigError with its path', () => {
      const err = new ConfigError(
        CINDER_ERROR_CODES.CONFIG_INVALID,
        'Invalid configuration: unknown key x',
        '/work/.cinder.yaml'
      );
      expect(formatError(err)).toBe(
        'Invalid configuration: unknown key x (/work/.cinder.yaml)'
      );
    });

    it('formats missing files', () => {
      const err = Object.assign(new Error('ENOENT: no such file'), {
        code: 'ENOENT',
        path: '/levels/missing.yaml',
      });
      expect(formatError(err)).toBe('File not found: /levels/missing.yaml');
    });

    it('passes other errors through', () => {
      expect(formatError(new Error('boom'))).toBe('boom');
    });
  });

  describe('formatCycleError', () => {
    it('formats parse failures without the location suffix', () => {
      expect(
        formatCycleError({
          status: 'parse-error',
          message: "Expected ')' to close list opened at 1:1",
          location: { line: 1, column: 1, offset: 0 },
        })
      ).toBe("Parse error at line 1: Expected ')' to close list opened");
    });

    it('formats evaluation failures with the code', () => {
      expect(
        formatCycleError({
          status: 'eval-error',
          output: 'nope',
          code: CINDER_ERROR_CODES.RUNTIME_UNBOUND_SYMBOL,
        })
      ).toBe('Error: nope (RUNTIME_UNBOUND_SYMBOL)');
    });

    it('returns undefined for success', () => {
      expect(formatCycleError({ status: 'ok', output: '3' })).toBeUndefined();
    });
  });

  describe('readVersion', () => {
    it('reads the package version', () => {
      expect(readVersion()).toBe('0.1.0');
    });
  });
});
