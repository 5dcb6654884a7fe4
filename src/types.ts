/**
 * Cinder Shared Types
 * Source locations, error hierarchy, and token types
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Error codes for programmatic handling */
export const CINDER_ERROR_CODES = {
  // Lexer errors
  LEX_UNTERMINATED_STRING: 'LEX_UNTERMINATED_STRING',
  LEX_INVALID_ESCAPE: 'LEX_INVALID_ESCAPE',

  // Parse errors
  PARSE_EMPTY_INPUT: 'PARSE_EMPTY_INPUT',
  PARSE_UNBALANCED: 'PARSE_UNBALANCED',
  PARSE_UNEXPECTED_TOKEN: 'PARSE_UNEXPECTED_TOKEN',
  PARSE_TOO_DEEP: 'PARSE_TOO_DEEP',

  // Runtime errors (carried by failed EvalResults)
  RUNTIME_UNBOUND_SYMBOL: 'RUNTIME_UNBOUND_SYMBOL',
  RUNTIME_NOT_CALLABLE: 'RUNTIME_NOT_CALLABLE',
  RUNTIME_TYPE_ERROR: 'RUNTIME_TYPE_ERROR',
  RUNTIME_ARITY: 'RUNTIME_ARITY',
  RUNTIME_LIMIT_EXCEEDED: 'RUNTIME_LIMIT_EXCEEDED',
  RUNTIME_DEPTH_EXCEEDED: 'RUNTIME_DEPTH_EXCEEDED',

  // Heap errors
  HEAP_EXHAUSTED: 'HEAP_EXHAUSTED',
  HEAP_DESTROYED: 'HEAP_DESTROYED',
  HEAP_STALE_HANDLE: 'HEAP_STALE_HANDLE',
  HEAP_FOREIGN_HANDLE: 'HEAP_FOREIGN_HANDLE',

  // Configuration errors
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_UNREADABLE: 'CONFIG_UNREADABLE',
} as const;

export type CinderErrorCode =
  (typeof CINDER_ERROR_CODES)[keyof typeof CINDER_ERROR_CODES];

/** Codes a failed evaluation may carry */
export type RuntimeErrorCode = Extract<CinderErrorCode, `RUNTIME_${string}`>;

/** Structured error data for host applications */
export interface CinderErrorData {
  readonly code: CinderErrorCode;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all Cinder errors.
 * Provides structured data for host applications to format as needed.
 */
export class CinderError extends Error {
  readonly code: CinderErrorCode;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: CinderErrorData) {
    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'CinderError';
    this.code = data.code;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): CinderErrorData {
    return {
      code: this.code,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: CinderErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/** Parse-time errors */
export class ParseError extends CinderError {
  // Parse errors always point into the source
  override readonly location: SourceLocation;

  constructor(
    code: CinderErrorCode,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ code, message, location, context });
    this.name = 'ParseError';
    this.location = location;
  }
}

/**
 * Heap errors.
 * Raised for conditions the runtime cannot recover from locally:
 * exhaustion, use after destroy, and handles that no longer name a live slot.
 */
export class HeapError extends CinderError {
  constructor(
    code: CinderErrorCode,
    message: string,
    context?: Record<string, unknown>
  ) {
    super({ code, message, context });
    this.name = 'HeapError';
  }
}

/** Configuration loading and validation errors */
export class ConfigError extends CinderError {
  readonly path: string;

  constructor(code: CinderErrorCode, message: string, path: string) {
    super({ code, message, context: { path } });
    this.name = 'ConfigError';
    this.path = path;
  }
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  QUOTE: 'QUOTE',
  STRING: 'STRING',
  ATOM: 'ATOM',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}
