/**
 * Lexer Errors
 */

import { ParseError } from '../types.js';
import type { CinderErrorCode, SourceLocation } from '../types.js';

export class LexerError extends ParseError {
  constructor(
    code: CinderErrorCode,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super(code, message, location, context);
    this.name = 'LexerError';
  }
}
