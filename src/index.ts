/**
 * Cinder Module
 * Exports lexer, reader, runtime, console embedding, and error types
 */

export { LexerError, tokenize } from './lexer/index.js';
export {
  MAX_READ_DEPTH,
  read,
  readAll,
  type ParseAllResult,
  type ParseFailure,
  type ParseResult,
} from './parser/index.js';
export * from './runtime/index.js';
export * from './console/index.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  type CinderConfig,
} from './config.js';
export {
  CINDER_ERROR_CODES,
  CinderError,
  ConfigError,
  HeapError,
  ParseError,
  TOKEN_TYPES,
  type CinderErrorCode,
  type CinderErrorData,
  type RuntimeErrorCode,
  type SourceLocation,
  type SourceSpan,
  type Token,
  type TokenType,
} from './types.js';
