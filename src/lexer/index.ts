/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexerError } from './errors.js';
export { nextToken, tokenize } from './tokenizer.js';
