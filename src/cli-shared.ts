/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import { readFileSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { CycleResult } from './runtime/index.js';
import { LexerError } from './lexer/errors.js';
import { ConfigError, HeapError, ParseError } from './types.js';

/**
 * Format error for stderr output
 *
 * @param err - The error to format
 * @returns Formatted error message
 */
export function formatError(err: Error): string {
  if (err instanceof LexerError) {
    return `Lexer error at line ${err.location.line}: ${err.toData().message}`;
  }

  if (err instanceof ParseError) {
    return `Parse error at line ${err.location.line}: ${err.toData().message}`;
  }

  if (err instanceof HeapError) {
    return `Heap error: ${err.message}`;
  }

  if (err instanceof ConfigError) {
    return `${err.message} (${err.path})`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

/**
 * Format a failed cycle for stderr output
 *
 * @returns Formatted message, or undefined for a successful cycle
 */
export function formatCycleError(result: CycleResult): string | undefined {
  switch (result.status) {
    case 'parse-error':
      return `Parse error at line ${result.location.line}: ${result.message.replace(/ at \d+:\d+$/, '')}`;
    case 'eval-error':
      return `Error: ${result.output} (${result.code})`;
    case 'ok':
      return undefined;
  }
}

/** Package version, read from package.json beside the sources */
export function readVersion(): string {
  const packageJsonPath = new URL('../package.json', import.meta.url);
  const packageJson: unknown = JSON.parse(
    readFileSync(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

/**
 * True when the module at `moduleUrl` is the script node was started with.
 * Bin links are resolved, so this also holds for installed binaries.
 */
export function isEntryPoint(moduleUrl: string): boolean {
  const invoked = process.argv[1];
  if (invoked === undefined) return false;
  try {
    return realpathSync(invoked) === fileURLToPath(moduleUrl);
  } catch {
    return false;
  }
}
