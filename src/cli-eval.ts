#!/usr/bin/env node
/**
 * Cinder CLI - Evaluate one expression
 *
 * Usage:
 *   cinder-eval '(+ 1 2)'
 *   cinder-eval --help
 *   cinder-eval --version
 */

import {
  formatCycleError,
  formatError,
  isEntryPoint,
  readVersion,
} from './cli-shared.js';
import { loadConfig } from './config.js';
import {
  createRuntimeContext,
  destroyRuntimeContext,
  execute,
  type CycleResult,
  type RuntimeOptions,
} from './runtime/index.js';

export type EvalCommand =
  | { mode: 'eval'; expression: string }
  | { mode: 'help' }
  | { mode: 'version' };

/**
 * Parse command-line arguments into structured command
 */
export function parseArgs(argv: string[]): EvalCommand {
  // Check for --help and --version in any position
  if (argv.includes('--help')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version')) {
    return { mode: 'version' };
  }

  for (const arg of argv) {
    if (arg.startsWith('--')) {
      throw new Error(`Unknown option: ${arg}`);
    }
  }

  const [expression, ...extra] = argv;
  if (expression === undefined) {
    return { mode: 'help' };
  }
  if (extra.length > 0) {
    throw new Error('Expected a single expression (quote it)');
  }
  return { mode: 'eval', expression };
}

/**
 * Evaluate an expression in a fresh runtime context.
 * Native log output goes through `options.callbacks`, or the console.
 */
export function evaluateExpression(
  expression: string,
  options: RuntimeOptions = {}
): CycleResult {
  const ctx = createRuntimeContext(options);
  try {
    return execute(ctx, expression);
  } finally {
    destroyRuntimeContext(ctx);
  }
}

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`Cinder Expression Evaluator

Usage:
  cinder-eval <expression>    Evaluate a Cinder expression
  cinder-eval --help          Show this help message
  cinder-eval --version       Show version information

Examples:
  cinder-eval '(+ 1 2)'
  cinder-eval '(car (quote (a b c)))'
  cinder-eval '(begin (set x 4) (* x x))'`);
}

/**
 * Entry point for cinder-eval binary
 */
function main(): void {
  try {
    const command = parseArgs(process.argv.slice(2));

    if (command.mode === 'help') {
      showHelp();
      return;
    }

    if (command.mode === 'version') {
      console.log(`cinder-eval ${readVersion()}`);
      return;
    }

    const config = loadConfig(process.cwd());
    const result = evaluateExpression(command.expression, {
      stepLimit: config.stepLimit,
      maxHeapSlots: config.maxHeapSlots,
      builtins: config.builtins,
    });
    const failure = formatCycleError(result);
    if (failure !== undefined) {
      console.error(failure);
      process.exit(1);
    }
    if (result.status === 'ok') {
      console.log(result.output);
    }
  } catch (err) {
    console.error(err instanceof Error ? formatError(err) : String(err));
    process.exit(1);
  }
}

if (isEntryPoint(import.meta.url)) {
  main();
}
