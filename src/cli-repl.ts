#!/usr/bin/env node
/**
 * Cinder CLI - Interactive console
 *
 * Usage:
 *   cinder-repl
 *   cinder-repl --level level.yaml
 */

import * as readline from 'node:readline';
import {
  formatError,
  isEntryPoint,
  readVersion,
} from './cli-shared.js';
import { loadConfig, type CinderConfig } from './config.js';
import {
  Level,
  loadLevel,
  ScriptConsole,
  type ConsoleLine,
} from './console/index.js';

export type ReplCommand =
  | { mode: 'repl'; levelPath: string | undefined }
  | { mode: 'help' }
  | { mode: 'version' };

/** Outcome of one REPL input line */
export interface ReplResponse {
  /** Text to print, if any */
  output?: string | undefined;
  shouldExit: boolean;
}

/**
 * Parse command-line arguments into structured command
 */
export function parseArgs(argv: string[]): ReplCommand {
  if (argv.includes('--help')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version')) {
    return { mode: 'version' };
  }

  let levelPath: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--level') {
      levelPath = argv[i + 1];
      if (levelPath === undefined || levelPath.startsWith('--')) {
        throw new Error('--level requires a file path');
      }
      i++;
    } else {
      throw new Error(`Unknown argument: ${arg}`);
    }
  }
  return { mode: 'repl', levelPath };
}

function formatRects(level: Level): string {
  const rects = level.rigidRects;
  if (rects.length === 0) return '(no rects)';
  return rects
    .map(
      (rect) =>
        `${rect.id} at (${rect.position.x}, ${rect.position.y}) force (${rect.force.x}, ${rect.force.y})`
    )
    .join('\n');
}

/**
 * Handle one input line: a `:` command or a script line.
 * Script output reaches the terminal through the console's onLine hook.
 */
export function handleLine(
  scriptConsole: ScriptConsole,
  line: string
): ReplResponse {
  const trimmed = line.trim();
  if (trimmed === '') return { shouldExit: false };

  switch (trimmed) {
    case ':quit':
      return { shouldExit: true };
    case ':gc': {
      const stats = scriptConsole.collect();
      return {
        output: `live ${stats.live}, freed ${stats.freed}`,
        shouldExit: false,
      };
    }
    case ':env':
      return {
        output: scriptConsole
          .bindings()
          .map((binding) => `${binding.name} = ${binding.value}`)
          .join('\n'),
        shouldExit: false,
      };
    case ':rects':
      return { output: formatRects(scriptConsole.level), shouldExit: false };
  }

  if (trimmed.startsWith(':')) {
    return { output: `Unknown command: ${trimmed}`, shouldExit: false };
  }

  scriptConsole.submit(trimmed);
  return { shouldExit: false };
}

/** Build a console from configuration, printing log lines as they arrive */
export function createReplConsole(
  config: CinderConfig,
  level: Level,
  print: (line: ConsoleLine) => void
): ScriptConsole {
  return new ScriptConsole({
    level,
    stepLimit: config.stepLimit,
    maxHeapSlots: config.maxHeapSlots,
    builtins: config.builtins,
    logCapacity: config.logCapacity,
    echoResults: config.echoResults,
    onLine: print,
  });
}

function printLine(line: ConsoleLine): void {
  switch (line.kind) {
    case 'input':
      // Already on the terminal
      break;
    case 'warn':
    case 'error':
      console.error(line.text);
      break;
    default:
      console.log(line.text);
  }
}

/**
 * Display help information
 */
function showHelp(): void {
  console.log(`Cinder Console

Usage:
  cinder-repl                 Start an empty console
  cinder-repl --level <file>  Load rigid rects from a level file
  cinder-repl --help          Show this help message
  cinder-repl --version       Show version information

Commands:
  :env     List root bindings
  :gc      Collect garbage and show stats
  :rects   Show rects and accumulated forces
  :quit    Exit`);
}

/**
 * Handle --help/--version, or build the console for an interactive session
 */
function start(): ScriptConsole | undefined {
  const command = parseArgs(process.argv.slice(2));

  if (command.mode === 'help') {
    showHelp();
    return undefined;
  }

  if (command.mode === 'version') {
    console.log(`cinder-repl ${readVersion()}`);
    return undefined;
  }

  const config = loadConfig(process.cwd());
  const level =
    command.levelPath === undefined ? new Level() : loadLevel(command.levelPath);
  return createReplConsole(config, level, printLine);
}

/**
 * Entry point for cinder-repl binary
 */
function main(): void {
  let scriptConsole: ScriptConsole | undefined;
  try {
    scriptConsole = start();
  } catch (err) {
    console.error(err instanceof Error ? formatError(err) : String(err));
    process.exit(1);
  }
  if (scriptConsole === undefined) return;
  const session = scriptConsole;

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: 'cinder> ',
  });

  rl.prompt();

  rl.on('line', (line) => {
    try {
      const { output, shouldExit } = handleLine(session, line);
      if (output) console.log(output);
      if (shouldExit) {
        rl.close();
        return;
      }
    } catch (err) {
      // Heap exhaustion and other fatal runtime conditions end the session
      console.error(err instanceof Error ? formatError(err) : String(err));
      process.exit(1);
    }
    rl.prompt();
  });

  rl.on('close', () => {
    session.destroy();
    process.exit(0);
  });
}

if (isEntryPoint(import.meta.url)) {
  main();
}
