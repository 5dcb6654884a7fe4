/**
 * Script Console
 *
 * Line-oriented front end over a runtime context: every submitted line runs
 * one read → eval → collect cycle, and what happened lands in a bounded log
 * for the host to draw.
 */

import {
  collectGarbage,
  createRuntimeContext,
  destroyRuntimeContext,
} from '../runtime/core/context.js';
import { execute } from '../runtime/core/execute.js';
import type { CollectStats } from '../runtime/core/heap.js';
import { formatExpr } from '../runtime/core/print.js';
import { scopeBindings } from '../runtime/core/scope.js';
import type {
  CycleResult,
  LogLevel,
  RuntimeContext,
  RuntimeOptions,
} from '../runtime/core/types.js';
import type { Level } from './level.js';
import { createLevelNatives } from './natives.js';

export const DEFAULT_LOG_CAPACITY = 10;

export type ConsoleLineKind = 'input' | 'output' | 'info' | 'warn' | 'error';

export interface ConsoleLine {
  readonly text: string;
  readonly kind: ConsoleLineKind;
}

export interface ConsoleOptions
  extends Omit<RuntimeOptions, 'callbacks' | 'natives'> {
  /** Entities the script natives operate on */
  level: Level;
  /** Lines kept in the log (default 10) */
  logCapacity?: number | undefined;
  /** Log the printed result of successful lines */
  echoResults?: boolean | undefined;
  /** Called for every line as it is added to the log */
  onLine?: ((line: ConsoleLine) => void) | undefined;
}

export interface ConsoleBinding {
  readonly name: string;
  readonly value: string;
}

export class ScriptConsole {
  readonly level: Level;
  readonly context: RuntimeContext;
  private readonly capacity: number;
  private readonly echoResults: boolean;
  private readonly onLine: ((line: ConsoleLine) => void) | undefined;
  private readonly lines: ConsoleLine[] = [];
  private readonly submitted: string[] = [];
  // Native log output of the line being submitted
  private pending: ConsoleLine[] = [];

  constructor(options: ConsoleOptions) {
    const { level, logCapacity, echoResults, onLine, ...runtime } = options;
    const capacity = logCapacity ?? DEFAULT_LOG_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(
        `logCapacity must be a positive integer, got ${capacity}`
      );
    }

    this.level = level;
    this.capacity = capacity;
    this.echoResults = echoResults ?? false;
    this.onLine = onLine;
    this.context = createRuntimeContext({
      ...runtime,
      natives: createLevelNatives(level),
      callbacks: {
        onLog: (message: string, severity: LogLevel) => {
          this.pending.push({ text: message, kind: severity });
        },
      },
    });
  }

  /** Lines currently in the log, oldest first */
  get log(): readonly ConsoleLine[] {
    return this.lines;
  }

  /** Every submitted line, oldest first */
  get history(): readonly string[] {
    return this.submitted;
  }

  /**
   * History entry counted back from the newest (0 = last submitted).
   * Returns undefined past either end.
   */
  recall(back: number): string | undefined {
    if (!Number.isInteger(back) || back < 0) return undefined;
    return this.submitted[this.submitted.length - 1 - back];
  }

  /**
   * Run one line.
   *
   * The line is logged as input, followed by anything natives logged while
   * it ran, then the outcome. A line that does not parse is logged as an
   * error together with the reader's message.
   */
  submit(source: string): CycleResult {
    this.submitted.push(source);
    this.pending = [];
    const result = execute(this.context, source);
    const natives = this.pending;
    this.pending = [];

    switch (result.status) {
      case 'parse-error':
        this.push({ text: source, kind: 'error' });
        this.push({ text: result.message, kind: 'error' });
        break;
      case 'eval-error':
        this.push({ text: source, kind: 'input' });
        natives.forEach((line) => this.push(line));
        this.push({ text: `Error: ${result.output}`, kind: 'error' });
        break;
      case 'ok':
        this.push({ text: source, kind: 'input' });
        natives.forEach((line) => this.push(line));
        if (this.echoResults) {
          this.push({ text: result.output, kind: 'output' });
        }
        break;
    }
    return result;
  }

  /** Root scope bindings, newest first, with printed values */
  bindings(): ConsoleBinding[] {
    const { heap, scope } = this.context;
    return scopeBindings(heap, scope).map((binding) => ({
      name: binding.name,
      value: formatExpr(heap, binding.value),
    }));
  }

  collect(): CollectStats {
    return collectGarbage(this.context);
  }

  destroy(): number {
    return destroyRuntimeContext(this.context);
  }

  private push(line: ConsoleLine): void {
    this.lines.push(line);
    if (this.lines.length > this.capacity) {
      this.lines.shift();
    }
    this.onLine?.(line);
  }
}
