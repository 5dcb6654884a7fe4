/**
 * Expression Printer
 * Renders any value back to S-expression text for diagnostics and echoing
 *
 * Output is bounded: shared substructure prints once per occurrence, so a
 * value built by repeated doubling would otherwise print exponentially long.
 */

import type { Heap } from './heap.js';
import type { Expr } from './values.js';

/** Printed in place of a pair already on the current print path */
export const CYCLE_MARKER = '...';

/** Longest text formatExpr() emits before cutting off */
export const MAX_PRINT_LENGTH = 10_000;

/** Lists nested deeper than this print as CYCLE_MARKER */
export const MAX_PRINT_DEPTH = 256;

/** Appended to output cut off at the length limit */
export const TRUNCATION_MARKER = ' ...';

function quoteString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

/**
 * Format an expression as S-expression text.
 *
 * @example
 * ```typescript
 * formatExpr(heap, read(heap, '(a  1.50 "x")').expr); // '(a 1.5 "x")'
 * ```
 */
export function formatExpr(
  heap: Heap,
  expr: Expr,
  maxLength: number = MAX_PRINT_LENGTH
): string {
  const writer = new ExprWriter(heap, maxLength);
  writer.write(expr);
  return writer.text();
}

/** Like formatExpr(), but strings print without quotes */
export function displayExpr(heap: Heap, expr: Expr): string {
  const data = heap.inspect(expr);
  return data.kind === 'string' ? data.value : formatExpr(heap, expr);
}

/** Accumulates printed text up to a length budget */
class ExprWriter {
  private readonly parts: string[] = [];
  private length = 0;
  private truncated = false;
  /** Pairs of the lists currently being printed */
  private readonly path = new Set<number>();
  private depth = 0;

  constructor(
    private readonly heap: Heap,
    private readonly maxLength: number
  ) {}

  text(): string {
    const body = this.parts.join('');
    return this.truncated ? body + TRUNCATION_MARKER : body;
  }

  write(expr: Expr): void {
    if (this.truncated) return;
    const data = this.heap.inspect(expr);
    switch (data.kind) {
      case 'nil':
        this.emit('()');
        return;
      case 'number':
        this.emit(String(data.value));
        return;
      case 'symbol':
        this.emit(data.name);
        return;
      case 'string':
        this.emit(quoteString(data.value));
        return;
      case 'native':
        this.emit(`<native ${data.procedure.name}>`);
        return;
      case 'pair':
        this.writeList(expr);
        return;
    }
  }

  private emit(text: string): void {
    if (this.truncated) return;
    const room = this.maxLength - this.length;
    if (text.length > room) {
      this.parts.push(text.slice(0, room));
      this.length = this.maxLength;
      this.truncated = true;
      return;
    }
    this.parts.push(text);
    this.length += text.length;
  }

  private writeList(list: Expr): void {
    if (this.path.has(list.slot) || this.depth >= MAX_PRINT_DEPTH) {
      this.emit(CYCLE_MARKER);
      return;
    }

    this.depth++;
    const entered: number[] = [];
    this.emit('(');

    let cursor = list;
    while (!this.truncated) {
      const data = this.heap.inspect(cursor);
      if (data.kind === 'nil') break;
      if (data.kind !== 'pair') {
        this.emit(' . ');
        this.write(cursor);
        break;
      }
      if (this.path.has(cursor.slot)) {
        this.emit(` . ${CYCLE_MARKER}`);
        break;
      }
      if (entered.length > 0) this.emit(' ');
      this.path.add(cursor.slot);
      entered.push(cursor.slot);
      this.write(data.head);
      cursor = data.tail;
    }

    this.emit(')');
    for (const slot of entered) this.path.delete(slot);
    this.depth--;
  }
}
