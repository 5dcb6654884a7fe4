/**
 * Cinder Runtime Tests: Runtime Context
 * The read → eval → collect cycle and context lifecycle
 */

import { describe, expect, it } from 'vitest';
import {
  CINDER_ERROR_CODES,
  collectGarbage,
  createRuntimeContext,
  destroyRuntimeContext,
  execute,
  HeapError,
  lookupName,
} from '../../src/index.js';
import { captureError } from '../helpers/runtime.js';

describe('Cinder Runtime: Runtime Context', () => {
  describe('execute', () => {
    it('leaves nothing behind when a line binds nothing', () => {
      const ctx = createRuntimeContext();
      const before = ctx.heap.size;

      execute(ctx, '(list 1 2 3)');
      expect(ctx.heap.size).toBe(before);
    });

    it('leaves nothing behind after a parse failure', () => {
      const ctx = createRuntimeContext();
      const before = ctx.heap.size;

      expect(execute(ctx, '(1 2')).toEqual({
        status: 'parse-error',
        message: "Expected ')' to close list opened at 1:1",
        location: { line: 1, column: 1, offset: 0 },
      });
      expect(ctx.heap.size).toBe(before);
    });

    it('keeps new bindings and their values', () => {
      const ctx = createRuntimeContext();
      const before = ctx.heap.size;

      execute(ctx, '(set z 1)');
      // symbol, value, binding pair, frame pair
      expect(ctx.heap.size).toBe(before + 4);
    });

    it('keeps bound structure usable across cycles', () => {
      const ctx = createRuntimeContext();
      execute(ctx, '(set keep (list 1 (list 2 3)))');
      collectGarbage(ctx);

      expect(execute(ctx, 'keep')).toEqual({
        status: 'ok',
        output: '(1 (2 3))',
      });
    });

    it('throws when the heap is exhausted', () => {
      const ctx = createRuntimeContext({ builtins: false, maxHeapSlots: 10 });
      const err = captureError(
        () => execute(ctx, '(1 2 3 4 5 6 7 8 9)'),
        HeapError
      );
      expect(err.code).toBe(CINDER_ERROR_CODES.HEAP_EXHAUSTED);
    });
  });

  describe('collectGarbage', () => {
    it('keeps extra roots alive', () => {
      const ctx = createRuntimeContext();
      const { heap } = ctx;
      const extra = heap.string('held by the host');

      collectGarbage(ctx, [extra]);
      expect(heap.isLive(extra)).toBe(true);
      collectGarbage(ctx);
      expect(heap.isLive(extra)).toBe(false);
    });

    it('keeps builtins bound', () => {
      const ctx = createRuntimeContext();
      collectGarbage(ctx);
      expect(lookupName(ctx.heap, ctx.scope, 'car')).toBeDefined();
    });
  });

  describe('options', () => {
    it.each([
      [{ stepLimit: 0 }],
      [{ stepLimit: 1.5 }],
      [{ depthLimit: 0 }],
      [{ maxHeapSlots: -1 }],
    ])('rejects %j', (options) => {
      expect(() => createRuntimeContext(options)).toThrow(RangeError);
    });
  });

  it('destroys the heap', () => {
    const ctx = createRuntimeContext({ builtins: false });

    // nil and the root frame pair
    expect(destroyRuntimeContext(ctx)).toBe(2);
    expect(ctx.heap.isDestroyed).toBe(true);
  });
});
