/**
 * Cinder Runtime Tests: Evaluation
 * Self-evaluation, lookup, application, step and depth limits, and observability
 */

import { describe, expect, it } from 'vitest';
import {
  arrayToList,
  CINDER_ERROR_CODES,
  createHeap,
  createRuntimeContext,
  createScope,
  evaluate,
  evaluateInContext,
  type Expr,
  formatExpr,
} from '../../src/index.js';
import {
  createEventCollector,
  createLogCollector,
  readOk,
  run,
  runAll,
} from '../helpers/runtime.js';

describe('Cinder Runtime: Evaluation', () => {
  describe('self-evaluating forms', () => {
    it('returns numbers, strings, and nil unchanged', () => {
      expect(run('42')).toEqual({ status: 'ok', output: '42' });
      expect(run('"hi"')).toEqual({ status: 'ok', output: '"hi"' });
      expect(run('()')).toEqual({ status: 'ok', output: '()' });
    });

    it('evaluates without a runtime context', () => {
      const heap = createHeap();
      const scope = createScope(heap);
      const result = evaluate(heap, scope, heap.number(7));

      expect(result.isError).toBe(false);
      expect(formatExpr(heap, result.expr)).toBe('7');
    });
  });

  describe('symbols', () => {
    it('resolves bound symbols', () => {
      const { results } = runAll(['(set x 5)', 'x']);
      expect(results).toEqual([
        { status: 'ok', output: '5' },
        { status: 'ok', output: '5' },
      ]);
    });

    it('resolves natives to themselves', () => {
      expect(run('car')).toEqual({ status: 'ok', output: '<native car>' });
    });

    it('fails on an unbound symbol with the symbol as payload', () => {
      expect(run('nowhere')).toEqual({
        status: 'eval-error',
        output: 'nowhere',
        code: CINDER_ERROR_CODES.RUNTIME_UNBOUND_SYMBOL,
      });
    });
  });

  describe('application', () => {
    it('fails on an unbound operator with the operator symbol', () => {
      expect(run('(unbound-name 1 2)')).toEqual({
        status: 'eval-error',
        output: 'unbound-name',
        code: CINDER_ERROR_CODES.RUNTIME_UNBOUND_SYMBOL,
      });
    });

    it('fails on a bare unbound application', () => {
      expect(run('(unbound-name)')).toEqual({
        status: 'eval-error',
        output: 'unbound-name',
        code: CINDER_ERROR_CODES.RUNTIME_UNBOUND_SYMBOL,
      });
    });

    it('fails when the head is not a native', () => {
      expect(run('(1 2)')).toEqual({
        status: 'eval-error',
        output: '1',
        code: CINDER_ERROR_CODES.RUNTIME_NOT_CALLABLE,
      });
      expect(run('("s")')).toEqual({
        status: 'eval-error',
        output: '"s"',
        code: CINDER_ERROR_CODES.RUNTIME_NOT_CALLABLE,
      });
    });

    it('fails when a symbol is bound to a non-native', () => {
      const { results } = runAll(['(set y 3)', '(y)']);
      expect(results[1]).toEqual({
        status: 'eval-error',
        output: 'y',
        code: CINDER_ERROR_CODES.RUNTIME_NOT_CALLABLE,
      });
    });

    it('evaluates a nested form in operator position', () => {
      expect(run('((car (list car cdr)) (quote (1 2)))')).toEqual({
        status: 'ok',
        output: '1',
      });
    });
  });

  describe('step limit', () => {
    const nested = '(+ 1 (+ 2 (+ 3 (+ 4 5))))';

    it('fails with the form that crossed the limit', () => {
      expect(run(nested, { stepLimit: 3 })).toEqual({
        status: 'eval-error',
        output: '(+ 4 5)',
        code: CINDER_ERROR_CODES.RUNTIME_LIMIT_EXCEEDED,
      });
    });

    it('allows evaluation within the limit', () => {
      expect(run(nested, { stepLimit: 4 })).toEqual({
        status: 'ok',
        output: '15',
      });
    });

    it('counts steps per top-level evaluation', () => {
      const { results } = runAll(['(+ 1 2)', '(+ 3 4)'], { stepLimit: 1 });
      expect(results.map((r) => r.status)).toEqual(['ok', 'ok']);
    });
  });

  describe('depth limit', () => {
    const nested = '(list (list (list (list 1))))';

    it('fails with the form nested past the limit', () => {
      expect(run(nested, { depthLimit: 3 })).toEqual({
        status: 'eval-error',
        output: '(list 1)',
        code: CINDER_ERROR_CODES.RUNTIME_DEPTH_EXCEEDED,
      });
    });

    it('allows nesting within the limit', () => {
      expect(run(nested, { depthLimit: 4 })).toEqual({
        status: 'ok',
        output: '((((1))))',
      });
    });

    it('fails on a deep form built outside the reader', () => {
      const ctx = createRuntimeContext();
      const { heap } = ctx;
      let form: Expr = heap.number(1);
      for (let i = 0; i < 20000; i++) {
        form = arrayToList(heap, [heap.symbol('list'), form]);
      }

      const result = evaluateInContext(ctx, form);
      expect(result.isError && result.code).toBe(
        CINDER_ERROR_CODES.RUNTIME_DEPTH_EXCEEDED
      );
    });

    it('reports source nested past the reader limit as a parse error', () => {
      const source = '(list '.repeat(12000) + '1' + ')'.repeat(12000);
      expect(run(source)).toEqual({
        status: 'parse-error',
        message: 'Nesting deeper than 512 levels at 1:3073',
        location: { line: 1, column: 3073, offset: 3072 },
      });
    });
  });

  describe('host log', () => {
    it('routes print through onLog', () => {
      const { logs, callbacks } = createLogCollector();
      const result = run('(print "hi" 1 (quote (a b)))', { callbacks });

      expect(result).toEqual({ status: 'ok', output: '()' });
      expect(logs).toEqual([{ message: 'hi 1 (a b)', level: 'info' }]);
    });
  });

  describe('observability', () => {
    it('reports native calls and returns', () => {
      const { events, callbacks } = createEventCollector();
      run('(+ 1 2)', { observability: callbacks });

      expect(events.nativeCall.map((e) => e.name)).toEqual(['+']);
      expect(events.nativeReturn).toHaveLength(1);
      expect(events.nativeReturn[0]?.name).toBe('+');
      expect(events.nativeReturn[0]?.result.isError).toBe(false);
      expect(events.nativeReturn[0]?.durationMs).toBeGreaterThanOrEqual(0);
      expect(events.error).toHaveLength(0);
    });

    it('reports top-level failures once', () => {
      const { events, callbacks } = createEventCollector();
      run('(+ 1 (nope))', { observability: callbacks });

      expect(events.error.map((e) => e.code)).toEqual([
        CINDER_ERROR_CODES.RUNTIME_UNBOUND_SYMBOL,
      ]);
    });

    it('reports the collection that ends each cycle', () => {
      const { events, callbacks } = createEventCollector();
      run('(list 1 2)', { observability: callbacks });

      expect(events.collect).toHaveLength(1);
      expect(events.collect[0]?.freed).toBeGreaterThan(0);
    });

    it('passes raw arguments to onNativeCall', () => {
      const heap = createHeap();
      const scope = createScope(heap);
      const calls: string[] = [];
      const expr = readOk(heap, '(f (g 1))');
      const f = heap.native({
        name: 'f',
        call: (h) => ({ isError: false, expr: h.nil() }),
      });
      heap.setHead(expr, f);

      evaluate(heap, scope, expr, {
        observability: {
          onNativeCall: (e) => calls.push(formatExpr(heap, e.args)),
        },
      });
      expect(calls).toEqual(['((g 1))']);
    });
  });
});
