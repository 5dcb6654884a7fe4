/**
 * Cinder Configuration Tests
 * Loading and validating .cinder.yaml
 */

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CINDER_ERROR_CODES,
  CONFIG_FILE_NAME,
  ConfigError,
  createDefaultConfig,
  loadConfig,
  parseConfig,
} from '../src/index.js';
import { captureError } from './helpers/runtime.js';

describe('Cinder Configuration', () => {
  describe('parseConfig', () => {
    it('returns defaults for an empty document', () => {
      expect(parseConfig(null, 'x')).toEqual({
        stepLimit: undefined,
        maxHeapSlots: undefined,
        builtins: true,
        logCapacity: 10,
        echoResults: true,
      });
    });

    it('merges values over the defaults', () => {
      expect(
        parseConfig({ stepLimit: 100, echoResults: false }, 'x')
      ).toEqual({
        ...createDefaultConfig(),
        stepLimit: 100,
        echoResults: false,
      });
    });

    it('clears a limit set to null', () => {
      expect(parseConfig({ maxHeapSlots: null }, 'x').maxHeapSlots).toBe(
        undefined
      );
    });

    it.each([
      [{ colour: 'red' }, 'Invalid configuration: unknown key colour'],
      [{ stepLimit: 0 }, 'Invalid configuration: stepLimit must be a positive integer'],
      [{ logCapacity: 2.5 }, 'Invalid configuration: logCapacity must be a positive integer'],
      [{ builtins: 'yes' }, 'Invalid configuration: builtins must be true or false'],
      [['stepLimit'], 'Invalid configuration: must be a mapping'],
      ['text', 'Invalid configuration: must be a mapping'],
    ])('rejects %j', (data, message) => {
      const err = captureError(() => parseConfig(data, 'cfg.yaml'), ConfigError);
      expect(err.code).toBe(CINDER_ERROR_CODES.CONFIG_INVALID);
      expect(err.message).toBe(message);
      expect(err.path).toBe('cfg.yaml');
    });
  });

  describe('loadConfig', () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'cinder-config-'));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('returns defaults when no file exists', () => {
      expect(loadConfig(dir)).toEqual(createDefaultConfig());
    });

    it('reads YAML from the directory', () => {
      writeFileSync(
        join(dir, CONFIG_FILE_NAME),
        'stepLimit: 500\nbuiltins: false\nlogCapacity: 20\n'
      );
      expect(loadConfig(dir)).toEqual({
        stepLimit: 500,
        maxHeapSlots: undefined,
        builtins: false,
        logCapacity: 20,
        echoResults: true,
      });
    });

    it('reads an empty file as defaults', () => {
      writeFileSync(join(dir, CONFIG_FILE_NAME), '');
      expect(loadConfig(dir)).toEqual(createDefaultConfig());
    });

    it('reports malformed YAML with the file path', () => {
      const path = join(dir, CONFIG_FILE_NAME);
      writeFileSync(path, 'stepLimit: [1\n');
      const err = captureError(() => loadConfig(dir), ConfigError);
      expect(err.code).toBe(CINDER_ERROR_CODES.CONFIG_INVALID);
      expect(err.message).toMatch(/^Invalid configuration: invalid YAML/);
      expect(err.path).toBe(path);
    });

    it('reports invalid values', () => {
      writeFileSync(join(dir, CONFIG_FILE_NAME), 'builtins: 1\n');
      expect(() => loadConfig(dir)).toThrow(
        'Invalid configuration: builtins must be true or false'
      );
    });
  });
});
