/**
 * Level Loader
 * Reads level files (YAML) into a Level registry
 *
 * ```yaml
 * rects:
 *   - { id: player, x: 0, y: 0, w: 1, h: 2 }
 * ```
 */

import { readFileSync } from 'node:fs';
import * as yaml from 'yaml';
import { CINDER_ERROR_CODES, ConfigError } from '../types.js';
import { Level, RigidRect, vec } from './level.js';

const RECT_KEYS = new Set(['id', 'x', 'y', 'w', 'h']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(path: string, reason: string): ConfigError {
  return new ConfigError(
    CINDER_ERROR_CODES.CONFIG_INVALID,
    `Invalid level: ${reason}`,
    path
  );
}

function readNumber(
  entry: Record<string, unknown>,
  key: string,
  fallback: number,
  where: string,
  path: string
): number {
  const value = entry[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw invalid(path, `${where}.${key} must be a number`);
  }
  return value;
}

function parseRect(entry: unknown, index: number, path: string): RigidRect {
  const where = `rects[${index}]`;
  if (!isRecord(entry)) {
    throw invalid(path, `${where} must be a mapping`);
  }
  for (const key of Object.keys(entry)) {
    if (!RECT_KEYS.has(key)) {
      throw invalid(path, `${where} has unknown key "${key}"`);
    }
  }

  const id = entry['id'];
  if (typeof id !== 'string' || id === '') {
    throw invalid(path, `${where}.id must be a non-empty string`);
  }

  return new RigidRect({
    id,
    position: vec(
      readNumber(entry, 'x', 0, where, path),
      readNumber(entry, 'y', 0, where, path)
    ),
    size: vec(
      readNumber(entry, 'w', 1, where, path),
      readNumber(entry, 'h', 1, where, path)
    ),
  });
}

/**
 * Parse level YAML.
 *
 * @param text - YAML document
 * @param path - Reported in errors
 * @throws {ConfigError} CONFIG_INVALID on malformed documents or duplicate ids
 */
export function parseLevel(text: string, path = '<level>'): Level {
  let data: unknown;
  try {
    data = yaml.parse(text);
  } catch (err) {
    throw invalid(path, err instanceof Error ? err.message : String(err));
  }

  // yaml.parse returns null for empty content
  if (data === null || data === undefined) return new Level();
  if (!isRecord(data)) {
    throw invalid(path, 'document must be a mapping');
  }

  const rects = data['rects'] ?? [];
  if (!Array.isArray(rects)) {
    throw invalid(path, 'rects must be a list');
  }

  const level = new Level();
  rects.forEach((entry: unknown, index) => {
    const rect = parseRect(entry, index, path);
    if (level.rigidRect(rect.id) !== undefined) {
      throw invalid(path, `duplicate rect id "${rect.id}"`);
    }
    level.addRect(rect);
  });
  return level;
}

/**
 * Load a level file from disk.
 * @throws {ConfigError} CONFIG_UNREADABLE when the file cannot be read
 */
export function loadLevel(path: string): Level {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      CINDER_ERROR_CODES.CONFIG_UNREADABLE,
      `Cannot read level: ${err instanceof Error ? err.message : String(err)}`,
      path
    );
  }
  return parseLevel(text, path);
}
