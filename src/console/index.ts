/**
 * Console Embedding
 * Level registry, level natives, and the script console
 */

export {
  DEFAULT_LOG_CAPACITY,
  ScriptConsole,
  type ConsoleBinding,
  type ConsoleLine,
  type ConsoleLineKind,
  type ConsoleOptions,
} from './console.js';
export {
  Level,
  RigidRect,
  vec,
  ZERO,
  type RigidRectInit,
  type Vec2,
} from './level.js';
export { loadLevel, parseLevel } from './level-loader.js';
export { createLevelNatives, rectApplyForce } from './natives.js';
