/**
 * Level Natives
 * Script access to level entities
 */

import {
  evalFailure,
  evalSuccess,
  expectArgs,
  isFailure,
  native,
} from '../runtime/core/native.js';
import type { NativeFn } from '../runtime/core/types.js';
import { asNumber, atomText, listToArray } from '../runtime/core/values.js';
import { prefixNatives, type NativeSet } from '../runtime/ext/extensions.js';
import { CINDER_ERROR_CODES } from '../types.js';
import { vec, type Level } from './level.js';

/**
 * (rect-apply-force ID (FX FY))
 *
 * Arguments are read as syntax: ID is a string or symbol atom and the force
 * is a literal two-number list. An unknown ID is reported on the host log
 * and still succeeds with nil.
 */
export const rectApplyForce: NativeFn<Level> = (level, heap, _scope, args, session) => {
  const items = expectArgs(heap, args, 2);
  if (isFailure(items)) return items;

  const [idExpr, forceExpr] = items;
  const id = idExpr === undefined ? undefined : atomText(heap, idExpr);
  const components = forceExpr === undefined ? undefined : listToArray(heap, forceExpr);
  const [fx, fy] = (components ?? []).map((c) => asNumber(heap, c));
  if (id === undefined || components?.length !== 2 || fx === undefined || fy === undefined) {
    return evalFailure(args, CINDER_ERROR_CODES.RUNTIME_TYPE_ERROR);
  }

  const rect = level.rigidRect(id);
  if (rect === undefined) {
    session.log(`Couldn't find rigid_rect \`${id}\``, 'warn');
    return evalSuccess(heap.nil());
  }

  rect.applyForce(vec(fx, fy));
  session.log(`Applying force (${fx}, ${fy}) to \`${id}\``);
  return evalSuccess(heap.nil());
};

/** Natives bound by the console, keyed by script name */
export function createLevelNatives(level: Level): NativeSet {
  return prefixNatives('rect', {
    'apply-force': native('apply-force', rectApplyForce, level),
  });
}
