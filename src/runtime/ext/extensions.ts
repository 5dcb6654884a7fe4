import type { Heap } from '../core/heap.js';
import { bind, type Scope } from '../core/scope.js';
import type { NativeProcedure } from '../core/types.js';

/**
 * Named group of natives a host installs together.
 */
export type NativeSet = Record<string, NativeProcedure>;

/**
 * Prefix all native names in a set with a namespace.
 *
 * Script names are hyphenated identifiers, so the namespace is joined with
 * a hyphen and the procedures are renamed to match.
 *
 * @param namespace - Alphanumeric string with hyphens (e.g., "rect")
 * @param natives - Natives keyed by their unprefixed name
 * @returns New set keyed by `namespace-name`
 * @throws {TypeError} if namespace is invalid
 *
 * @example
 * ```typescript
 * const prefixed = prefixNatives('rect', { 'apply-force': applyForce });
 * // { 'rect-apply-force': ... }
 * ```
 */
export function prefixNatives(
  namespace: string,
  natives: NativeSet
): NativeSet {
  // Validate namespace pattern: non-empty alphanumeric with hyphens only
  const NAMESPACE_PATTERN = /^[a-zA-Z0-9-]+$/;

  if (!NAMESPACE_PATTERN.test(namespace)) {
    throw new TypeError(
      `Invalid namespace: must be non-empty alphanumeric with hyphens only, got "${namespace}"`
    );
  }

  const result: NativeSet = {};
  for (const [name, procedure] of Object.entries(natives)) {
    const prefixed = `${namespace}-${name}`;
    result[prefixed] = {
      name: prefixed,
      call: (heap, scope, args, session) =>
        procedure.call(heap, scope, args, session),
    };
  }
  return result;
}

/**
 * Bind every native of a set in a scope, under its key.
 * Later bindings shadow earlier ones of the same name.
 */
export function installNatives(
  heap: Heap,
  scope: Scope,
  natives: NativeSet
): void {
  for (const [name, procedure] of Object.entries(natives)) {
    bind(heap, scope, heap.symbol(name), heap.native(procedure));
  }
}
