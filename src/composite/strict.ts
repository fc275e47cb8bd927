import { UnknownParameterError } from '../errors.js';
import type { PathKey } from '../types.js';
import { entriesOf, isPlainMapping, toPropertyName } from './path.js';

/**
 * Returns every path in `params` that no declared path covers. Keys unknown at
 * a level are listed before the unknown paths found below that level's known
 * keys. Path keys are reported as the container holds them.
 */
export function findUnknownParams(
  params: unknown,
  declared: readonly (readonly PathKey[])[],
  prefix: readonly unknown[] = [],
): unknown[][] {
  if (!isPlainMapping(params)) return [];

  // Declared heads are matched the way getKey reads them: Maps by identity,
  // objects by property name
  const byHead = new Map<unknown, (readonly PathKey[])[]>();
  for (const path of declared) {
    const [head, ...tail] = path;
    if (head === undefined) continue;
    const lookup = params instanceof Map ? head : toPropertyName(head);
    if (lookup === undefined) continue;
    const group = byHead.get(lookup);
    if (group === undefined) {
      byHead.set(lookup, [tail]);
    } else {
      group.push(tail);
    }
  }

  const unknown: unknown[][] = [];
  const nested: unknown[][] = [];
  for (const [key, value] of entriesOf(params)) {
    const path = [...prefix, key];
    const subpaths = byHead.get(key);
    if (subpaths === undefined) {
      unknown.push(path);
      continue;
    }
    // A path ending here declares the whole subtree
    if (subpaths.some((subpath) => subpath.length === 0)) continue;
    nested.push(...findUnknownParams(value, subpaths, path));
  }
  return [...unknown, ...nested];
}

export function assertKnownParams(params: unknown, declared: readonly (readonly PathKey[])[]): void {
  const unknown = findUnknownParams(params, declared);
  if (unknown.length > 0) {
    throw new UnknownParameterError(unknown);
  }
}
