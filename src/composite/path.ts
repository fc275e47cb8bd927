import type { ParamPath, PathKey } from '../types.js';

function isPathList(path: ParamPath): path is readonly PathKey[] {
  return Array.isArray(path);
}

export function toPath(path: ParamPath): readonly PathKey[] {
  return isPathList(path) ? [...path] : [path];
}

/** A plain key-value container: a `Map` or an object literal / null-prototype object. */
export function isPlainMapping(value: unknown): value is Map<unknown, unknown> | Record<PropertyKey, unknown> {
  if (value instanceof Map) return true;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * The own-property name `key` reads on a plain object. Numbers read as their
 * string form; keys no property can carry yield `undefined`.
 */
export function toPropertyName(key: PathKey): string | symbol | undefined {
  if (typeof key === 'string' || typeof key === 'symbol') return key;
  if (typeof key === 'number') return String(key);
  return undefined;
}

/** Reads one key. Anything that cannot hold the key yields `undefined`. */
export function getKey(container: unknown, key: PathKey): unknown {
  if (container instanceof Map) return container.get(key);
  if (typeof container !== 'object' || container === null) return undefined;
  const property = toPropertyName(key);
  if (property === undefined || !Object.prototype.hasOwnProperty.call(container, property)) {
    return undefined;
  }
  return Reflect.get(container, property);
}

/** Follows `path` through nested containers. A missing step yields `undefined`. */
export function getPath(params: unknown, path: readonly PathKey[]): unknown {
  let current = params;
  for (const key of path) {
    if (current === undefined || current === null) return undefined;
    current = getKey(current, key);
  }
  return current;
}

/** Entries of a plain mapping, in insertion order, symbol keys included. */
export function entriesOf(mapping: Map<unknown, unknown> | Record<PropertyKey, unknown>): [unknown, unknown][] {
  if (mapping instanceof Map) return [...mapping.entries()];
  return Reflect.ownKeys(mapping)
    .filter((key) => Object.prototype.propertyIsEnumerable.call(mapping, key))
    .map((key): [unknown, unknown] => [key, Reflect.get(mapping, key)]);
}
