/**
 * Default ignore predicate: `null`, `undefined`, `""`, empty arrays, empty
 * plain objects and empty maps count as absent.
 */
export function defaultIgnore(value: unknown): boolean {
  if (value === null || value === undefined || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Map) return value.size === 0;
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    return (proto === Object.prototype || proto === null) && Object.keys(value).length === 0;
  }
  return false;
}
