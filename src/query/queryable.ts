import { ConfigurationError } from '../errors.js';
import type { SelectDefinition } from './types.js';

/**
 * Anything that converts to a select query on demand. Select builders return
 * themselves; composites over a select query run their application pass.
 */
export interface Queryable {
  toQuery(): SelectDefinition;
}

export function isSelectDefinition(value: unknown): value is SelectDefinition {
  return typeof value === 'object' && value !== null && '_select' in value;
}

function isQueryable(source: SelectDefinition | Queryable): source is Queryable {
  return 'toQuery' in source && typeof source.toQuery === 'function';
}

export function toSelectDefinition(source: SelectDefinition | Queryable): SelectDefinition {
  if (!isQueryable(source)) return source;
  const query: unknown = source.toQuery();
  if (!isSelectDefinition(query)) {
    throw new ConfigurationError('Queryable did not produce a select query');
  }
  return query;
}
