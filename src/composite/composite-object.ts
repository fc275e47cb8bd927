import type { CompositeOptions, CompositeState, DependencyDefinition, DependencyName } from '../types.js';
import { Composite } from './composite.js';
import { ensureKnownOptions } from './options.js';
import { defaultIgnore } from './ignore.js';

function initialState<Q, P>(
  query: Q | null,
  params: P | null,
  options: CompositeOptions,
): CompositeState<Q, P> {
  ensureKnownOptions(options, ['strict', 'ignore']);
  return {
    params: [],
    dependencies: new Map<DependencyName, DependencyDefinition<Q, P>>(),
    requiredDependencies: [],
    query,
    input: params,
    strict: options.strict ?? false,
    ignore: options.ignore ?? defaultIgnore,
  };
}

/**
 * Entry point for composites.
 *
 * @example
 * // deferred: query and params are given to apply()
 * const users = composite.create<SelectBuilder, UserFilters>({ strict: true })
 *   .param('name', (q, name) => q.and.column('u.name').equals(name))
 *   .param('locations', (q, locations) => q.and.column('d.location').in(locations), {
 *     requires: 'departments',
 *   })
 *   .dependency('departments', (q) => q.join('departments', 'd', 'd.id = u.department_id'));
 *
 * users.apply(select.from('users', 'u'), { name: 'John' });
 *
 * // bound: query and params are known up front
 * composite.createBound(select.from('users', 'u'), request.query)
 *   .param('name', (q, name) => q.and.column('u.name').equals(name))
 *   .toQuery();
 */
export const composite = {
  create<Q, P = unknown>(options: CompositeOptions = {}): Composite<Q, P> {
    return new Composite(initialState<Q, P>(null, null, options));
  },
  createBound<Q, P>(query: Q, params: P | null, options: CompositeOptions = {}): Composite<Q, P> {
    return new Composite(initialState<Q, P>(query, params, options));
  },
};
