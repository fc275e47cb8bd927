import { DoubleBindingError, UnboundFieldError, type BindableField } from '../errors.js';
import type { CompositeState, DependencyName } from '../types.js';
import { invoke, wrapDependencies } from './options.js';
import { getPath, isPlainMapping } from './path.js';
import { resolveDependencies } from './resolver.js';
import { assertKnownParams } from './strict.js';

/**
 * Set-once binding: a value may come from construction or from apply, never
 * both and never neither.
 */
function bindOnce<T>(field: BindableField, bound: T | null, given: T | null | undefined): T {
  if (given === null || given === undefined) {
    if (bound === null) throw new UnboundFieldError(field);
    return bound;
  }
  if (bound !== null) throw new DoubleBindingError(field);
  return given;
}

/**
 * Runs one application pass: binds query and params, validates params in
 * strict mode, loads force-required dependencies, then folds every param
 * handler over the query in registration order.
 */
export function applyComposite<Q, P>(
  state: CompositeState<Q, P>,
  query?: Q | null,
  params?: P | null,
): Q {
  const input = bindOnce('query', state.query, query);
  const bound = bindOnce('params', state.input, params);

  if (state.strict && isPlainMapping(bound)) {
    assertKnownParams(bound, state.params.map((definition) => definition.path));
  }

  let { query: current, loaded } = resolveDependencies(
    input,
    bound,
    state.dependencies,
    new Set<DependencyName>(),
    state.requiredDependencies,
  );

  for (const { path, handler, options } of state.params) {
    const value = getPath(bound, path);
    const ignore = options.ignore ?? state.ignore;

    if (ignore(value)) {
      ({ query: current, loaded } = resolveDependencies(
        current,
        bound,
        state.dependencies,
        loaded,
        wrapDependencies(options.ignoreRequires),
      ));
      current = options.onIgnore === undefined ? current : options.onIgnore(current);
      continue;
    }

    const requires =
      typeof options.requires === 'function' ? options.requires(value) : options.requires;
    ({ query: current, loaded } = resolveDependencies(
      current,
      bound,
      state.dependencies,
      loaded,
      wrapDependencies(requires),
    ));
    current = invoke(handler, current, value);
  }

  return current;
}
