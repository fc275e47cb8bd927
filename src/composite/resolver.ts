import { DependencyCycleError, UnknownDependencyError } from '../errors.js';
import type { DependencyName, DependencyRegistry } from '../types.js';
import { invoke } from './options.js';

export interface ResolveResult<Q> {
  query: Q;
  loaded: ReadonlySet<DependencyName>;
}

/**
 * Loads every requested dependency that is not in `loaded` yet, prerequisites
 * first, and returns the transformed query together with the grown set.
 * Each dependency is loaded at most once per call chain sharing a set;
 * `loaded` itself is never mutated.
 */
export function resolveDependencies<Q, P>(
  query: Q,
  params: P,
  registry: DependencyRegistry<Q, P>,
  loaded: ReadonlySet<DependencyName>,
  requested: readonly DependencyName[],
): ResolveResult<Q> {
  if (requested.length === 0) {
    return { query, loaded };
  }

  const working = new Set(loaded);
  const result = loadAll(query, params, registry, working, requested, []);
  return { query: result, loaded: working };
}

function loadAll<Q, P>(
  query: Q,
  params: P,
  registry: DependencyRegistry<Q, P>,
  loaded: Set<DependencyName>,
  requested: readonly DependencyName[],
  chain: readonly DependencyName[],
): Q {
  const toLoad = [...new Set(requested)].filter((name) => !loaded.has(name));

  let current = query;
  for (const name of toLoad) {
    // A sibling's prerequisites may have loaded it already
    if (loaded.has(name)) continue;

    if (chain.includes(name)) {
      throw new DependencyCycleError([...chain.slice(chain.indexOf(name)), name]);
    }

    const definition = registry.get(name);
    if (definition === undefined) {
      throw new UnknownDependencyError(name);
    }

    current = loadAll(current, params, registry, loaded, definition.requires, [...chain, name]);
    current = invoke(definition.loader, current, params);
    loaded.add(name);
  }
  return current;
}
