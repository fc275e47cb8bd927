import { ConfigurationError } from '../errors.js';
import type { SelectDefinition } from '../query/types.js';
import type {
  CompositeState,
  Dependencies,
  DependencyLoader,
  DependencyName,
  DependencyOptions,
  ParamHandler,
  ParamOptions,
  ParamPath,
} from '../types.js';
import { applyComposite } from './engine.js';
import { ensureKnownOptions, toInvocation, wrapDependencies } from './options.js';
import { toPath } from './path.js';

const PARAM_OPTIONS = ['ignore', 'onIgnore', 'requires', 'ignoreRequires'] as const;
const DEPENDENCY_OPTIONS = ['requires'] as const;

/**
 * Immutable set of param handlers and dependency loaders. Every registration
 * returns a new Composite, so a prepared composite can be shared and applied
 * many times.
 */
export class Composite<Q, P = unknown> {
  constructor(private readonly _state: CompositeState<Q, P>) {}

  get state(): CompositeState<Q, P> {
    return this._state;
  }

  /**
   * Registers a param handler. Handlers run in registration order, and only
   * when the value at `path` is not ignored.
   *
   * @example
   * composite.create<SelectBuilder>()
   *   .param('name', (q, name) => q.and.column('u.name').equals(name))
   *   .param(['company', 'name'], (q, name) => q.and.column('c.name').equals(name), {
   *     requires: 'companies',
   *   })
   */
  param(path: ParamPath, handler: ParamHandler<Q>, options: ParamOptions<Q> = {}): Composite<Q, P> {
    ensureKnownOptions(options, PARAM_OPTIONS);
    const resolvedPath = toPath(path);
    if (resolvedPath.length === 0) {
      throw new ConfigurationError('Param path must contain at least one key');
    }
    if (options.onIgnore !== undefined && options.onIgnore.length > 1) {
      throw new ConfigurationError('onIgnore must accept a single argument');
    }

    return new Composite<Q, P>({
      ...this._state,
      params: [
        ...this._state.params,
        {
          path: resolvedPath,
          handler: toInvocation(handler, 'Param handler'),
          options: {
            ...options,
            requires:
              typeof options.requires === 'function' ? options.requires : wrapDependencies(options.requires),
            ignoreRequires: wrapDependencies(options.ignoreRequires),
          },
        },
      ],
    });
  }

  /**
   * Registers (or replaces) a dependency loader. Dependencies are loaded
   * lazily, at most once per application, before the first handler that
   * needs them.
   */
  dependency(
    name: DependencyName,
    loader: DependencyLoader<Q, P>,
    options: DependencyOptions = {},
  ): Composite<Q, P> {
    ensureKnownOptions(options, DEPENDENCY_OPTIONS);
    const dependencies = new Map(this._state.dependencies);
    dependencies.set(name, {
      loader: toInvocation(loader, 'Dependency loader'),
      requires: wrapDependencies(options.requires),
    });
    return new Composite<Q, P>({ ...this._state, dependencies });
  }

  /** Loads the given dependencies on every application, whatever the params. */
  forceRequire(dependencies: Dependencies): Composite<Q, P> {
    return new Composite<Q, P>({
      ...this._state,
      requiredDependencies: [...wrapDependencies(dependencies), ...this._state.requiredDependencies],
    });
  }

  /**
   * Applies all handlers. Query and params not bound by `composite.createBound()`
   * must be passed here; passing one that is already bound throws.
   */
  apply(query?: Q | null, params?: P | null): Q {
    return applyComposite(this._state, query, params);
  }

  /** Converts a bound composite over a select query into the final query. */
  toQuery<S extends SelectDefinition>(this: Composite<S, P>): S {
    return this.apply();
  }
}
