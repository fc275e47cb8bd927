/** Name of a dependency. Compared by identity, so symbols work as private names. */
export type DependencyName = string | symbol;

/** One or more dependency names. `null` and `undefined` mean "none". */
export type Dependencies = DependencyName | readonly DependencyName[] | null | undefined;

/** A single step of a parameter path. `Map` params may be keyed by anything. */
export type PathKey = string | number | symbol | bigint | boolean | object;

/** A parameter path. A single key is shorthand for a path of length one. */
export type ParamPath = PathKey | readonly PathKey[];

export type IgnorePredicate = (value: unknown) => boolean;

/**
 * Applies a parameter to the query. Handlers declaring a single parameter are
 * called with the query only.
 */
export type ParamHandler<Q> = (query: Q, value: unknown) => Q;

/**
 * Loads a dependency into the query. Loaders declaring a single parameter are
 * called with the query only; otherwise they also receive the whole params.
 */
export type DependencyLoader<Q, P> = (query: Q, params: P) => Q;

export interface ParamOptions<Q> {
  /** Overrides the composite's default predicate for this parameter. */
  ignore?: IgnorePredicate;
  /** Applied instead of the handler when the value is ignored. */
  onIgnore?: (query: Q) => Q;
  /**
   * Dependencies loaded before the handler runs. A function receives the
   * (never ignored) value and picks dependencies for it.
   */
  requires?: Dependencies | ((value: unknown) => Dependencies);
  /** Dependencies loaded when the value is ignored, typically for `onIgnore`. */
  ignoreRequires?: Dependencies;
}

export interface DependencyOptions {
  requires?: Dependencies;
}

export interface CompositeOptions {
  /** Reject params whose paths are not declared with `param()`. Defaults to `false`. */
  strict?: boolean;
  /** Default ignore predicate. Defaults to `defaultIgnore`. */
  ignore?: IgnorePredicate;
}

/**
 * A callable tagged with the number of arguments it takes, resolved once at
 * registration time.
 */
export type Invocation<Q, A> =
  | { arity: 1; fn: (query: Q) => Q }
  | { arity: 2; fn: (query: Q, arg: A) => Q };

export interface ParamDefinition<Q> {
  path: readonly PathKey[];
  handler: Invocation<Q, unknown>;
  options: ParamOptions<Q>;
}

export interface DependencyDefinition<Q, P> {
  loader: Invocation<Q, P>;
  requires: readonly DependencyName[];
}

export type DependencyRegistry<Q, P> = ReadonlyMap<DependencyName, DependencyDefinition<Q, P>>;

/** Snapshot of everything registered on a composite. */
export interface CompositeState<Q, P> {
  params: readonly ParamDefinition<Q>[];
  dependencies: DependencyRegistry<Q, P>;
  requiredDependencies: readonly DependencyName[];
  query: Q | null;
  input: P | null;
  strict: boolean;
  ignore: IgnorePredicate;
}
