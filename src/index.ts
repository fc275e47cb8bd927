export { composite } from './composite/composite-object.js';
export { Composite } from './composite/composite.js';
export { defaultIgnore } from './composite/ignore.js';
export { resolveDependencies } from './composite/resolver.js';
export type { ResolveResult } from './composite/resolver.js';
export type {
  CompositeOptions,
  CompositeState,
  Dependencies,
  DependencyLoader,
  DependencyName,
  DependencyOptions,
  DependencyDefinition,
  DependencyRegistry,
  IgnorePredicate,
  Invocation,
  ParamDefinition,
  ParamHandler,
  ParamOptions,
  ParamPath,
  PathKey,
} from './types.js';
export { select } from './query/query-object.js';
export { compileSelect } from './query/compiler.js';
export type { CompiledQuery } from './query/compiler.js';
export type { SelectBuilder } from './query/builder.js';
export type { SelectDefinition } from './query/types.js';
export { isSelectDefinition, toSelectDefinition } from './query/queryable.js';
export type { Queryable } from './query/queryable.js';
export { PostgresQueryRunner } from './store/query-runner.js';
export type { QueryRunner, QueryRunnerConfig } from './store/query-runner.js';
export {
  CompositeError,
  ConfigurationError,
  DependencyCycleError,
  DoubleBindingError,
  QueryExecutionError,
  UnboundFieldError,
  UnknownDependencyError,
  UnknownParameterError,
} from './errors.js';
