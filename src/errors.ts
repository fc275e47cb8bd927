import type { DependencyName } from './types.js';

/** Base class for every error raised while building or applying a composite. */
export class CompositeError extends Error {
  override readonly name: string = 'CompositeError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigurationError extends CompositeError {
  override readonly name: string = 'ConfigurationError';
}

export type BindableField = 'query' | 'params';

export class UnboundFieldError extends CompositeError {
  override readonly name: string = 'UnboundFieldError';

  constructor(readonly field: BindableField, message?: string) {
    super(message ?? `${field} is not set`);
  }
}

export class DoubleBindingError extends CompositeError {
  override readonly name: string = 'DoubleBindingError';

  constructor(readonly field: BindableField, message?: string) {
    super(message ?? `${field} has already been provided`);
  }
}

export class UnknownDependencyError extends CompositeError {
  override readonly name: string = 'UnknownDependencyError';

  constructor(readonly dependency: DependencyName, message?: string) {
    super(
      message ??
        `Unknown dependency: ${formatKey(dependency)}. Please declare this dependency using Composite#dependency()`,
    );
  }
}

export class DependencyCycleError extends CompositeError {
  override readonly name: string = 'DependencyCycleError';

  constructor(readonly cycle: readonly DependencyName[], message?: string) {
    super(message ?? `Dependency cycle detected: ${cycle.map(formatKey).join(' -> ')}`);
  }
}

export class UnknownParameterError extends CompositeError {
  override readonly name: string = 'UnknownParameterError';

  constructor(readonly paths: readonly (readonly unknown[])[], message?: string) {
    super(
      message ??
        `Unknown parameters found under the following paths: ${paths.map(formatPath).join(', ')}`,
    );
  }
}

export class QueryExecutionError extends Error {
  override readonly name = 'QueryExecutionError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function formatKey(key: unknown): string {
  if (typeof key === 'string') return JSON.stringify(key);
  if (typeof key === 'bigint') return `${key}n`;
  if (typeof key === 'object' && key !== null) {
    try {
      return JSON.stringify(key) ?? String(key);
    } catch {
      return String(key);
    }
  }
  return String(key);
}

export function formatPath(path: readonly unknown[]): string {
  return `[${path.map(formatKey).join(', ')}]`;
}
