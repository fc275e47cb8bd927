import { ConfigurationError } from '../errors.js';
import type { Dependencies, DependencyName, Invocation } from '../types.js';

/**
 * Throws when the option bag carries keys outside the allowlist. All offending
 * keys are reported at once.
 */
export function ensureKnownOptions(options: object, allowlist: readonly string[]): void {
  const unknownKeys = Object.keys(options).filter((key) => !allowlist.includes(key));
  if (unknownKeys.length > 0) {
    throw new ConfigurationError(`Unsupported options: ${JSON.stringify(unknownKeys)}`);
  }
}

function takesOneArgument<Q, A>(
  fn: ((query: Q) => Q) | ((query: Q, arg: A) => Q),
): fn is (query: Q) => Q {
  return fn.length === 1;
}

/**
 * Tags a handler or loader with its arity. Only functions declaring exactly
 * one or two parameters are accepted.
 */
export function toInvocation<Q, A>(
  fn: ((query: Q) => Q) | ((query: Q, arg: A) => Q),
  role: string,
): Invocation<Q, A> {
  if (typeof fn !== 'function') {
    throw new ConfigurationError(`${role} must be a function`);
  }
  if (takesOneArgument(fn)) {
    return { arity: 1, fn };
  }
  if (fn.length === 2) {
    return { arity: 2, fn };
  }
  throw new ConfigurationError(`${role} must accept 1 or 2 arguments, got a function of arity ${fn.length}`);
}

export function invoke<Q, A>(invocation: Invocation<Q, A>, query: Q, arg: A): Q {
  return invocation.arity === 1 ? invocation.fn(query) : invocation.fn(query, arg);
}

/** Normalizes a dependency option to a list the caller no longer holds. */
export function wrapDependencies(dependencies: Dependencies): readonly DependencyName[] {
  if (dependencies === null || dependencies === undefined) return [];
  if (typeof dependencies === 'string' || typeof dependencies === 'symbol') return [dependencies];
  return [...dependencies];
}
