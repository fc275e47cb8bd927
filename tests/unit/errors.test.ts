import { describe, it, expect } from 'vitest';
import {
  CompositeError,
  ConfigurationError,
  DependencyCycleError,
  DoubleBindingError,
  QueryExecutionError,
  UnboundFieldError,
  UnknownDependencyError,
  UnknownParameterError,
  formatPath,
} from '../../src/errors.js';

const compositeErrors = [
  { make: () => new ConfigurationError('bad option'), name: 'ConfigurationError', cls: ConfigurationError },
  { make: () => new UnboundFieldError('query'), name: 'UnboundFieldError', cls: UnboundFieldError },
  { make: () => new DoubleBindingError('params'), name: 'DoubleBindingError', cls: DoubleBindingError },
  { make: () => new UnknownDependencyError('orgs'), name: 'UnknownDependencyError', cls: UnknownDependencyError },
  { make: () => new UnknownParameterError([['a']]), name: 'UnknownParameterError', cls: UnknownParameterError },
  { make: () => new DependencyCycleError(['a', 'a']), name: 'DependencyCycleError', cls: DependencyCycleError },
];

describe.each(compositeErrors)('$name', ({ make, name, cls }) => {
  it('has correct name', () => {
    expect(make().name).toBe(name);
  });

  it('is instanceof its class, CompositeError and Error', () => {
    const err = make();
    expect(err).toBeInstanceOf(cls);
    expect(err).toBeInstanceOf(CompositeError);
    expect(err).toBeInstanceOf(Error);
  });

  it('has a stack trace', () => {
    expect(make().stack).toBeDefined();
  });
});

describe('default messages', () => {
  it('UnboundFieldError names the field', () => {
    const err = new UnboundFieldError('params');
    expect(err.field).toBe('params');
    expect(err.message).toBe('params is not set');
  });

  it('DoubleBindingError names the field', () => {
    expect(new DoubleBindingError('query').message).toBe('query has already been provided');
  });

  it('UnknownDependencyError describes symbols', () => {
    const err = new UnknownDependencyError(Symbol('orgs'));
    expect(err.message).toBe(
      'Unknown dependency: Symbol(orgs). Please declare this dependency using Composite#dependency()',
    );
  });

  it('uses custom message when provided', () => {
    expect(new UnboundFieldError('query', 'my message').message).toBe('my message');
  });
});

describe('formatPath', () => {
  it('quotes strings and prints other keys as they are', () => {
    expect(formatPath(['company', 1, true, 2n, Symbol('s')])).toBe('["company", 1, true, 2n, Symbol(s)]');
  });

  it('serializes object keys', () => {
    expect(formatPath([{ id: 7 }])).toBe('[{"id":7}]');
  });
});

describe('QueryExecutionError', () => {
  it('has correct name and is not a CompositeError', () => {
    const err = new QueryExecutionError('msg');
    expect(err.name).toBe('QueryExecutionError');
    expect(err).toBeInstanceOf(QueryExecutionError);
    expect(err).not.toBeInstanceOf(CompositeError);
  });

  it('cause is undefined when not provided', () => {
    expect(new QueryExecutionError('msg').cause).toBeUndefined();
  });

  it('stores the cause when provided', () => {
    const root = new Error('root');
    expect(new QueryExecutionError('msg', root).cause).toBe(root);
  });
});
