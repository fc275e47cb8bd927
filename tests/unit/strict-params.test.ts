import { describe, it, expect } from 'vitest';
import { assertKnownParams, findUnknownParams } from '../../src/composite/strict.js';
import { UnknownParameterError } from '../../src/errors.js';

const declared = [['name'], ['company', 'name'], ['company', 'address', 'city']];

describe('findUnknownParams', () => {
  it('returns nothing when every key is declared', () => {
    expect(findUnknownParams({ name: 'John', company: { name: 'Pear' } }, declared)).toEqual([]);
  });

  it('returns nothing for an empty mapping', () => {
    expect(findUnknownParams({}, declared)).toEqual([]);
  });

  it('finds unknown top-level keys', () => {
    expect(findUnknownParams({ name: 'John', age: 30 }, declared)).toEqual([['age']]);
  });

  it('finds unknown nested keys with their full path', () => {
    const params = { company: { name: 'Pear', service: 'IT', address: { city: 'Lviv', zip: '79000' } } };
    expect(findUnknownParams(params, declared)).toEqual([
      ['company', 'service'],
      ['company', 'address', 'zip'],
    ]);
  });

  it('lists a level\'s unknown keys before paths found below it', () => {
    const params = { company: { size: 10 }, age: 30, city: 'Lviv' };
    expect(findUnknownParams(params, declared)).toEqual([['age'], ['city'], ['company', 'size']]);
  });

  it('accepts anything below a key whose declared path ends there', () => {
    expect(findUnknownParams({ name: { first: 'John', last: 'Doe' } }, declared)).toEqual([]);
  });

  it('accepts a scalar where nested keys were declared', () => {
    expect(findUnknownParams({ company: 'Pear' }, declared)).toEqual([]);
  });

  it('walks Map params with non-string keys', () => {
    const params = new Map<unknown, unknown>([
      [1, 'one'],
      [2, new Map([['x', true], ['y', false]])],
    ]);
    expect(findUnknownParams(params, [[1], [2, 'x']])).toEqual([[2, 'y']]);
  });

  it('matches numeric declared keys against object properties', () => {
    expect(findUnknownParams({ 1: 'one' }, [[1]])).toEqual([]);
    expect(findUnknownParams({ 1: 'one', 2: 'two' }, [[1]])).toEqual([['2']]);
  });

  it('checks symbol keys of plain objects', () => {
    const tag = Symbol('tag');
    const extra = Symbol('extra');
    expect(findUnknownParams({ name: 'x', [tag]: 1 }, [['name'], [tag]])).toEqual([]);
    expect(findUnknownParams({ name: 'x', [extra]: 1 }, [['name']])).toEqual([[extra]]);
  });

  it('skips non-enumerable properties', () => {
    const params = Object.defineProperty({ name: 'x' }, 'hidden', { value: 1, enumerable: false });
    expect(findUnknownParams(params, [['name']])).toEqual([]);
  });

  it('reports Map keys as they are held', () => {
    const params = new Map<unknown, unknown>([[null, 1], [undefined, 2], ['null', 3]]);
    expect(findUnknownParams(params, [['null']])).toEqual([[null], [undefined]]);
  });

  it('ignores values that are not plain mappings', () => {
    expect(findUnknownParams(['name', 'age'], declared)).toEqual([]);
    expect(findUnknownParams(new Date(0), declared)).toEqual([]);
  });
});

describe('assertKnownParams', () => {
  it('passes silently for declared params', () => {
    expect(() => assertKnownParams({ name: 'John' }, declared)).not.toThrow();
  });

  it('throws UnknownParameterError carrying all paths', () => {
    try {
      assertKnownParams({ age: 1, company: { service: 'IT' } }, declared);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(UnknownParameterError);
      expect((err as UnknownParameterError).paths).toEqual([['age'], ['company', 'service']]);
      expect((err as UnknownParameterError).message).toBe(
        'Unknown parameters found under the following paths: ["age"], ["company", "service"]',
      );
    }
  });
});
