import type { Queryable } from './queryable.js';
import type { ComparisonOperator, FilterNode, Join, OrderBy, SelectDefinition, SelectParts } from './types.js';

type Combinator = 'where' | 'and' | 'or';

/**
 * Combines a new FilterNode with the current filter using the given
 * combinator. `and` / `or` accumulate flat nodes of their own kind.
 */
function _applyFilter(parts: SelectParts, combinator: Combinator, newNode: FilterNode): SelectBuilder {
  const withFilter = (filter: FilterNode): SelectBuilder => new SelectBuilder({ ...parts, filter });

  const existing = parts.filter;
  if (combinator === 'where' || existing === null) {
    // No existing filter — treat as first filter (same as where)
    return withFilter(newNode);
  }

  if (existing.kind === combinator) {
    // Flat accumulation: append to the existing node
    return withFilter({ kind: combinator, filters: [...existing.filters, newNode] });
  }
  // Wrap both into a new node
  return withFilter({ kind: combinator, filters: [existing, newNode] });
}

/**
 * Fluent immutable select builder. Implements SelectDefinition so it can be
 * passed directly to the compiler and the query runner. Every operation
 * returns a new SelectBuilder — existing instances are never mutated.
 */
export class SelectBuilder implements SelectDefinition, Queryable {
  constructor(readonly _select: SelectParts) {}

  toQuery(): SelectBuilder {
    return this;
  }

  /** Replace the filter with a new expression. */
  get where(): ColumnSelector {
    return new ColumnSelector(this._select, 'where');
  }

  /** Combine with the existing filter using AND. */
  get and(): ColumnSelector {
    return new ColumnSelector(this._select, 'and');
  }

  /** Combine with the existing filter using OR. */
  get or(): ColumnSelector {
    return new ColumnSelector(this._select, 'or');
  }

  /** Restrict the selected columns. No columns means `*`. */
  columns(...columns: string[]): SelectBuilder {
    return new SelectBuilder({ ...this._select, columns });
  }

  join(table: string, alias: string, on: string): SelectBuilder {
    return this._join({ type: 'inner', table, alias, on });
  }

  leftJoin(table: string, alias: string, on: string): SelectBuilder {
    return this._join({ type: 'left', table, alias, on });
  }

  orderBy(column: string, direction: OrderBy['direction'] = 'asc'): SelectBuilder {
    return new SelectBuilder({ ...this._select, orderBy: [...this._select.orderBy, { column, direction }] });
  }

  limit(limit: number): SelectBuilder {
    return new SelectBuilder({ ...this._select, limit });
  }

  private _join(join: Join): SelectBuilder {
    return new SelectBuilder({ ...this._select, joins: [...this._select.joins, join] });
  }
}

/**
 * Intermediate builder step — holds the combinator and awaits a column name.
 */
export class ColumnSelector {
  constructor(
    private readonly _select: SelectParts,
    private readonly _combinator: Combinator,
  ) {}

  column(column: string): ValueSetter {
    return new ValueSetter(this._select, this._combinator, column);
  }
}

/**
 * Intermediate builder step — holds the column and awaits the comparison.
 */
export class ValueSetter {
  constructor(
    private readonly _select: SelectParts,
    private readonly _combinator: Combinator,
    private readonly _column: string,
  ) {}

  equals(value: unknown): SelectBuilder {
    return this._compare('=', value);
  }

  notEquals(value: unknown): SelectBuilder {
    return this._compare('<>', value);
  }

  greaterThan(value: unknown): SelectBuilder {
    return this._compare('>', value);
  }

  lessThan(value: unknown): SelectBuilder {
    return this._compare('<', value);
  }

  atLeast(value: unknown): SelectBuilder {
    return this._compare('>=', value);
  }

  atMost(value: unknown): SelectBuilder {
    return this._compare('<=', value);
  }

  /** Case-insensitive LIKE; the pattern is passed through unchanged. */
  ilike(pattern: string): SelectBuilder {
    return this._compare('ILIKE', pattern);
  }

  in(values: readonly unknown[]): SelectBuilder {
    return _applyFilter(this._select, this._combinator, { kind: 'in', column: this._column, values });
  }

  isNull(): SelectBuilder {
    return _applyFilter(this._select, this._combinator, { kind: 'null', column: this._column });
  }

  private _compare(operator: ComparisonOperator, value: unknown): SelectBuilder {
    return _applyFilter(this._select, this._combinator, {
      kind: 'compare',
      column: this._column,
      operator,
      value,
    });
  }
}
