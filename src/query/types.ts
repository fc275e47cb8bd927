export type ComparisonOperator = '=' | '<>' | '>' | '<' | '>=' | '<=' | 'ILIKE';

export type FilterNode =
  | { kind: 'compare'; column: string; operator: ComparisonOperator; value: unknown }
  | { kind: 'in'; column: string; values: readonly unknown[] }
  | { kind: 'null'; column: string }
  | { kind: 'and'; filters: FilterNode[] }
  | { kind: 'or'; filters: FilterNode[] };

export interface TableRef {
  table: string;
  alias: string | null;
}

export interface Join extends TableRef {
  type: 'inner' | 'left';
  on: string;
}

export interface OrderBy {
  column: string;
  direction: 'asc' | 'desc';
}

export interface SelectParts {
  from: TableRef;
  columns: readonly string[];
  joins: readonly Join[];
  filter: FilterNode | null;
  orderBy: readonly OrderBy[];
  limit: number | null;
}

/**
 * Opaque select query accepted by the compiler and the query runner.
 * Built via the `select` DSL — do not construct directly.
 */
export interface SelectDefinition {
  readonly _select: SelectParts;
}
