import type { FilterNode, Join, SelectDefinition, TableRef } from './types.js';

export interface CompiledQuery {
  sql: string;
  params: unknown[];
}

/**
 * Compiles a FilterNode into a SQL fragment and appends parameters.
 * Uses a shared counter object so recursive calls share the same sequence.
 */
function compileFilterNode(
  node: FilterNode,
  params: unknown[],
  counter: { n: number },
): string {
  switch (node.kind) {
    case 'compare':
      params.push(node.value);
      counter.n += 1;
      return `${node.column} ${node.operator} $${counter.n}`;
    case 'in':
      params.push([...node.values]);
      counter.n += 1;
      return `${node.column} = ANY($${counter.n})`;
    case 'null':
      return `${node.column} IS NULL`;
    case 'and':
    case 'or': {
      const separator = node.kind === 'and' ? ' AND ' : ' OR ';
      const parts = node.filters.map((f) => compileFilterNode(f, params, counter));
      return `(${parts.join(separator)})`;
    }
  }
}

function tableSQL(ref: TableRef): string {
  return ref.alias === null ? ref.table : `${ref.table} AS ${ref.alias}`;
}

function joinSQL(join: Join): string {
  const keyword = join.type === 'inner' ? 'INNER JOIN' : 'LEFT JOIN';
  return `${keyword} ${tableSQL(join)} ON ${join.on}`;
}

/**
 * Compiles a SelectDefinition into a parameterized SELECT. Placeholders are
 * numbered in the order they appear; identifiers are emitted as given.
 */
export function compileSelect(query: SelectDefinition): CompiledQuery {
  const { from, columns, joins, filter, orderBy, limit } = query._select;
  const params: unknown[] = [];
  const counter = { n: 0 };

  const lines = [
    `SELECT ${columns.length === 0 ? '*' : columns.join(', ')}`,
    `FROM ${tableSQL(from)}`,
    ...joins.map(joinSQL),
  ];

  if (filter !== null) {
    const where = compileFilterNode(filter, params, counter);
    // Grouped nodes come back parenthesized; strip the outer pair at top level
    lines.push(`WHERE ${filter.kind === 'and' || filter.kind === 'or' ? where.slice(1, -1) : where}`);
  }

  if (orderBy.length > 0) {
    lines.push(`ORDER BY ${orderBy.map((o) => `${o.column} ${o.direction.toUpperCase()}`).join(', ')}`);
  }

  if (limit !== null) {
    params.push(limit);
    counter.n += 1;
    lines.push(`LIMIT $${counter.n}`);
  }

  return { sql: lines.join('\n'), params };
}
