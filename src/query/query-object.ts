import { SelectBuilder } from './builder.js';

/**
 * Entry point for the select DSL.
 *
 * @example
 * select.from('users', 'u')
 *   .join('departments', 'd', 'd.id = u.department_id')
 *   .where.column('u.active').equals(true)
 *   .and.column('d.location').in(['Lviv', 'Porto'])
 *   .orderBy('u.name')
 */
export const select = {
  from(table: string, alias?: string): SelectBuilder {
    return new SelectBuilder({
      from: { table, alias: alias ?? null },
      columns: [],
      joins: [],
      filter: null,
      orderBy: [],
      limit: null,
    });
  },
};
