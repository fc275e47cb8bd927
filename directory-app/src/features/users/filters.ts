import { composite, defaultIgnore, select } from 'query-composite';
import type { ParamOptions, SelectBuilder } from 'query-composite';

export type UserOrder = 'name_asc' | 'department_name_asc';

/** JSON body accepted by POST /users/search. */
export interface UserSearch {
  name?: string;
  company?: { name?: string };
  locations?: string[];
  order?: UserOrder;
}

export const USER_COLUMNS = ['u.id', 'u.name', 'u.email', 'u.active'] as const;

export function baseUsersQuery(): SelectBuilder {
  return select.from('users', 'u').columns(...USER_COLUMNS);
}

function joinDepartments(q: SelectBuilder): SelectBuilder {
  return q.join('departments', 'd', 'd.id = u.department_id');
}

function joinCompanies(q: SelectBuilder): SelectBuilder {
  return q.join('companies', 'c', 'c.id = d.company_id');
}

function toList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [value];
}

// "Worldwide" anywhere in the list means no location filter
function ignoreLocations(value: unknown): boolean {
  return defaultIgnore(value) || (Array.isArray(value) && value.includes('Worldwide'));
}

function applyOrder(q: SelectBuilder, order: unknown): SelectBuilder {
  return order === 'department_name_asc' ? q.orderBy('d.name') : q.orderBy('u.name');
}

// Newest users first unless an order is given
const orderOptions: ParamOptions<SelectBuilder> = {
  requires: (order) => (order === 'department_name_asc' ? 'departments' : null),
  onIgnore: (q) => q.orderBy('u.id', 'desc'),
};

/**
 * Prepared (deferred) composite for the search endpoint. Unknown body
 * fields are rejected.
 */
export const userSearch = composite
  .create<SelectBuilder, UserSearch>({ strict: true })
  .param('name', (q, name) => q.and.column('u.name').equals(name))
  .param(['company', 'name'], (q, name) => q.and.column('c.name').equals(name), {
    requires: 'companies',
  })
  .param('locations', (q, locations) => q.and.column('d.location').in(toList(locations)), {
    requires: 'departments',
    ignore: ignoreLocations,
  })
  .param('order', applyOrder, orderOptions)
  .dependency('companies', joinCompanies, { requires: 'departments' })
  .dependency('departments', joinDepartments);

/** Query-string filters for GET /users. Everything arrives as a string. */
export type UserListQuery = Record<string, string | string[] | undefined>;

/**
 * Bound composite for the list endpoint: built per request around the
 * request's own query string.
 */
export function userListComposite(query: UserListQuery) {
  return composite
    .createBound(baseUsersQuery(), query)
    .param('name', (q, name) => q.and.column('u.name').ilike(`%${String(name)}%`))
    .param('active', (q, active) => q.and.column('u.active').equals(active === 'true'))
    .param('department', (q, department) => q.and.column('d.name').equals(department), {
      requires: 'departments',
    })
    .param('company', (q, company) => q.and.column('c.name').equals(company), {
      requires: 'companies',
    })
    .param('order', applyOrder, orderOptions)
    .dependency('companies', joinCompanies, { requires: 'departments' })
    .dependency('departments', joinDepartments);
}
