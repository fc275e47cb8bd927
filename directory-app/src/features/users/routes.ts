import type { FastifyInstance } from 'fastify';
import type { QueryRunner } from 'query-composite';
import { baseUsersQuery, userListComposite, userSearch } from './filters.js';
import type { UserListQuery, UserSearch } from './filters.js';

export interface UserRow {
  id: number;
  name: string;
  email: string;
  active: boolean;
}

export async function registerUserRoutes(app: FastifyInstance, runner: QueryRunner): Promise<void> {
  // GET /users — flat query-string filters, unknown keys are ignored
  app.get('/users', async (request, reply) => {
    const query = request.query as UserListQuery;
    const rows = await runner.all<UserRow>(userListComposite(query));
    return reply.status(200).send(rows);
  });

  // POST /users/search — nested JSON filters, unknown keys are rejected
  app.post('/users/search', async (request, reply) => {
    const body = (request.body ?? {}) as UserSearch;
    const rows = await runner.all<UserRow>(userSearch.apply(baseUsersQuery(), body));
    return reply.status(200).send(rows);
  });
}
