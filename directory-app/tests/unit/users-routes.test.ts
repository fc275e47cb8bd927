import { describe, it, expect, vi, afterEach } from 'vitest';
import type pg from 'pg';
import { PostgresQueryRunner } from 'query-composite';
import { buildServer } from '../../src/api/server.js';

const ROWS = [{ id: 1, name: 'John', email: 'john@example.test', active: true }];

function makeMockPool(rows: object[]) {
  return {
    query: vi.fn().mockResolvedValue({ rows, rowCount: rows.length }),
    connect: vi.fn(),
    end: vi.fn().mockResolvedValue(undefined),
  };
}

function makeApp(pool: ReturnType<typeof makeMockPool>) {
  const runner = new PostgresQueryRunner({ pool: pool as unknown as pg.Pool });
  return buildServer(runner, { logger: false });
}

let app: ReturnType<typeof makeApp> | undefined;

afterEach(async () => {
  await app?.close();
  app = undefined;
});

describe('GET /api/v1/users', () => {
  it('returns the rows for the compiled filters', async () => {
    const pool = makeMockPool(ROWS);
    app = makeApp(pool);

    const res = await app.inject({ method: 'GET', url: '/api/v1/users', query: { name: 'jo', page: '2' } });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(ROWS);
    expect(pool.query).toHaveBeenCalledWith(
      'SELECT u.id, u.name, u.email, u.active\nFROM users AS u\nWHERE u.name ILIKE $1\nORDER BY u.id DESC',
      ['%jo%'],
    );
  });

  it('maps database failures to 500', async () => {
    const pool = makeMockPool([]);
    pool.query.mockRejectedValue(new Error('connection refused'));
    app = makeApp(pool);

    const res = await app.inject({ method: 'GET', url: '/api/v1/users' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: 'InternalError', message: 'Internal server error' });
  });
});

describe('POST /api/v1/users/search', () => {
  it('returns the rows for nested filters', async () => {
    const pool = makeMockPool(ROWS);
    app = makeApp(pool);

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/users/search',
      payload: { company: { name: 'Pear' } },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(ROWS);
    expect(pool.query).toHaveBeenCalledWith(
      [
        'SELECT u.id, u.name, u.email, u.active',
        'FROM users AS u',
        'INNER JOIN departments AS d ON d.id = u.department_id',
        'INNER JOIN companies AS c ON c.id = d.company_id',
        'WHERE c.name = $1',
        'ORDER BY u.id DESC',
      ].join('\n'),
      ['Pear'],
    );
  });

  it('rejects undeclared filters with 400 and never queries', async () => {
    const pool = makeMockPool(ROWS);
    app = makeApp(pool);

    const res = await app.inject({
      method: 'POST',
      url: '/api/v1/users/search',
      payload: { name: 'John', nickname: 'jd', company: { size: 10 } },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: 'UnknownParameterError',
      message: 'Unknown parameters found under the following paths: ["nickname"], ["company", "size"]',
      paths: [['nickname'], ['company', 'size']],
    });
    expect(pool.query).not.toHaveBeenCalled();
  });
});
