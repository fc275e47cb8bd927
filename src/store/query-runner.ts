import type pg from 'pg';
import { QueryExecutionError } from '../errors.js';
import { compileSelect } from '../query/compiler.js';
import type { CompiledQuery } from '../query/compiler.js';
import { toSelectDefinition } from '../query/queryable.js';
import type { Queryable } from '../query/queryable.js';
import type { SelectDefinition } from '../query/types.js';

export interface QueryRunnerConfig {
  pool: pg.Pool;
}

export interface QueryRunner {
  all<R extends pg.QueryResultRow = pg.QueryResultRow>(source: SelectDefinition | Queryable): Promise<R[]>;
  first<R extends pg.QueryResultRow = pg.QueryResultRow>(source: SelectDefinition | Queryable): Promise<R | null>;
  close(): Promise<void>;
}

/**
 * Runs select queries (or composites producing them) against PostgreSQL.
 * Composites are applied before compiling, so configuration errors surface
 * before anything reaches the database.
 */
export class PostgresQueryRunner implements QueryRunner {
  private readonly pool: pg.Pool;

  constructor(config: QueryRunnerConfig) {
    this.pool = config.pool;
  }

  async all<R extends pg.QueryResultRow = pg.QueryResultRow>(source: SelectDefinition | Queryable): Promise<R[]> {
    const result = await this.run<R>(compileSelect(toSelectDefinition(source)));
    return result.rows;
  }

  async first<R extends pg.QueryResultRow = pg.QueryResultRow>(source: SelectDefinition | Queryable): Promise<R | null> {
    const definition = toSelectDefinition(source);
    const result = await this.run<R>(
      compileSelect({ _select: { ...definition._select, limit: 1 } }),
    );
    return result.rows[0] ?? null;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async run<R extends pg.QueryResultRow>({ sql, params }: CompiledQuery): Promise<pg.QueryResult<R>> {
    try {
      return await this.pool.query<R>(sql, params);
    } catch (err) {
      throw new QueryExecutionError(`Failed to run query: ${String(err)}`, err);
    }
  }
}
