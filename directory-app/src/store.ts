import pg from 'pg';
import { PostgresQueryRunner } from 'query-composite';
import type { QueryRunner } from 'query-composite';

export function createRunner(connectionString: string): QueryRunner {
  return new PostgresQueryRunner({ pool: new pg.Pool({ connectionString }) });
}
