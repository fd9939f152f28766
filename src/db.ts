import { Pool, type PoolClient, type QueryResultRow } from 'pg';

export type SqlResult<R> = {
  rows: R[];
  rowCount: number | null;
};

/** The slice of a Postgres connection the frontier and the migrator use. */
export interface Sql {
  query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<SqlResult<R>>;
  /** Multi-statement script, no parameters. */
  exec(script: string): Promise<void>;
}

export interface Database extends Sql {
  transaction<T>(fn: (tx: Sql) => Promise<T>): Promise<T>;
  end(): Promise<void>;
}

export function buildPool(env: NodeJS.ProcessEnv = process.env): Pool {
  const max = parseInt(env.PGPOOL_MAX || '10', 10);

  // PG* fields win over DATABASE_URL
  const hasPgFields = Boolean(env.PGHOST || env.PGUSER || env.PGPASSWORD || env.PGDATABASE);
  const direct = !hasPgFields ? env.DATABASE_URL : undefined;
  if (direct) {
    const needsSsl = /sslmode=require/i.test(direct);
    return new Pool({
      connectionString: direct,
      max,
      ssl: needsSsl ? { rejectUnauthorized: false } : undefined
    });
  }

  return new Pool({
    host: env.PGHOST || '127.0.0.1',
    port: parseInt(env.PGPORT || '5432', 10),
    user: env.PGUSER || 'postgres',
    password: env.PGPASSWORD || 'postgres',
    database: env.PGDATABASE || 'postgres',
    max,
    ssl: env.PGSSL ? { rejectUnauthorized: false } : undefined
  });
}

export async function withClient<T>(pool: Pool, fn: (c: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

function clientSql(c: PoolClient): Sql {
  return {
    async query<R extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []) {
      const res = await c.query<R>(text, params);
      return { rows: res.rows, rowCount: res.rowCount };
    },
    async exec(script: string) {
      await c.query(script);
    }
  };
}

/** node-postgres pool behind the Database interface. */
export class PoolDatabase implements Database {
  constructor(readonly pool: Pool) {}

  async query<R extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []): Promise<SqlResult<R>> {
    const res = await this.pool.query<R>(text, params);
    return { rows: res.rows, rowCount: res.rowCount };
  }

  async exec(script: string): Promise<void> {
    await this.pool.query(script);
  }

  transaction<T>(fn: (tx: Sql) => Promise<T>): Promise<T> {
    return withClient(this.pool, async (c) => {
      await c.query('BEGIN');
      try {
        const out = await fn(clientSql(c));
        await c.query('COMMIT');
        return out;
      } catch (err) {
        await c.query('ROLLBACK');
        throw err;
      }
    });
  }

  end(): Promise<void> {
    return this.pool.end();
  }
}
