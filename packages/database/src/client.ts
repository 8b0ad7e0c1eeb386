import pg from "pg";
import { optionalEnv, optionalIntEnv } from "@stockroom/shared";

const { Pool } = pg;

let pool: pg.Pool | null = null;

const DEFAULT_POOL_MAX = 5;
const DEFAULT_IDLE_TIMEOUT_MS = 30000;
const DEFAULT_CONN_TIMEOUT_MS = 10000;

export interface QueryResultLike<T> {
  rows: T[];
  rowCount: number | null;
}

/**
 * Anything that can run a parameterised statement: the pool, or a client
 * checked out for a transaction. Every query function takes one so the same
 * code runs standalone or inside `transaction()`.
 */
export interface Queryable {
  query<T extends pg.QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResultLike<T>>;
}

function getPoolConfig(): pg.PoolConfig {
  return {
    max: optionalIntEnv("PG_POOL_MAX", DEFAULT_POOL_MAX),
    idleTimeoutMillis: optionalIntEnv("PG_IDLE_TIMEOUT_MS", DEFAULT_IDLE_TIMEOUT_MS),
    connectionTimeoutMillis: optionalIntEnv("PG_CONN_TIMEOUT_MS", DEFAULT_CONN_TIMEOUT_MS),
    keepAlive: true,
  };
}

export function getPool(): pg.Pool {
  if (!pool) {
    const poolConfig = getPoolConfig();
    const url = optionalEnv("DATABASE_URL", "");

    if (url) {
      pool = new Pool({
        connectionString: url,
        ...poolConfig,
      });
      return pool;
    }

    pool = new Pool({
      host: optionalEnv("DATABASE_HOST", "localhost"),
      port: optionalIntEnv("DATABASE_PORT", 5432),
      database: optionalEnv("DATABASE_NAME", "stockroom"),
      user: optionalEnv("DATABASE_USERNAME", "postgres"),
      password: optionalEnv("DATABASE_PASSWORD", ""),
      ...poolConfig,
    });
  }
  return pool;
}

export async function query<T extends pg.QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<pg.QueryResult<T>> {
  const client = getPool();
  return client.query<T>(text, params);
}

/** The pool, lazily created on first use. */
export const defaultDb: Queryable = { query };

function asQueryable(client: pg.PoolClient): Queryable {
  return {
    query: <T extends pg.QueryResultRow>(text: string, params?: unknown[]) =>
      client.query<T>(text, params),
  };
}

/**
 * Runs `fn` inside BEGIN/COMMIT on one pooled client; any throw rolls back
 * and is rethrown unchanged.
 */
export async function transaction<T>(
  fn: (db: Queryable) => Promise<T>,
): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query("BEGIN");
    const result = await fn(asQueryable(client));
    await client.query("COMMIT");
    return result;
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Narrow a thrown value to a Postgres unique violation (SQLSTATE 23505),
 * optionally on a named constraint.
 */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (!(error instanceof Error) || !("code" in error) || error.code !== "23505") {
    return false;
  }
  if (constraint === undefined) return true;
  return "constraint" in error && error.constraint === constraint;
}
