// 역할: 스타 스키마(PostgreSQL) 커넥션 풀과 쿼리/트랜잭션 헬퍼.
import "dotenv/config";
import {
  Pool,
  type PoolClient,
  type PoolConfig,
  type QueryResultRow,
} from "pg";
import { loadEnv, type PostgresConfig } from "../config/env";

let pool: Pool | null = null;

export type DbClient = PoolClient;

export function toPoolConfig(config: PostgresConfig): PoolConfig {
  const ssl = config.ssl ? { rejectUnauthorized: false } : undefined;
  const base: PoolConfig = {
    ssl,
    connectionTimeoutMillis: 10_000,
    idleTimeoutMillis: 30_000,
    max: 5,
    keepAlive: true,
  };
  if ("connectionString" in config) {
    return { ...base, connectionString: config.connectionString };
  }
  return {
    ...base,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
  };
}

// 첫 쿼리 시점에 풀을 만든다.
export function getPool(): Pool {
  if (!pool) {
    pool = new Pool(toPoolConfig(loadEnv().postgres));
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params: unknown[] = [],
  client?: DbClient,
) {
  const executor = client ?? getPool();
  return executor.query<T>(text, params);
}

export async function withClient<T>(
  fn: (client: DbClient) => Promise<T>,
): Promise<T> {
  const client = await getPool().connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}

export async function withTx<T>(
  fn: (client: DbClient) => Promise<T>,
): Promise<T> {
  return withClient(async (client) => {
    await client.query("BEGIN");
    try {
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    }
  });
}
