import { Kysely, PostgresDialect, Transaction } from "kysely";
import { Pool, PoolConfig } from "pg";
import { Database } from "./types";
import { getDatabaseUrl } from "./config";

/** Anything model functions can run a query through: the pool or an open transaction. */
export type Executor = Kysely<Database>;

let _db: Kysely<Database> | null = null;

function isLocalHost(host: string): boolean {
  if (host === "localhost" || host === "127.0.0.1" || host === "::1") {
    return true;
  }
  // Docker service names have no dots
  return !host.includes(".");
}

export function getPoolConfig(connString?: string): PoolConfig {
  const connectionString = connString ?? getDatabaseUrl();
  const poolConfig: PoolConfig = { connectionString };
  const url = new URL(connectionString);
  const sslmode = url.searchParams.get("sslmode");

  if (sslmode === "disable") {
    poolConfig.ssl = false;
  } else if (sslmode || !isLocalHost(url.hostname)) {
    poolConfig.ssl = { rejectUnauthorized: false };
  } else {
    poolConfig.ssl = false;
  }

  return poolConfig;
}

function getDbInstance(): Kysely<Database> {
  if (!_db) {
    _db = new Kysely<Database>({
      dialect: new PostgresDialect({
        pool: new Pool(getPoolConfig()),
      }),
    });
  }
  return _db;
}

/**
 * Lazy proxy: accessing any property on `db` triggers connection creation.
 * Importing `db` alone has zero side effects.
 */
export const db: Kysely<Database> = new Proxy({} as Kysely<Database>, {
  get(_target, prop) {
    const instance = getDbInstance();
    const value: unknown = Reflect.get(instance, prop, instance);
    if (typeof value === "function") {
      return value.bind(instance);
    }
    return value;
  },
});

/**
 * Run `work` in a SERIALIZABLE transaction. Everything it writes commits
 * together or not at all.
 */
export async function inSerializableTransaction<T>(
  work: (trx: Transaction<Database>) => Promise<T>
): Promise<T> {
  return db.transaction().setIsolationLevel("serializable").execute(work);
}

/**
 * Tear down the connection pool. Call on shutdown.
 */
export async function closeDb(): Promise<void> {
  if (_db) {
    await _db.destroy();
    _db = null;
  }
}
