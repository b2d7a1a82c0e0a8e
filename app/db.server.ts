import { Pool } from "pg";
import { drizzle, type NodePgDatabase, type NodePgQueryResultHKT } from "drizzle-orm/node-postgres";
import type { PgDatabase } from "drizzle-orm/pg-core";
import * as schema from "./db/schema";
import { DATABASE_CONFIG } from "./utils/config.server";
import { logger } from "./utils/logger.server";

export type Database = NodePgDatabase<typeof schema>;

/**
 * Anything queries can run on: the pool-backed database or an open
 * transaction handed out by `db.transaction`.
 */
export type DbExecutor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export type DbTransaction = Parameters<Parameters<Database["transaction"]>[0]>[0];

declare global {
  // eslint-disable-next-line no-var
  var __licensePool: Pool | undefined;
}

function createPool(): Pool {
  const pool = new Pool({
    connectionString: DATABASE_CONFIG.URL,
    max: DATABASE_CONFIG.POOL_MAX,
    idleTimeoutMillis: DATABASE_CONFIG.IDLE_TIMEOUT_MS,
  });
  pool.on("error", (error) => {
    logger.error("[DB] Idle client error", error);
  });
  if (process.env.NODE_ENV !== "production") {
    logger.debug("[STARTUP] pg pool configured", {
      poolMax: DATABASE_CONFIG.POOL_MAX,
      idleTimeoutMs: DATABASE_CONFIG.IDLE_TIMEOUT_MS,
    });
  }
  return pool;
}

export const pool: Pool = global.__licensePool || createPool();

if (process.env.NODE_ENV !== "production") {
  global.__licensePool = pool;
}

const db: Database = drizzle(pool, { schema });

export async function closeDatabase(): Promise<void> {
  await pool.end();
  global.__licensePool = undefined;
  logger.info("[DB] Pool closed");
}

export default db;
