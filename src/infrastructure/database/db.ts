/**
 * PostgreSQL connection pool for the pgvector form store.
 *
 * Accepts either a full DATABASE_URL or discrete host settings. Statement and
 * query timeouts bound every store call so a stalled database surfaces as a
 * search failure instead of a hung request.
 */
import { Pool } from "pg";

import type { AppConfig } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";

export function createPool(db: AppConfig["db"], queryTimeoutMs: number): Pool {
  const pool = new Pool({
    ...(db.connectionString
      ? { connectionString: db.connectionString }
      : {
          host: db.host,
          port: db.port,
          user: db.user,
          password: db.password,
          database: db.database,
        }),
    max: db.max,
    idleTimeoutMillis: db.idleTimeoutMs,
    connectionTimeoutMillis: db.connectionTimeoutMs,
    statement_timeout: queryTimeoutMs,
    query_timeout: queryTimeoutMs,
  });

  pool.on("error", (err) => {
    logger.log("error", "Unexpected PG pool error", { message: err.message });
  });

  return pool;
}
