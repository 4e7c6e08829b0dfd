import { Pool } from "pg";
import { config } from "../config";
import { logger } from "../logger";

let pool: Pool | null = null;

export function getDb(): Pool {
  if (!pool) {
    pool = new Pool({
      host: config.db.host,
      port: config.db.port,
      user: config.db.user,
      password: config.db.password,
      database: config.db.database
    });
  }
  return pool;
}

export async function migrate(): Promise<void> {
  if (!config.db.enabled) {
    logger.warn({ traceId: "system" }, "DB not configured; backend health persists in memory only");
    return;
  }
  await getDb().query(
    "CREATE TABLE IF NOT EXISTS backend_health (backend_id TEXT PRIMARY KEY, rolling_success_rate DOUBLE PRECISION NOT NULL, last_failure_at_millis BIGINT, updated_at TIMESTAMPTZ DEFAULT NOW())"
  );
  logger.info({ traceId: "system" }, "Backend health storage ready");
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
