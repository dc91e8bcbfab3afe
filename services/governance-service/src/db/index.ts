import { Pool } from "pg";
import type { Logger } from "pino";
import { config } from "../config";
import { logger } from "../logger";

let pool: Pool | null = null;

export function getPool(): Pool {
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

export async function closePool(): Promise<void> {
  if (pool) {
    const current = pool;
    pool = null;
    await current.end();
  }
}

export async function migrate(log: Logger = logger): Promise<void> {
  if (config.useInMemoryStore) {
    log.warn({ traceId: "system" }, "In-memory stores enabled; skipping database migration");
    return;
  }
  const db = getPool();
  await db.query(
    `CREATE TABLE IF NOT EXISTS audit_records (
       audit_id TEXT PRIMARY KEY,
       recorded_at TIMESTAMPTZ NOT NULL,
       actor TEXT NOT NULL,
       action TEXT NOT NULL,
       workflow_step TEXT NOT NULL,
       evidence_hash TEXT NOT NULL,
       record_json JSONB NOT NULL
     )`
  );
  await db.query(
    `CREATE TABLE IF NOT EXISTS siem_events (
       siem_event_id TEXT NOT NULL REFERENCES audit_records (audit_id),
       seq INTEGER NOT NULL,
       occurred_at TIMESTAMPTZ NOT NULL,
       event_type TEXT NOT NULL,
       severity_id INTEGER NOT NULL,
       event_json JSONB NOT NULL,
       PRIMARY KEY (siem_event_id, seq)
     )`
  );
  await db.query(
    `CREATE TABLE IF NOT EXISTS budget_states (
       agent_id TEXT PRIMARY KEY,
       period_start TIMESTAMPTZ NOT NULL,
       period_end TIMESTAMPTZ NOT NULL,
       daily_limit_micros BIGINT NOT NULL,
       monthly_limit_micros BIGINT NOT NULL,
       limit_micros BIGINT NOT NULL,
       cumulative_micros BIGINT NOT NULL,
       breaker TEXT NOT NULL CHECK (breaker IN ('closed', 'open')),
       updated_at TIMESTAMPTZ NOT NULL
     )`
  );
  log.info({ traceId: "system" }, "Governance storage ready");
}
