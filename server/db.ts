import { Pool } from "pg";
import { drizzle } from "drizzle-orm/node-postgres";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import { fileURLToPath } from "node:url";
import * as schema from "@shared/schema";
import type { Logger } from "./logger";

const DATABASE_URL_KEYS = ["DATABASE_URL", "POSTGRES_URL"] as const;

function normalizeDatabaseUrl(rawUrl: string | undefined) {
  if (!rawUrl) return null;
  const unquoted = rawUrl.trim().replace(/^["']|["']$/g, "");
  return unquoted || null;
}

function resolveDatabaseUrl() {
  for (const key of DATABASE_URL_KEYS) {
    const value = normalizeDatabaseUrl(process.env[key]);
    if (value) {
      if (process.env[key]?.trim() !== value) {
        console.warn("Database URL contained wrapping quotes; sanitized value used.");
      }
      console.log(`Database URL source: ${key}`);
      return value;
    }
  }
  console.error("Database URL missing. Env keys present:", {
    DATABASE_URL: Boolean(process.env.DATABASE_URL),
    POSTGRES_URL: Boolean(process.env.POSTGRES_URL),
  });
  throw new Error("Database URL is missing. Set DATABASE_URL (or POSTGRES_URL) in the environment.");
}

const pool = new Pool({
  connectionString: resolveDatabaseUrl(),
  max: 10,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
  ssl: process.env.DATABASE_SSL === "true" ? { rejectUnauthorized: false } : undefined,
});

pool.on("error", (error) => {
  console.error("Unexpected PostgreSQL pool error:", error);
});

export const db = drizzle(pool, { schema });

export type Database = typeof db;

export async function checkDatabaseReady() {
  await pool.query("select 1");
}

export async function waitForDatabase(options?: { logger?: Logger; maxAttempts?: number }) {
  const logger = options?.logger ?? console;
  const maxAttempts = options?.maxAttempts ?? 12;
  let delayMs = 1000;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      await checkDatabaseReady();
      logger.log("Database connection ready");
      return true;
    } catch (error) {
      logger.error(`Database connection failed (attempt ${attempt}/${maxAttempts}).`, error);
      if (attempt === maxAttempts) {
        break;
      }
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      delayMs = Math.min(delayMs * 2, 30000);
    }
  }

  return false;
}

async function ensurePostgresSchema(logger: Logger) {
  const statements = [
    `CREATE TABLE IF NOT EXISTS telegram_users (
      id SERIAL PRIMARY KEY,
      telegram_id TEXT NOT NULL,
      username TEXT,
      first_name TEXT,
      last_name TEXT,
      language_code TEXT,
      is_admin BOOLEAN NOT NULL DEFAULT false,
      telegram_status TEXT DEFAULT 'active',
      total_commands INTEGER NOT NULL DEFAULT 0,
      last_seen TIMESTAMP,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )`,
    `CREATE UNIQUE INDEX IF NOT EXISTS telegram_users_telegram_id_unique ON telegram_users(telegram_id)`,
    `CREATE TABLE IF NOT EXISTS subscribers (
      id SERIAL PRIMARY KEY,
      client_id TEXT NOT NULL,
      client_uuid TEXT,
      telegram_id TEXT,
      data_cap_bytes BIGINT,
      expires_at TIMESTAMP,
      last_observed_bytes BIGINT NOT NULL DEFAULT 0,
      last_state TEXT,
      last_notified_state TEXT,
      last_checked_at TIMESTAMP,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )`,
    `CREATE UNIQUE INDEX IF NOT EXISTS subscribers_client_id_unique ON subscribers(client_id)`,
    `CREATE INDEX IF NOT EXISTS subscribers_telegram_id_index ON subscribers(telegram_id)`,
    `CREATE INDEX IF NOT EXISTS subscribers_last_state_index ON subscribers(last_state)`,
    `CREATE TABLE IF NOT EXISTS event_logs (
      id SERIAL PRIMARY KEY,
      level TEXT NOT NULL DEFAULT 'info',
      event_type TEXT NOT NULL,
      telegram_id TEXT,
      message TEXT,
      details TEXT,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )`,
    `CREATE INDEX IF NOT EXISTS event_logs_created_at_index ON event_logs(created_at)`,
    `CREATE INDEX IF NOT EXISTS event_logs_event_type_index ON event_logs(event_type)`,
    `CREATE TABLE IF NOT EXISTS message_queue (
      id SERIAL PRIMARY KEY,
      type TEXT NOT NULL,
      subscriber_id INTEGER REFERENCES subscribers(id),
      telegram_id TEXT,
      payload TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending',
      attempts INTEGER DEFAULT 0,
      last_error_code INTEGER,
      last_error_message TEXT,
      next_attempt_at TIMESTAMP,
      delivered_at TIMESTAMP,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )`,
    `CREATE INDEX IF NOT EXISTS message_queue_status_index ON message_queue(status, next_attempt_at)`,
    `CREATE TABLE IF NOT EXISTS backups (
      id SERIAL PRIMARY KEY,
      file_name TEXT NOT NULL,
      trigger TEXT NOT NULL DEFAULT 'scheduled',
      status TEXT NOT NULL DEFAULT 'in_progress',
      size_bytes INTEGER,
      error_message TEXT,
      created_by TEXT,
      created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
      completed_at TIMESTAMP
    )`,
    `CREATE INDEX IF NOT EXISTS backups_created_at_index ON backups(created_at)`,
  ];

  for (const statement of statements) {
    await pool.query(statement);
  }

  logger.log("Database schema ensured via PostgreSQL fallback");
}

export async function runDatabaseMigrations(options?: { logger?: Logger }) {
  const logger = options?.logger ?? console;
  const migrationsFolderPath = fileURLToPath(new URL("../migrations", import.meta.url));

  try {
    await migrate(db, { migrationsFolder: migrationsFolderPath });
    logger.log("Database migrations applied");
  } catch (error) {
    logger.error("Migration files unavailable or failed. Falling back to schema ensure.", error);
    await ensurePostgresSchema(logger);
  }
}

export function closeDatabase() {
  return pool.end();
}
