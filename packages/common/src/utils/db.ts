// ============================================
// Database Connection Pool
// ============================================

import pg from "pg";
import type { AppConfig } from "./config.js";

const { Pool } = pg;

let pool: pg.Pool | null = null;

export function getDbPool(config: AppConfig["postgres"]): pg.Pool {
  if (!pool) {
    const isSupabase = config.host.includes("supabase");
    pool = new Pool({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      ssl: isSupabase ? { rejectUnauthorized: false } : undefined,
    });
  }
  return pool;
}

export async function closeDbPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/** Minimal query surface; lets job code run against a fake in tests. */
export type QueryFn = (text: string, params?: unknown[]) => Promise<{ rowCount: number | null }>;

export function poolQuery(db: pg.Pool): QueryFn {
  return (text, params) => db.query(text, params);
}
