import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";
import { getConfig } from "./config";
import { ServiceUnavailableError } from "./errors";
import { storageLogger } from "./logger";

const { Pool } = pg;

export type Database = NodePgDatabase<typeof schema>;

let pool: pg.Pool | null = null;
let database: Database | null = null;
let warnedUnconfigured = false;

function connect(): Database | null {
  if (database) return database;

  // Without DATABASE_URL the server still starts so that health checks and /api/predict work
  const { DATABASE_URL: databaseUrl, DB_POOL_SIZE: poolSize } = getConfig();
  if (!databaseUrl) {
    if (!warnedUnconfigured) {
      storageLogger.warn("DATABASE_URL not set - database operations will fail");
      warnedUnconfigured = true;
    }
    return null;
  }

  pool = new Pool({
    connectionString: databaseUrl,
    max: poolSize,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });
  pool.on("error", (err) => {
    storageLogger.error({ err }, "Idle database client error");
  });

  storageLogger.info({ poolSize }, "Database pool configured");
  database = drizzle(pool, { schema });
  return database;
}

export function getDb(): Database {
  const db = connect();
  if (!db) {
    throw new ServiceUnavailableError("Database is not configured");
  }
  return db;
}

export function isDatabaseAvailable(): boolean {
  return connect() !== null;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
  }
  pool = null;
  database = null;
}
