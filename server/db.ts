import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import * as schema from "@shared/schema";
import { ConfigError } from "./errors";

export type Database = NodePgDatabase<typeof schema>;

let pool: pg.Pool | null = null;
let db: Database | null = null;

export function getDb(databaseUrl: string | undefined = process.env.DATABASE_URL): Database {
  if (db) return db;

  if (!databaseUrl) {
    throw new ConfigError("DATABASE_URL must be set. Did you forget to provision a database?");
  }

  pool = new pg.Pool({ connectionString: databaseUrl });
  db = drizzle(pool, { schema });
  return db;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
  }
  pool = null;
  db = null;
}
