import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema';
import type { AppConfig } from '../config';

let pool: Pool | null = null;
let db: ReturnType<typeof drizzle<typeof schema>> | null = null;

export const getPgDb = (config: Pick<AppConfig, 'databaseUrl' | 'databaseSsl'>) => {
  if (!db) {
    if (!config.databaseUrl) {
      throw new Error('DATABASE_URL is not set and VCAP_SERVICES does not contain PostgreSQL credentials');
    }
    pool = new Pool({
      connectionString: config.databaseUrl,
      ssl: config.databaseSsl ? { rejectUnauthorized: false } : undefined,
    });
    db = drizzle(pool, { schema });
  }
  return db;
};

export const closePgDb = async () => {
  if (pool) {
    await pool.end();
    pool = null;
    db = null;
  }
};
