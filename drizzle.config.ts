import type { Config } from 'drizzle-kit';

const url = process.env.DATABASE_URL;

if (!url) {
  throw new Error('Missing DATABASE_URL for drizzle-kit.');
}

export default {
  schema: './worker/db/schema.ts',
  out: './migrations',
  dialect: 'postgresql',
  dbCredentials: { url },
} satisfies Config;
