import { Pool } from 'pg';
import dotenv from 'dotenv';

dotenv.config();

let pool: Pool | undefined;

export function getPool(): Pool {
  if (pool) return pool;

  const databaseUrl = process.env.DATABASE_URL;

  if (!databaseUrl) {
    console.error('ERROR: DATABASE_URL environment variable is not set!');
    throw new Error('DATABASE_URL is required');
  }

  console.log('Database URL configured:', `${databaseUrl.split('@')[0]}@***`);

  pool = new Pool({
    connectionString: databaseUrl,
    // Hosted databases require SSL; local PostgreSQL usually runs without it
    ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
  });

  pool.on('error', (err) => {
    console.error('Unexpected error on idle client', err);
  });

  return pool;
}
