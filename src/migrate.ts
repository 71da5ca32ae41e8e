import { getPool } from './db';

async function migrate() {
  const pool = getPool();
  try {
    // One row per group and year
    await pool.query(`
      CREATE TABLE IF NOT EXISTS draws (
        id SERIAL PRIMARY KEY,
        group_name VARCHAR(255) NOT NULL,
        year INTEGER NOT NULL,
        exclude_pairs BOOLEAN NOT NULL DEFAULT TRUE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        UNIQUE(group_name, year)
      )
    `);

    await pool.query(`
      CREATE TABLE IF NOT EXISTS draw_pairs (
        id SERIAL PRIMARY KEY,
        draw_id INTEGER NOT NULL REFERENCES draws(id) ON DELETE CASCADE,
        giver VARCHAR(255) NOT NULL,
        receiver VARCHAR(255) NOT NULL,
        UNIQUE(draw_id, giver),
        UNIQUE(draw_id, receiver)
      )
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_draws_group_name ON draws(group_name)
    `);

    await pool.query(`
      CREATE INDEX IF NOT EXISTS idx_draw_pairs_draw_id ON draw_pairs(draw_id)
    `);

    console.log('Migration completed successfully');
    process.exit(0);
  } catch (error) {
    console.error('Migration failed:', error);
    process.exit(1);
  }
}

migrate();
