import { z } from 'zod';
import { HistoryRecord } from '../engine';

/**
 * Past draws per group. Each year is stored at most once per group.
 */
export interface HistoryStore {
  listHistory(group: string): Promise<HistoryRecord[]>;
  /** Resolves false when the group already has a draw for that year */
  saveDraw(group: string, record: HistoryRecord): Promise<boolean>;
  /** Resolves false when there is no draw for that year */
  setExcludePairs(group: string, year: number, excludePairs: boolean): Promise<boolean>;
}

/** The part of a `pg` Pool the store uses. */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface SqlPool extends SqlClient {
  connect(): Promise<SqlClient & { release(): void }>;
}

const historyRowSchema = z.object({
  year: z.number().int(),
  exclude_pairs: z.boolean(),
  giver: z.string().nullable(),
  receiver: z.string().nullable(),
});

const idRowSchema = z.object({ id: z.number().int() });

export class PgHistoryStore implements HistoryStore {
  // The pool is created on first use so routes without storage run without DATABASE_URL
  constructor(private readonly getPool: () => SqlPool) {}

  async listHistory(group: string): Promise<HistoryRecord[]> {
    const result = await this.getPool().query(
      `SELECT d.year, d.exclude_pairs, p.giver, p.receiver
       FROM draws d
       LEFT JOIN draw_pairs p ON p.draw_id = d.id
       WHERE d.group_name = $1
       ORDER BY d.year DESC, p.id`,
      [group]
    );

    const records: HistoryRecord[] = [];
    for (const row of z.array(historyRowSchema).parse(result.rows)) {
      let record = records[records.length - 1];
      if (!record || record.year !== row.year) {
        record = { year: row.year, exclude_pairs: row.exclude_pairs, pairs: [] };
        records.push(record);
      }
      if (row.giver !== null && row.receiver !== null) {
        record.pairs.push({ giver: row.giver, receiver: row.receiver });
      }
    }
    return records;
  }

  async saveDraw(group: string, record: HistoryRecord): Promise<boolean> {
    const client = await this.getPool().connect();
    try {
      await client.query('BEGIN');

      const drawResult = await client.query(
        `INSERT INTO draws (group_name, year, exclude_pairs)
         VALUES ($1, $2, $3)
         ON CONFLICT (group_name, year) DO NOTHING
         RETURNING id`,
        [group, record.year, record.exclude_pairs]
      );
      const inserted = z.array(idRowSchema).parse(drawResult.rows);

      if (inserted.length === 0) {
        await client.query('ROLLBACK');
        return false;
      }

      const drawId = inserted[0].id;
      for (const pair of record.pairs) {
        await client.query(
          'INSERT INTO draw_pairs (draw_id, giver, receiver) VALUES ($1, $2, $3)',
          [drawId, pair.giver, pair.receiver]
        );
      }

      await client.query('COMMIT');
      return true;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        console.error('Rollback failed:', rollbackError);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async setExcludePairs(group: string, year: number, excludePairs: boolean): Promise<boolean> {
    const result = await this.getPool().query(
      'UPDATE draws SET exclude_pairs = $3 WHERE group_name = $1 AND year = $2 RETURNING id',
      [group, year, excludePairs]
    );
    return result.rows.length > 0;
  }
}
