import { describe, it, expect, afterEach, vi } from 'vitest';
import { PgHistoryStore, SqlClient, SqlPool } from '../src/services/historyStore';

type Reply = unknown[] | Error;

/** Records every statement and answers from a queue; unqueued statements get no rows. */
class StubPool implements SqlPool {
  readonly calls: [string, unknown[] | undefined][] = [];
  released = 0;
  private readonly replies: Reply[];

  constructor(...replies: Reply[]) {
    this.replies = replies;
  }

  async query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }> {
    this.calls.push([text.replace(/\s+/g, ' ').trim(), values]);
    const reply = this.replies.shift() ?? [];
    if (reply instanceof Error) throw reply;
    return { rows: reply };
  }

  async connect(): Promise<SqlClient & { release(): void }> {
    return {
      query: (text, values) => this.query(text, values),
      release: () => {
        this.released++;
      },
    };
  }

  statements(): string[] {
    return this.calls.map(([text]) => text.split(' ').slice(0, 3).join(' '));
  }
}

const record = {
  year: 2025,
  exclude_pairs: true,
  pairs: [
    { giver: 'Ann', receiver: 'Ben' },
    { giver: 'Ben', receiver: 'Cat' },
    { giver: 'Cat', receiver: 'Ann' },
  ],
};

describe('PgHistoryStore', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('groups joined rows into records, newest first', async () => {
    const pool = new StubPool([
      { year: 2025, exclude_pairs: true, giver: 'Ann', receiver: 'Ben' },
      { year: 2025, exclude_pairs: true, giver: 'Ben', receiver: 'Ann' },
      { year: 2024, exclude_pairs: false, giver: null, receiver: null },
      { year: 2023, exclude_pairs: true, giver: 'Cat', receiver: 'Ann' },
    ]);
    const store = new PgHistoryStore(() => pool);

    expect(await store.listHistory('family')).toEqual([
      {
        year: 2025,
        exclude_pairs: true,
        pairs: [
          { giver: 'Ann', receiver: 'Ben' },
          { giver: 'Ben', receiver: 'Ann' },
        ],
      },
      { year: 2024, exclude_pairs: false, pairs: [] },
      { year: 2023, exclude_pairs: true, pairs: [{ giver: 'Cat', receiver: 'Ann' }] },
    ]);
    expect(pool.calls[0][1]).toEqual(['family']);
  });

  it('rejects rows that do not match the table layout', async () => {
    const store = new PgHistoryStore(() => new StubPool([{ year: '2025', exclude_pairs: true }]));
    await expect(store.listHistory('family')).rejects.toThrow();
  });

  it('stores a draw and its pairs in one transaction', async () => {
    const pool = new StubPool([], [{ id: 7 }]);
    const store = new PgHistoryStore(() => pool);

    expect(await store.saveDraw('family', record)).toBe(true);
    expect(pool.statements()).toEqual([
      'BEGIN',
      'INSERT INTO draws',
      'INSERT INTO draw_pairs',
      'INSERT INTO draw_pairs',
      'INSERT INTO draw_pairs',
      'COMMIT',
    ]);
    expect(pool.calls[1][1]).toEqual(['family', 2025, true]);
    expect(pool.calls.slice(2, 5).map(([, values]) => values)).toEqual([
      [7, 'Ann', 'Ben'],
      [7, 'Ben', 'Cat'],
      [7, 'Cat', 'Ann'],
    ]);
    expect(pool.released).toBe(1);
  });

  it('rolls back and reports false when the year is already stored', async () => {
    const pool = new StubPool([], []);
    const store = new PgHistoryStore(() => pool);

    expect(await store.saveDraw('family', record)).toBe(false);
    expect(pool.statements()).toEqual(['BEGIN', 'INSERT INTO draws', 'ROLLBACK']);
    expect(pool.released).toBe(1);
  });

  it('rethrows the insert error when the rollback fails too', async () => {
    const insertError = new Error('duplicate key value violates unique constraint');
    const rollbackError = new Error('connection terminated');
    const pool = new StubPool([], [{ id: 7 }], insertError, rollbackError);
    const store = new PgHistoryStore(() => pool);
    const logged = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(store.saveDraw('family', record)).rejects.toBe(insertError);
    expect(pool.statements()).toEqual(['BEGIN', 'INSERT INTO draws', 'INSERT INTO draw_pairs', 'ROLLBACK']);
    expect(logged).toHaveBeenCalledWith('Rollback failed:', rollbackError);
    expect(pool.released).toBe(1);
  });

  it('reports whether a year was toggled', async () => {
    const pool = new StubPool([{ id: 3 }], []);
    const store = new PgHistoryStore(() => pool);

    expect(await store.setExcludePairs('family', 2024, false)).toBe(true);
    expect(await store.setExcludePairs('family', 1999, true)).toBe(false);
    expect(pool.calls.map(([, values]) => values)).toEqual([
      ['family', 2024, false],
      ['family', 1999, true],
    ]);
  });

  it('does not create the pool until a query runs', async () => {
    const pool = new StubPool([]);
    const getPool = vi.fn(() => pool);
    const store = new PgHistoryStore(getPool);
    expect(getPool).not.toHaveBeenCalled();

    await store.listHistory('family');
    expect(getPool).toHaveBeenCalledTimes(1);
  });
});
