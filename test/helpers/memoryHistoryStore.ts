import { HistoryRecord } from '../../src/engine';
import { HistoryStore } from '../../src/services/historyStore';

const copy = (record: HistoryRecord): HistoryRecord => ({
  ...record,
  pairs: record.pairs.map((pair) => ({ ...pair })),
});

export class MemoryHistoryStore implements HistoryStore {
  private groups = new Map<string, HistoryRecord[]>();

  async listHistory(group: string): Promise<HistoryRecord[]> {
    const records = this.groups.get(group) ?? [];
    return records.map(copy).sort((a, b) => b.year - a.year);
  }

  async saveDraw(group: string, record: HistoryRecord): Promise<boolean> {
    const records = this.groups.get(group) ?? [];
    if (records.some((r) => r.year === record.year)) return false;
    records.push(copy(record));
    this.groups.set(group, records);
    return true;
  }

  async setExcludePairs(group: string, year: number, excludePairs: boolean): Promise<boolean> {
    const record = this.groups.get(group)?.find((r) => r.year === year);
    if (!record) return false;
    record.exclude_pairs = excludePairs;
    return true;
  }
}
