import { serializePartKey } from './partKey';
import type { PartKey, PartRecord } from './types';

/**
 * Counts identical parts across one export run.
 *
 * The first observation of a key stores its fields; later observations only
 * bump the count.
 */
export class PartAggregator {
  private readonly records = new Map<string, PartRecord>();
  private observed = 0;

  observe(key: PartKey): PartRecord {
    this.observed += 1;

    const id = serializePartKey(key);
    const existing = this.records.get(id);
    if (existing) {
      existing.count += 1;
      return existing;
    }

    const record: PartRecord = { ...key, count: 1 };
    this.records.set(id, record);
    return record;
  }

  /** Number of distinct parts */
  get size(): number {
    return this.records.size;
  }

  /** Number of observed objects */
  get totalCount(): number {
    return this.observed;
  }

  /** Snapshot of every record, in no particular order */
  toRecords(): PartRecord[] {
    return Array.from(this.records.values(), (record) => ({ ...record }));
  }
}
