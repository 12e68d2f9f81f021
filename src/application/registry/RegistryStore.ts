import type { LeaseRecord } from './types.js';

export interface RegistryStore {
  get(name: string): LeaseRecord | undefined;
  /** Upsert; replaces any existing record for `name` entirely. */
  put(name: string, record: LeaseRecord): void;
  exists(name: string): boolean;
}

/** Name/record pairs; names stay plain data whatever their spelling. */
export type RegistryStoreSnapshot = Array<[name: string, record: LeaseRecord]>;

const copyRecord = (record: LeaseRecord): LeaseRecord => ({ ...record });

// Records are copied in and out so callers never alias stored state.
export class InMemoryRegistryStore implements RegistryStore {
  private readonly records = new Map<string, LeaseRecord>();

  public constructor(snapshot: RegistryStoreSnapshot = []) {
    for (const [name, record] of snapshot) {
      this.records.set(name, copyRecord(record));
    }
  }

  public get(name: string): LeaseRecord | undefined {
    const record = this.records.get(name);
    return record ? copyRecord(record) : undefined;
  }

  public put(name: string, record: LeaseRecord): void {
    this.records.set(name, copyRecord(record));
  }

  public exists(name: string): boolean {
    return this.records.has(name);
  }

  public toSnapshot(): RegistryStoreSnapshot {
    return [...this.records].map(([name, record]): [string, LeaseRecord] => [name, copyRecord(record)]);
  }
}
