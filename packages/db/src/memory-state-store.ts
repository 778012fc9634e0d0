import type { StateStore, StoredRecord, StoredState } from "@converge/proto";

/**
 * Process-local state store for dry runs and tests.
 *
 * Records are copied on every read and write so callers never share
 * mutable state with the store.
 */
export class InMemoryStateStore implements StateStore {
  private records = new Map<string, StoredRecord>();

  constructor(initial?: Iterable<[string, StoredRecord]>) {
    for (const [configurationId, record] of initial ?? []) {
      this.records.set(configurationId, { ...record });
    }
  }

  async load(): Promise<StoredState> {
    const state: StoredState = new Map();
    for (const [configurationId, record] of this.records) {
      state.set(configurationId, { ...record });
    }
    return state;
  }

  async save(configurationId: string, record: StoredRecord): Promise<void> {
    this.records.set(configurationId, { ...record });
  }

  async remove(configurationId: string): Promise<void> {
    this.records.delete(configurationId);
  }

  /** Synchronous view for inspection */
  get(configurationId: string): StoredRecord | undefined {
    const record = this.records.get(configurationId);
    return record ? { ...record } : undefined;
  }

  get size(): number {
    return this.records.size;
  }
}
