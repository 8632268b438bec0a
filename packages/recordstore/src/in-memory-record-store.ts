/**
 * InMemoryRecordStore - An in-memory implementation of RecordStore for testing.
 * Records are kept in insertion order and copied on the way in and out.
 */

import type {
  LocalID,
  PushConfirmation,
  RecordDraft,
  RecordFields,
  RecordPatch,
  RecordQuery,
  RecordStore,
  RemoteID,
  RemoteUpsert,
  SyncRecord,
  UpsertOutcome,
} from "@erpsync/core";

/**
 * Configuration options for InMemoryRecordStore.
 */
export interface InMemoryRecordStoreOptions {
  /**
   * Initial records to populate the store with.
   */
  initialRecords?: SyncRecord[];
  /**
   * Prefix for generated local identifiers (default "local-").
   */
  idPrefix?: string;
  /**
   * Clock used for `createdAt` on records inserted by an upsert.
   */
  now?: () => Date;
}

export class InMemoryRecordStore implements RecordStore {
  private records: Map<LocalID, SyncRecord>;
  private sequence: number;
  private readonly idPrefix: string;
  private readonly now: () => Date;
  private closed: boolean;

  constructor(options: InMemoryRecordStoreOptions = {}) {
    this.records = new Map();
    this.sequence = 0;
    this.idPrefix = options.idPrefix ?? "local-";
    this.now = options.now ?? (() => new Date());
    this.closed = false;

    if (options.initialRecords) {
      for (const record of options.initialRecords) {
        this.records.set(record.localId, copy(record));
      }
    }
  }

  async insert(draft: RecordDraft): Promise<SyncRecord> {
    const record: SyncRecord = { ...draft, localId: this.nextId() };
    this.records.set(record.localId, copy(record));
    return copy(record);
  }

  async get(localId: LocalID): Promise<SyncRecord | null> {
    const record = this.records.get(localId);
    return record ? copy(record) : null;
  }

  async find(query: RecordQuery): Promise<SyncRecord[]> {
    return Array.from(this.records.values())
      .filter((record) => matches(record, query))
      .map(copy);
  }

  async update(localId: LocalID, patch: RecordPatch): Promise<SyncRecord | null> {
    const existing = this.records.get(localId);
    if (!existing) {
      return null;
    }
    const updated: SyncRecord = { ...existing, ...definedOnly(patch) };
    this.records.set(localId, copy(updated));
    return copy(updated);
  }

  async confirmPush(
    localId: LocalID,
    pushed: RecordFields,
    confirmation: PushConfirmation
  ): Promise<SyncRecord | null> {
    const existing = this.records.get(localId);
    if (!existing) {
      return null;
    }
    const updated: SyncRecord = { ...existing, remoteId: confirmation.remoteId };
    if (sameFields(existing, pushed)) {
      updated.synced = true;
      updated.syncedAt = confirmation.syncedAt;
    }
    this.records.set(localId, copy(updated));
    return copy(updated);
  }

  async upsertByRemoteId(remoteId: RemoteID, values: RemoteUpsert): Promise<UpsertOutcome> {
    const existing = Array.from(this.records.values()).find((r) => r.remoteId === remoteId);

    if (!existing) {
      await this.insert({
        subject: values.subject,
        originator: values.originator,
        status: values.status,
        remoteId,
        createdAt: this.now(),
        synced: true,
        syncedAt: values.syncedAt,
      });
      return "inserted";
    }

    const next: SyncRecord = {
      ...existing,
      subject: values.subject,
      originator: values.originator,
      status: values.status,
      synced: true,
      syncedAt: values.syncedAt,
    };
    if (sameState(existing, next)) {
      return "unchanged";
    }
    this.records.set(existing.localId, copy(next));
    return "updated";
  }

  async delete(localId: LocalID): Promise<boolean> {
    return this.records.delete(localId);
  }

  async deleteAll(): Promise<number> {
    const count = this.records.size;
    this.records.clear();
    return count;
  }

  async ping(): Promise<boolean> {
    return !this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  // --- Helper methods for testing/debugging ---

  /**
   * Get all records without going through the async interface.
   */
  getAllRecords(): SyncRecord[] {
    return Array.from(this.records.values()).map(copy);
  }

  /**
   * Number of stored records.
   */
  get size(): number {
    return this.records.size;
  }

  private nextId(): LocalID {
    this.sequence++;
    return `${this.idPrefix}${this.sequence}`;
  }
}

function matches(record: SyncRecord, query: RecordQuery): boolean {
  if (query.synced !== undefined && record.synced !== query.synced) {
    return false;
  }
  if (query.remoteId !== undefined && record.remoteId !== query.remoteId) {
    return false;
  }
  return true;
}

function definedOnly(patch: RecordPatch): RecordPatch {
  const out: RecordPatch = {};
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) {
      Object.assign(out, { [key]: value });
    }
  }
  return out;
}

function sameFields(a: RecordFields, b: RecordFields): boolean {
  return a.subject === b.subject && a.originator === b.originator && a.status === b.status;
}

function sameState(a: SyncRecord, b: SyncRecord): boolean {
  return (
    sameFields(a, b) &&
    a.synced === b.synced &&
    a.syncedAt?.getTime() === b.syncedAt?.getTime()
  );
}

function copy(record: SyncRecord): SyncRecord {
  return {
    ...record,
    createdAt: new Date(record.createdAt.getTime()),
    syncedAt: record.syncedAt ? new Date(record.syncedAt.getTime()) : null,
  };
}
