/**
 * MongoRecordStore - RecordStore over a MongoDB collection via the official driver.
 *
 * Documents keep the field names of the ERP side (`name`, `raised_by`) and
 * snake_case bookkeeping fields, so existing collections stay readable.
 */

import { MongoClient, ObjectId, type Collection, type Db, type Filter } from "mongodb";
import {
  createLogger,
  type LocalID,
  type Logger,
  type PushConfirmation,
  type RecordDraft,
  type RecordFields,
  type RecordPatch,
  type RecordQuery,
  type RecordStore,
  type RemoteID,
  type RemoteUpsert,
  type SyncRecord,
  type UpsertOutcome,
} from "@erpsync/core";

export const DEFAULT_COLLECTION = "issues";

/**
 * Stored shape of a record.
 */
export interface IssueDocument {
  _id: ObjectId;
  name: string | null;
  subject: string;
  raised_by: string | null;
  status: string;
  created_at: Date;
  synced: boolean;
  synced_at: Date | null;
}

/**
 * Connection settings for MongoRecordStore.connect.
 */
export interface MongoRecordStoreOptions {
  url: string;
  database: string;
  collection?: string;
  /** Server selection timeout in ms (default: 10000). */
  timeoutMs?: number;
  logger?: Logger;
  now?: () => Date;
}

export class MongoRecordStore implements RecordStore {
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly client: MongoClient,
    private readonly db: Db,
    private readonly collection: Collection<IssueDocument>,
    options: { logger?: Logger; now?: () => Date } = {}
  ) {
    this.logger = options.logger ?? createLogger("mongo");
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Connect, verify with a ping, and return a ready store.
   */
  static async connect(options: MongoRecordStoreOptions): Promise<MongoRecordStore> {
    const client = new MongoClient(options.url, {
      serverSelectionTimeoutMS: options.timeoutMs ?? 10000,
    });
    await client.connect();
    const db = client.db(options.database);
    try {
      await db.command({ ping: 1 });
    } catch (error) {
      await client.close();
      throw error;
    }
    const collection = db.collection<IssueDocument>(options.collection ?? DEFAULT_COLLECTION);
    const store = new MongoRecordStore(client, db, collection, options);
    store.logger.info(
      { database: options.database, collection: collection.collectionName },
      "MongoDB connected"
    );
    return store;
  }

  /**
   * Indexes for the pending-queue scan and keyed upserts.
   */
  async ensureIndexes(): Promise<void> {
    await this.collection.createIndex({ created_at: 1 });
    await this.collection.createIndex({ synced: 1 });
    await this.collection.createIndex({ name: 1 }, { sparse: true });
  }

  async insert(draft: RecordDraft): Promise<SyncRecord> {
    const doc: IssueDocument = {
      _id: new ObjectId(),
      name: draft.remoteId,
      subject: draft.subject,
      raised_by: draft.originator,
      status: draft.status,
      created_at: draft.createdAt,
      synced: draft.synced,
      synced_at: draft.syncedAt,
    };
    await this.collection.insertOne(doc);
    return toRecord(doc);
  }

  async get(localId: LocalID): Promise<SyncRecord | null> {
    const _id = parseLocalId(localId);
    if (!_id) {
      return null;
    }
    const doc = await this.collection.findOne({ _id });
    return doc ? toRecord(doc) : null;
  }

  async find(query: RecordQuery): Promise<SyncRecord[]> {
    const docs = await this.collection.find(toFilter(query)).sort({ created_at: 1 }).toArray();
    return docs.map(toRecord);
  }

  async update(localId: LocalID, patch: RecordPatch): Promise<SyncRecord | null> {
    const _id = parseLocalId(localId);
    if (!_id) {
      return null;
    }
    const set = toDocumentPatch(patch);
    if (Object.keys(set).length === 0) {
      return this.get(localId);
    }
    const doc = await this.collection.findOneAndUpdate(
      { _id },
      { $set: set },
      { returnDocument: "after" }
    );
    return doc ? toRecord(doc) : null;
  }

  async confirmPush(
    localId: LocalID,
    pushed: RecordFields,
    confirmation: PushConfirmation
  ): Promise<SyncRecord | null> {
    const _id = parseLocalId(localId);
    if (!_id) {
      return null;
    }
    const confirmed = await this.collection.findOneAndUpdate(
      { _id, subject: pushed.subject, raised_by: pushed.originator, status: pushed.status },
      { $set: { name: confirmation.remoteId, synced: true, synced_at: confirmation.syncedAt } },
      { returnDocument: "after" }
    );
    if (confirmed) {
      return toRecord(confirmed);
    }
    // Edited while the push was in flight: keep it pending under its new remote id.
    const pending = await this.collection.findOneAndUpdate(
      { _id },
      { $set: { name: confirmation.remoteId } },
      { returnDocument: "after" }
    );
    return pending ? toRecord(pending) : null;
  }

  async upsertByRemoteId(remoteId: RemoteID, values: RemoteUpsert): Promise<UpsertOutcome> {
    const result = await this.collection.updateOne(
      { name: remoteId },
      {
        $set: {
          subject: values.subject,
          raised_by: values.originator,
          status: values.status,
          synced: true,
          synced_at: values.syncedAt,
        },
        $setOnInsert: { created_at: this.now() },
      },
      { upsert: true }
    );
    if (result.upsertedCount > 0) {
      return "inserted";
    }
    return result.modifiedCount > 0 ? "updated" : "unchanged";
  }

  async delete(localId: LocalID): Promise<boolean> {
    const _id = parseLocalId(localId);
    if (!_id) {
      return false;
    }
    const result = await this.collection.deleteOne({ _id });
    return result.deletedCount > 0;
  }

  async deleteAll(): Promise<number> {
    const result = await this.collection.deleteMany({});
    return result.deletedCount;
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.command({ ping: 1 });
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "MongoDB ping failed");
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.close();
    this.logger.info("MongoDB connection closed");
  }
}

/**
 * Parse a local identifier; null when it is not a valid ObjectId.
 */
export function parseLocalId(localId: LocalID): ObjectId | null {
  return /^[0-9a-fA-F]{24}$/.test(localId) ? new ObjectId(localId) : null;
}

export function toRecord(doc: IssueDocument): SyncRecord {
  return {
    localId: doc._id.toHexString(),
    remoteId: doc.name ?? null,
    subject: doc.subject,
    originator: doc.raised_by ?? null,
    status: doc.status,
    createdAt: doc.created_at,
    synced: doc.synced,
    syncedAt: doc.synced_at ?? null,
  };
}

export function toFilter(query: RecordQuery): Filter<IssueDocument> {
  const filter: Filter<IssueDocument> = {};
  if (query.synced !== undefined) {
    filter.synced = query.synced;
  }
  if (query.remoteId !== undefined) {
    filter.name = query.remoteId;
  }
  return filter;
}

/**
 * Translate a record patch into a `$set` document; undefined keys are left out.
 */
export function toDocumentPatch(patch: RecordPatch): Partial<Omit<IssueDocument, "_id">> {
  const set: Partial<Omit<IssueDocument, "_id">> = {};
  if (patch.remoteId !== undefined) set.name = patch.remoteId;
  if (patch.subject !== undefined) set.subject = patch.subject;
  if (patch.originator !== undefined) set.raised_by = patch.originator;
  if (patch.status !== undefined) set.status = patch.status;
  if (patch.synced !== undefined) set.synced = patch.synced;
  if (patch.syncedAt !== undefined) set.synced_at = patch.syncedAt;
  return set;
}
