/**
 * Core type definitions and contracts for erpsync.
 * These interfaces define the protocol that record stores and remote endpoints must implement.
 */

/**
 * Identifier assigned by the local store.
 */
export type LocalID = string;

/**
 * Identifier assigned by the remote endpoint (e.g. "KM-00042").
 */
export type RemoteID = string;

/**
 * Fields the caller controls and that are mirrored to the remote endpoint.
 */
export interface RecordFields {
  subject: string;
  originator: string | null;
  status: string;
}

/**
 * Names of the fields whose presence in an edit invalidates the sync state.
 */
export const SYNC_RELEVANT_FIELDS = ["subject", "originator", "status"] as const;

export type SyncRelevantField = (typeof SYNC_RELEVANT_FIELDS)[number];

/**
 * The unit of synchronization (locally called an "issue").
 */
export interface SyncRecord extends RecordFields {
  localId: LocalID;
  /** Absent until the first successful push. */
  remoteId: RemoteID | null;
  createdAt: Date;
  /** True only when the local values match the remote's last-confirmed state. */
  synced: boolean;
  /** Null while `synced` is false. */
  syncedAt: Date | null;
}

/**
 * What a caller submits to create a record. `status` defaults to "Open".
 */
export interface NewRecordInput {
  subject: string;
  originator?: string | null;
  status?: string;
}

/**
 * A partial edit submitted by a caller.
 */
export type RecordEdit = Partial<RecordFields>;

/**
 * A record as the store receives it on insert; the store assigns `localId`.
 */
export type RecordDraft = Omit<SyncRecord, "localId">;

/**
 * A targeted update applied by the store to one record.
 */
export type RecordPatch = Partial<Omit<SyncRecord, "localId" | "createdAt">>;

/**
 * Filter accepted by `RecordStore.find`. Omitted keys match everything.
 */
export interface RecordQuery {
  synced?: boolean;
  remoteId?: RemoteID;
}

/**
 * Named filters exposed by the lifecycle API.
 */
export type RecordFilter = "all" | "unsynced" | "synced";

/**
 * Outcome of an upsert keyed by remote identifier.
 */
export type UpsertOutcome = "inserted" | "updated" | "unchanged";

/**
 * Confirmation of a successful push, applied by `RecordStore.confirmPush`.
 */
export interface PushConfirmation {
  remoteId: RemoteID;
  syncedAt: Date;
}

/**
 * Values written by an inbound upsert.
 */
export interface RemoteUpsert extends RecordFields {
  syncedAt: Date;
}

/**
 * Record store interface over the local document collection.
 * Implementations can use MongoDB, memory, or any other persistence layer.
 */
export interface RecordStore {
  /**
   * Persist a new record and return it with its assigned `localId`.
   * Must be durable when the promise resolves.
   */
  insert(draft: RecordDraft): Promise<SyncRecord>;

  /**
   * Load a record by local identifier.
   * @returns The record, or null if no such record exists
   */
  get(localId: LocalID): Promise<SyncRecord | null>;

  /**
   * Find all records matching the query. Never truncates.
   */
  find(query: RecordQuery): Promise<SyncRecord[]>;

  /**
   * Apply a targeted update to one record.
   * @returns The record after the update, or null if it does not exist
   */
  update(localId: LocalID, patch: RecordPatch): Promise<SyncRecord | null>;

  /**
   * Record a successful push in one atomic step. `remoteId` is always written;
   * `synced`/`syncedAt` are set only if the record still holds the `pushed`
   * values, so an edit that landed during the push keeps the record pending.
   * @returns The record after the update, or null if it does not exist
   */
  confirmPush(
    localId: LocalID,
    pushed: RecordFields,
    confirmation: PushConfirmation
  ): Promise<SyncRecord | null>;

  /**
   * Insert or update the record joined to `remoteId`.
   * `createdAt` is set only when a record is inserted.
   */
  upsertByRemoteId(remoteId: RemoteID, values: RemoteUpsert): Promise<UpsertOutcome>;

  /**
   * Delete one record.
   * @returns true if a record was deleted
   */
  delete(localId: LocalID): Promise<boolean>;

  /**
   * Delete every record.
   * @returns The number of deleted records
   */
  deleteAll(): Promise<number>;

  /**
   * Check that the store is reachable.
   */
  ping(): Promise<boolean>;

  /**
   * Release the underlying connection.
   */
  close(): Promise<void>;
}

/**
 * A record as the remote endpoint reports it.
 */
export interface RemoteRecord {
  remoteId: RemoteID;
  subject?: string;
  originator?: string | null;
  status?: string;
}

/**
 * Fields echoed back by the remote endpoint after a create or update.
 */
export type ConfirmedFields = Partial<RecordFields>;

/**
 * Result of a remote create. `remoteId` is null when the response omitted it.
 */
export interface CreateResult {
  remoteId: RemoteID | null;
  confirmed: ConfirmedFields;
}

/**
 * Remote endpoint interface for the work-item-tracking service.
 * Failures are reported with the error classes from `errors.ts`.
 */
export interface RemoteEndpoint {
  /**
   * Create a record remotely.
   * @throws ConfigurationError, RemoteUnreachable, RemoteRejected, MalformedRemoteResponse
   */
  create(fields: RecordFields): Promise<CreateResult>;

  /**
   * Update the record identified by `remoteId`.
   * @throws ConfigurationError, RemoteUnreachable, RemoteRejected, MalformedRemoteResponse
   */
  update(remoteId: RemoteID, fields: RecordFields): Promise<ConfirmedFields>;

  /**
   * Delete the record identified by `remoteId`. Advisory: never throws.
   * @returns true if the remote confirmed the deletion
   */
  delete(remoteId: RemoteID): Promise<boolean>;

  /**
   * Fetch one page of remote records. An empty page signals end of data.
   * @throws ConfigurationError, RemoteUnreachable, RemoteRejected, MalformedRemoteResponse
   */
  listPage(offset: number, pageSize: number): Promise<RemoteRecord[]>;

  /**
   * Connectivity check. Never throws.
   */
  ping(): Promise<boolean>;
}
