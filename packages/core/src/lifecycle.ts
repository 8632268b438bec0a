/**
 * RecordLifecycle - the operation set exposed to callers.
 *
 * Every write lands in the local store before the remote endpoint is contacted,
 * so a caller never loses a record because the remote is down. Remote problems
 * are deferred to the next outbound pass and surface only as `synced: false`
 * and in the logs. The only errors a caller sees are NotFound and
 * ConfigurationError (and a failing local store).
 */

import type { Logger } from "pino";
import type {
  LocalID,
  NewRecordInput,
  RecordEdit,
  RecordFilter,
  RecordPatch,
  RecordQuery,
  RecordStore,
  RemoteEndpoint,
  RemoteID,
  SyncRecord,
} from "./types.js";
import { ConfigurationError, NotFound, describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { pickEdit, toRecordFields, touchesSyncedFields } from "./fields.js";
import { OutboundSyncEngine } from "./outbound.js";
import { InboundSyncEngine, type InboundOptions, type InboundReport } from "./inbound.js";

export interface LifecycleConfig {
  store: RecordStore;
  remote: RemoteEndpoint;
  /** Shared with the scheduler so manual and timed passes serialize. */
  outbound?: OutboundSyncEngine;
  inbound?: InboundSyncEngine;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Confirmation returned by `delete`.
 */
export interface DeleteResult {
  localId: LocalID;
  remoteId: RemoteID | null;
  /** Whether the remote counterpart was confirmed deleted (advisory). */
  remoteDeleted: boolean;
}

const FILTERS: { [K in RecordFilter]: RecordQuery } = {
  all: {},
  unsynced: { synced: false },
  synced: { synced: true },
};

export class RecordLifecycle {
  readonly outbound: OutboundSyncEngine;
  readonly inbound: InboundSyncEngine;
  private readonly store: RecordStore;
  private readonly remote: RemoteEndpoint;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: LifecycleConfig) {
    this.store = config.store;
    this.remote = config.remote;
    this.logger = config.logger ?? createLogger("lifecycle");
    this.now = config.now ?? (() => new Date());
    this.outbound =
      config.outbound ??
      new OutboundSyncEngine({ store: this.store, remote: this.remote, logger: config.logger, now: this.now });
    this.inbound =
      config.inbound ??
      new InboundSyncEngine({ store: this.store, remote: this.remote, logger: config.logger, now: this.now });
  }

  /**
   * Store a new record, then try one immediate push.
   * @returns The synced record, or the pending one if the push failed
   */
  async submit(input: NewRecordInput): Promise<SyncRecord> {
    const record = await this.createLocal(input);

    try {
      const pushed = await this.outbound.pushOne(record.localId);
      this.logger.info(
        { localId: record.localId, remoteId: pushed?.remoteId, synced: pushed?.synced },
        "Record pushed on submit"
      );
      return pushed ?? record;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      this.logger.warn(
        { localId: record.localId, error: describeError(error) },
        "Push on submit failed; record left for the next outbound pass"
      );
      return record;
    }
  }

  /**
   * Store a new pending record without contacting the remote endpoint.
   */
  async createLocal(input: NewRecordInput): Promise<SyncRecord> {
    const record = await this.store.insert({
      ...toRecordFields(input),
      remoteId: null,
      createdAt: this.now(),
      synced: false,
      syncedAt: null,
    });
    this.logger.info({ localId: record.localId }, "Record stored locally");
    return record;
  }

  async get(localId: LocalID): Promise<SyncRecord> {
    const record = await this.store.get(localId);
    if (!record) {
      throw new NotFound(localId);
    }
    return record;
  }

  async list(filter: RecordFilter = "all"): Promise<SyncRecord[]> {
    return this.store.find(FILTERS[filter]);
  }

  /**
   * Apply an edit locally, then try to mirror it when the record is known remotely.
   * Any sync-relevant field in the edit marks the record pending, even when the
   * value is unchanged.
   * @returns The locally persisted state after the edit
   */
  async update(localId: LocalID, edit: RecordEdit): Promise<SyncRecord> {
    await this.get(localId);

    const patch: RecordPatch = pickEdit(edit);
    if (touchesSyncedFields(edit)) {
      patch.synced = false;
      patch.syncedAt = null;
    }

    const updated = await this.store.update(localId, patch);
    if (!updated) {
      throw new NotFound(localId);
    }
    if (!updated.remoteId || updated.synced) {
      return updated;
    }

    try {
      const pushed = await this.outbound.pushOne(localId);
      this.logger.info({ localId, remoteId: updated.remoteId, synced: pushed?.synced }, "Edit pushed");
      return pushed ?? updated;
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      this.logger.warn(
        { localId, remoteId: updated.remoteId, error: describeError(error) },
        "Push on update failed; record left for the next outbound pass"
      );
      return updated;
    }
  }

  /**
   * Delete locally; delete remotely on a best-effort basis first.
   */
  async delete(localId: LocalID): Promise<DeleteResult> {
    const record = await this.get(localId);

    let remoteDeleted = false;
    if (record.remoteId) {
      remoteDeleted = await this.remote.delete(record.remoteId);
      if (!remoteDeleted) {
        this.logger.warn(
          { localId, remoteId: record.remoteId },
          "Remote delete failed; deleting locally anyway"
        );
      }
    }

    const deleted = await this.store.delete(localId);
    if (!deleted) {
      throw new NotFound(localId);
    }
    this.logger.info({ localId, remoteId: record.remoteId, remoteDeleted }, "Record deleted");
    return { localId, remoteId: record.remoteId, remoteDeleted };
  }

  /**
   * Delete every local record. The remote endpoint is not touched.
   */
  async purgeLocal(): Promise<number> {
    const count = await this.store.deleteAll();
    this.logger.warn({ count }, "Local records purged");
    return count;
  }

  /**
   * Run an outbound pass through the serialized entry point.
   * @returns The number of records synced
   */
  async runOutboundPass(): Promise<number> {
    const summary = await this.outbound.run();
    return summary.synced;
  }

  async runInboundPass(options?: InboundOptions): Promise<InboundReport> {
    return this.inbound.run(options);
  }
}
