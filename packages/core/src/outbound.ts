/**
 * OutboundSyncEngine - pushes locally pending records to the remote endpoint.
 * Each record succeeds or fails on its own; passes never overlap.
 */

import { Mutex } from "async-mutex";
import type { Logger } from "pino";
import type { LocalID, RecordStore, RemoteEndpoint, SyncRecord, RemoteID } from "./types.js";
import {
  ConfigurationError,
  MalformedRemoteResponse,
  SyncError,
  describeError,
} from "./errors.js";
import { createLogger } from "./logger.js";
import { generateRunId } from "./ids.js";

/**
 * Configuration for the outbound engine.
 */
export interface OutboundConfig {
  store: RecordStore;
  remote: RemoteEndpoint;
  logger?: Logger;
  /** Clock used to stamp `syncedAt`. */
  now?: () => Date;
}

/**
 * A record the pass could not push.
 */
export interface FailedPush {
  localId: string;
  operation: "create" | "update";
  /** Error code for errors raised on purpose, "unexpected" otherwise. */
  kind: string;
  error: string;
}

/**
 * Summary of one outbound pass.
 */
export interface OutboundPassSummary {
  runId: string;
  startedAt: Date;
  endedAt: Date;
  pending: number;
  synced: number;
  failures: FailedPush[];
}

/**
 * Result of pushing one record.
 */
export interface PushResult {
  remoteId: RemoteID;
  operation: "create" | "update";
}

/**
 * Push one record's current fields: update when it has a remote identifier,
 * create otherwise. Does not touch the local store.
 * @throws MalformedRemoteResponse when a create comes back without an identifier
 */
export async function pushRecord(
  remote: RemoteEndpoint,
  record: SyncRecord
): Promise<PushResult> {
  const fields = {
    subject: record.subject,
    originator: record.originator,
    status: record.status,
  };

  if (record.remoteId) {
    await remote.update(record.remoteId, fields);
    return { remoteId: record.remoteId, operation: "update" };
  }

  const created = await remote.create(fields);
  if (!created.remoteId) {
    throw new MalformedRemoteResponse(
      `Remote create for record ${record.localId} returned no identifier`
    );
  }
  return { remoteId: created.remoteId, operation: "create" };
}

export class OutboundSyncEngine {
  private readonly store: RecordStore;
  private readonly remote: RemoteEndpoint;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly mutex = new Mutex();

  constructor(config: OutboundConfig) {
    this.store = config.store;
    this.remote = config.remote;
    this.logger = config.logger ?? createLogger("outbound");
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Whether a pass is currently executing.
   */
  get running(): boolean {
    return this.mutex.isLocked();
  }

  /**
   * Run one pass. Concurrent callers queue behind the pass in progress.
   * @throws ConfigurationError when the remote endpoint is not configured
   */
  async run(): Promise<OutboundPassSummary> {
    return this.mutex.runExclusive(() => this.pass());
  }

  /**
   * Push one record now, serialized with passes. The record is re-read under
   * the lock; one a pass has already confirmed is returned without a push.
   * @returns The record after the push, or null if it no longer exists
   */
  async pushOne(localId: LocalID): Promise<SyncRecord | null> {
    return this.mutex.runExclusive(async () => {
      const current = await this.store.get(localId);
      if (!current || current.synced) {
        return current;
      }
      return this.pushAndConfirm(current);
    });
  }

  /**
   * Resolve once no pass is executing.
   */
  async waitForIdle(): Promise<void> {
    await this.mutex.waitForUnlock();
  }

  private async pass(): Promise<OutboundPassSummary> {
    const runId = generateRunId("out");
    const startedAt = this.now();
    const failures: FailedPush[] = [];
    let synced = 0;

    const pending = await this.store.find({ synced: false });
    this.logger.info({ runId, pending: pending.length }, "Outbound pass started");

    for (const record of pending) {
      const operation = record.remoteId ? "update" : "create";
      try {
        const confirmed = await this.pushAndConfirm(record);
        if (confirmed?.synced) {
          synced++;
          this.logger.info(
            { runId, localId: record.localId, remoteId: confirmed.remoteId, operation },
            "Record synced"
          );
        } else {
          this.logger.info(
            { runId, localId: record.localId, operation, deleted: confirmed === null },
            "Record changed during push; not confirmed"
          );
        }
      } catch (error) {
        // Same failure for every record; retrying the rest is pointless.
        if (error instanceof ConfigurationError) {
          this.logger.error({ runId, err: error }, "Outbound pass aborted");
          throw error;
        }
        const kind = error instanceof SyncError ? error.code : "unexpected";
        failures.push({
          localId: record.localId,
          operation,
          kind,
          error: describeError(error),
        });
        this.logger.warn(
          { runId, localId: record.localId, operation, kind, error: describeError(error) },
          "Record left pending"
        );
      }
    }

    const endedAt = this.now();
    this.logger.info(
      {
        runId,
        pending: pending.length,
        synced,
        failed: failures.length,
        durationMs: endedAt.getTime() - startedAt.getTime(),
      },
      "Outbound pass completed"
    );

    return { runId, startedAt, endedAt, pending: pending.length, synced, failures };
  }

  private async pushAndConfirm(record: SyncRecord): Promise<SyncRecord | null> {
    const { remoteId } = await pushRecord(this.remote, record);
    return this.store.confirmPush(
      record.localId,
      { subject: record.subject, originator: record.originator, status: record.status },
      { remoteId, syncedAt: this.now() }
    );
  }
}
