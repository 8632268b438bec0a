/**
 * InboundSyncEngine - pages through the remote record set and upserts it locally.
 */

import type { Logger } from "pino";
import type { RecordStore, RemoteEndpoint, RemoteRecord } from "./types.js";
import { ConfigurationError, RemoteRejected, describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { generateRunId } from "./ids.js";
import { DEFAULT_STATUS } from "./fields.js";

export const DEFAULT_BATCH_SIZE = 500;
export const DEFAULT_MAX_RECORDS = 35000;

/**
 * Configuration for the inbound engine.
 */
export interface InboundConfig {
  store: RecordStore;
  remote: RemoteEndpoint;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Options for a single inbound pass.
 */
export interface InboundOptions {
  batchSize?: number;
  maxRecords?: number;
}

/**
 * The range at which a pass stopped.
 */
export interface FailedRange {
  offset: number;
  pageSize: number;
  /** Set when the remote answered with an error status. */
  statusCode?: number;
  error: string;
}

/**
 * Report of one inbound pass. Partial progress is kept on failure.
 */
export interface InboundReport {
  runId: string;
  insertedCount: number;
  updatedCount: number;
  /** Remote records the store already matched exactly. */
  unchangedCount: number;
  /** Remote records dropped for lacking an identifier. */
  skippedCount: number;
  pagesFetched: number;
  failedRanges: FailedRange[];
}

export class InboundSyncEngine {
  private readonly store: RecordStore;
  private readonly remote: RemoteEndpoint;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(config: InboundConfig) {
    this.store = config.store;
    this.remote = config.remote;
    this.logger = config.logger ?? createLogger("inbound");
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Fetch pages starting at offset 0 until an empty page, `maxRecords`, or a failure.
   * @throws ConfigurationError for non-positive sizes or an unconfigured remote
   */
  async run(options: InboundOptions = {}): Promise<InboundReport> {
    const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    const maxRecords = options.maxRecords ?? DEFAULT_MAX_RECORDS;
    assertPositiveInteger("batchSize", batchSize);
    assertPositiveInteger("maxRecords", maxRecords);

    const report: InboundReport = {
      runId: generateRunId("in"),
      insertedCount: 0,
      updatedCount: 0,
      unchangedCount: 0,
      skippedCount: 0,
      pagesFetched: 0,
      failedRanges: [],
    };
    this.logger.info({ runId: report.runId, batchSize, maxRecords }, "Inbound pass started");

    for (let offset = 0; offset < maxRecords; offset += batchSize) {
      const pageSize = Math.min(batchSize, maxRecords - offset);

      let page: RemoteRecord[];
      try {
        page = await this.remote.listPage(offset, pageSize);
      } catch (error) {
        if (error instanceof ConfigurationError) {
          throw error;
        }
        this.fail(report, offset, pageSize, error);
        break;
      }
      report.pagesFetched++;

      if (page.length === 0) {
        this.logger.info({ runId: report.runId, offset }, "No more remote records");
        break;
      }

      try {
        await this.applyPage(page, report);
      } catch (error) {
        this.fail(report, offset, pageSize, error);
        break;
      }
    }

    this.logger.info(
      {
        runId: report.runId,
        inserted: report.insertedCount,
        updated: report.updatedCount,
        unchanged: report.unchangedCount,
        skipped: report.skippedCount,
        failedRanges: report.failedRanges.length,
      },
      "Inbound pass completed"
    );
    return report;
  }

  private async applyPage(page: RemoteRecord[], report: InboundReport): Promise<void> {
    for (const remoteRecord of page) {
      if (!remoteRecord.remoteId) {
        report.skippedCount++;
        this.logger.warn({ runId: report.runId }, "Remote record without identifier skipped");
        continue;
      }

      const outcome = await this.store.upsertByRemoteId(remoteRecord.remoteId, {
        subject: remoteRecord.subject ?? "",
        originator: remoteRecord.originator ?? null,
        status: remoteRecord.status || DEFAULT_STATUS,
        syncedAt: this.now(),
      });

      switch (outcome) {
        case "inserted":
          report.insertedCount++;
          break;
        case "updated":
          report.updatedCount++;
          break;
        case "unchanged":
          report.unchangedCount++;
          break;
      }
      this.logger.debug(
        { runId: report.runId, remoteId: remoteRecord.remoteId, outcome },
        "Remote record merged"
      );
    }
  }

  private fail(report: InboundReport, offset: number, pageSize: number, error: unknown): void {
    const range: FailedRange = { offset, pageSize, error: describeError(error) };
    if (error instanceof RemoteRejected) {
      range.statusCode = error.statusCode;
    }
    report.failedRanges.push(range);
    this.logger.error({ runId: report.runId, ...range }, "Inbound pass stopped");
  }
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
  }
}
