/**
 * @erpsync/core - Sync engines and record lifecycle for erpsync
 *
 * This package provides:
 * - Type definitions and contracts (SyncRecord, RecordStore, RemoteEndpoint)
 * - The error taxonomy shared by stores and adapters
 * - OutboundSyncEngine and InboundSyncEngine
 * - RecordLifecycle, the caller-facing operation set
 * - SyncScheduler for timed outbound passes
 *
 * Core never imports stores or adapters; the CLI wires everything together at runtime.
 */

export type {
  LocalID,
  RemoteID,
  RecordFields,
  SyncRelevantField,
  SyncRecord,
  NewRecordInput,
  RecordEdit,
  RecordDraft,
  RecordPatch,
  RecordQuery,
  RecordFilter,
  UpsertOutcome,
  RemoteUpsert,
  PushConfirmation,
  RecordStore,
  RemoteRecord,
  ConfirmedFields,
  CreateResult,
  RemoteEndpoint,
} from "./types.js";
export { SYNC_RELEVANT_FIELDS } from "./types.js";

export {
  SyncError,
  ConfigurationError,
  RemoteUnreachable,
  RemoteRejected,
  NotFound,
  MalformedRemoteResponse,
  describeError,
  type SyncErrorCode,
} from "./errors.js";

export { createLogger, silentLogger, type Logger } from "./logger.js";
export { DEFAULT_STATUS, capitalizeStatus, toRecordFields, touchesSyncedFields } from "./fields.js";

export {
  OutboundSyncEngine,
  pushRecord,
  type OutboundConfig,
  type OutboundPassSummary,
  type FailedPush,
  type PushResult,
} from "./outbound.js";

export {
  InboundSyncEngine,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_RECORDS,
  type InboundConfig,
  type InboundOptions,
  type InboundReport,
  type FailedRange,
} from "./inbound.js";

export { RecordLifecycle, type LifecycleConfig, type DeleteResult } from "./lifecycle.js";

export {
  SyncScheduler,
  intervalExpression,
  DEFAULT_INTERVAL_MINUTES,
  type SchedulerConfig,
  type TaskFactory,
  type TimerTask,
} from "./scheduler.js";
