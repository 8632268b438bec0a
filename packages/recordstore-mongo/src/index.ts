/**
 * @erpsync/recordstore-mongo - RecordStore over MongoDB
 */

export {
  MongoRecordStore,
  DEFAULT_COLLECTION,
  parseLocalId,
  toRecord,
  toFilter,
  toDocumentPatch,
  type IssueDocument,
  type MongoRecordStoreOptions,
} from "./mongo-record-store.js";
