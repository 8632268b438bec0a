/**
 * @erpsync/recordstore-in-memory - In-memory RecordStore for tests and dry runs
 */

export { InMemoryRecordStore, type InMemoryRecordStoreOptions } from "./in-memory-record-store.js";
