/**
 * Driver selection for the record store and the remote endpoint.
 */

import type { Logger, RecordStore, RemoteEndpoint } from "@erpsync/core";
import { MongoRecordStore } from "@erpsync/recordstore-mongo";
import { InMemoryRecordStore } from "@erpsync/recordstore-in-memory";
import { ErpNextAdapter } from "@erpsync/adapter-erpnext";
import { InMemoryRemoteEndpoint } from "@erpsync/adapter-in-memory";
import type { RemoteConfig, StoreConfig } from "./config.js";

/**
 * Open the configured record store. The Mongo driver connects, pings and
 * ensures its indexes before returning.
 */
export async function loadRecordStore(config: StoreConfig, logger?: Logger): Promise<RecordStore> {
  switch (config.driver) {
    case "mongo": {
      const store = await MongoRecordStore.connect({
        url: config.url,
        database: config.database,
        collection: config.collection,
        timeoutMs: config.timeout_ms,
        logger,
      });
      await store.ensureIndexes();
      return store;
    }
    case "in-memory":
      return new InMemoryRecordStore();
  }
}

/**
 * Build the configured remote endpoint. ERP credentials may be absent here;
 * the adapter reports them when a request is made.
 */
export function loadRemoteEndpoint(config: RemoteConfig, logger?: Logger): RemoteEndpoint {
  switch (config.driver) {
    case "erpnext":
      return new ErpNextAdapter({
        apiUrl: config.url,
        sid: config.sid,
        timeoutMs: config.timeout_ms,
        logger,
      });
    case "in-memory":
      return new InMemoryRemoteEndpoint({ firstSequence: config.first_sequence });
  }
}
