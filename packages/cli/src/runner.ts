/**
 * Wire everything together: open the store, build the remote endpoint,
 * and create the lifecycle and scheduler that share one outbound engine.
 */

import {
  OutboundSyncEngine,
  RecordLifecycle,
  SyncScheduler,
  createLogger,
  type Logger,
  type RecordStore,
  type RemoteEndpoint,
  type TaskFactory,
} from "@erpsync/core";
import type { AppConfig } from "./config.js";
import { loadConfigFile } from "./parser.js";
import { loadRecordStore, loadRemoteEndpoint } from "./loaders.js";

/**
 * Everything a command needs, built once at startup.
 */
export interface AppContext {
  config: AppConfig;
  store: RecordStore;
  remote: RemoteEndpoint;
  lifecycle: RecordLifecycle;
  scheduler: SyncScheduler;
  logger: Logger;
  /**
   * Stop the scheduler, wait for any pass in progress, and close the store.
   */
  close(): Promise<void>;
}

/**
 * Replacements for the configured pieces, mainly for tests.
 */
export interface ContextOverrides {
  store?: RecordStore;
  remote?: RemoteEndpoint;
  logger?: Logger;
  createTask?: TaskFactory;
}

/**
 * Build an application context from a validated configuration.
 */
export async function createContext(
  config: AppConfig,
  overrides: ContextOverrides = {}
): Promise<AppContext> {
  const logger = overrides.logger ?? createLogger("app");
  const remote = overrides.remote ?? loadRemoteEndpoint(config.remote, overrides.logger);
  const store = overrides.store ?? (await loadRecordStore(config.store, overrides.logger));

  const outbound = new OutboundSyncEngine({ store, remote, logger: overrides.logger });
  const lifecycle = new RecordLifecycle({ store, remote, outbound, logger: overrides.logger });
  const scheduler = new SyncScheduler({
    engine: outbound,
    intervalMinutes: config.outbound.intervalMinutes,
    runOnStart: config.outbound.runOnStart,
    logger: overrides.logger,
    createTask: overrides.createTask,
  });

  let closed = false;
  return {
    config,
    store,
    remote,
    lifecycle,
    scheduler,
    logger,
    async close() {
      if (closed) {
        return;
      }
      closed = true;
      await scheduler.stop();
      await store.close();
      logger.info("Context closed");
    },
  };
}

/**
 * Load a configuration file and build its context.
 */
export async function createContextFromFile(
  configPath: string,
  overrides: ContextOverrides = {}
): Promise<AppContext> {
  const config = await loadConfigFile(configPath);
  return createContext(config, overrides);
}

/**
 * Run `action` with a fresh context and always close it afterwards.
 */
export async function withContext<T>(
  configPath: string,
  action: (context: AppContext) => Promise<T>,
  overrides: ContextOverrides = {}
): Promise<T> {
  const context = await createContextFromFile(configPath, overrides);
  try {
    return await action(context);
  } finally {
    await context.close();
  }
}
