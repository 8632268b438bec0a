/**
 * @erpsync/cli - configuration loading, context wiring and the erpsync command
 */

export { createProgram, type CliIO } from "./cli.js";
export {
  createContext,
  createContextFromFile,
  withContext,
  type AppContext,
  type ContextOverrides,
} from "./runner.js";
export {
  loadConfigFile,
  parseConfigText,
  expandEnvVar,
  expandEnvironmentVariables,
  validateConfig,
  toAppConfig,
} from "./parser.js";
export { loadRecordStore, loadRemoteEndpoint } from "./loaders.js";
export type { AppConfig, ConfigFile, StoreConfig, RemoteConfig } from "./config.js";
