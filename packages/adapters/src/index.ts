/**
 * @erpsync/adapter-in-memory - In-process RemoteEndpoint for tests and dry runs
 */

export {
  InMemoryRemoteEndpoint,
  type InMemoryRemoteOptions,
  type RejectRule,
  type RemoteCall,
} from "./in-memory-remote.js";
