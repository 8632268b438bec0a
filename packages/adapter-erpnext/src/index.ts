/**
 * @erpsync/adapter-erpnext - RemoteEndpoint for the ERPNext resource API
 */

export {
  ErpNextAdapter,
  DEFAULT_TIMEOUT_MS,
  LIST_FIELDS,
  type ErpNextAdapterOptions,
  type FetchLike,
} from "./erpnext-adapter.js";
