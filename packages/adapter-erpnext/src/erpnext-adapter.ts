/**
 * ErpNextAdapter - An ERPNext implementation of RemoteEndpoint.
 * Talks to a resource endpoint such as `https://erp.example.com/api/resource/Issue`
 * with session-cookie authentication.
 */

import { z } from "zod";
import {
  ConfigurationError,
  MalformedRemoteResponse,
  RemoteRejected,
  RemoteUnreachable,
  capitalizeStatus,
  createLogger,
  describeError,
  type ConfirmedFields,
  type CreateResult,
  type Logger,
  type RecordFields,
  type RemoteEndpoint,
  type RemoteID,
  type RemoteRecord,
} from "@erpsync/core";

export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Fields requested from list endpoints.
 */
export const LIST_FIELDS = ["name", "subject", "raised_by", "status"] as const;

/**
 * Minimal fetch signature the adapter depends on.
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

/**
 * Configuration options for ErpNextAdapter.
 */
export interface ErpNextAdapterOptions {
  /**
   * Resource URL, e.g. "https://erp.example.com/api/resource/Issue".
   */
  apiUrl?: string;
  /**
   * Session id sent as the `sid` cookie.
   */
  sid?: string;
  /**
   * Per-request timeout in ms (default: 30000). Must be positive.
   */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * An ERPNext document as returned in `data`.
 */
const remoteDocSchema = z
  .object({
    name: z.string().min(1).optional(),
    subject: z.string().nullish(),
    raised_by: z.string().nullish(),
    status: z.string().nullish(),
  })
  .passthrough();

type RemoteDoc = z.infer<typeof remoteDocSchema>;

const envelopeSchema = z.object({ data: z.unknown() }).refine((body) => "data" in body);

/**
 * Body sent under `data` on create and update.
 */
interface ErpPayload {
  subject: string;
  raised_by: string | null;
  status: string;
}

type Method = "GET" | "POST" | "PUT" | "DELETE";

export class ErpNextAdapter implements RemoteEndpoint {
  private readonly apiUrl: string | null;
  private readonly sid: string | null;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(options: ErpNextAdapterOptions = {}) {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(`ErpNextAdapter requires a positive timeoutMs, got ${timeoutMs}`);
    }

    this.apiUrl = options.apiUrl ? options.apiUrl.replace(/\/+$/, "") : null;
    this.sid = options.sid || null;
    this.timeoutMs = timeoutMs;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = options.logger ?? createLogger("erpnext");
  }

  async create(fields: RecordFields): Promise<CreateResult> {
    const body = await this.request("POST", "", { data: toPayload(fields) });
    const doc = parseDoc(unwrap(body), "create");
    this.logger.info({ remoteId: doc.name ?? null }, "ERP create accepted");
    return { remoteId: doc.name ?? null, confirmed: toConfirmed(doc) };
  }

  async update(remoteId: RemoteID, fields: RecordFields): Promise<ConfirmedFields> {
    const body = await this.request("PUT", `/${encodeURIComponent(remoteId)}`, {
      data: toPayload(fields),
    });
    const doc = parseDoc(unwrap(body), "update");
    this.logger.info({ remoteId }, "ERP update accepted");
    return toConfirmed(doc);
  }

  /**
   * Advisory: failures, including missing configuration, are logged and reported as false.
   */
  async delete(remoteId: RemoteID): Promise<boolean> {
    try {
      await this.request("DELETE", `/${encodeURIComponent(remoteId)}`);
      this.logger.info({ remoteId }, "ERP delete accepted");
      return true;
    } catch (error) {
      this.logger.error({ remoteId, error: describeError(error) }, "ERP delete failed");
      return false;
    }
  }

  async listPage(offset: number, pageSize: number): Promise<RemoteRecord[]> {
    const query = new URLSearchParams({
      fields: JSON.stringify(LIST_FIELDS),
      limit_start: String(offset),
      limit_page_length: String(pageSize),
    });
    const data = unwrap(await this.request("GET", `?${query.toString()}`));
    if (!Array.isArray(data)) {
      throw new MalformedRemoteResponse("ERP list response: 'data' is not an array");
    }

    const records: RemoteRecord[] = [];
    for (const item of data) {
      const parsed = remoteDocSchema.safeParse(item);
      if (!parsed.success || !parsed.data.name) {
        this.logger.warn({ offset }, "ERP list item without a name dropped");
        continue;
      }
      records.push({ remoteId: parsed.data.name, ...toConfirmed(parsed.data) });
    }
    return records;
  }

  async ping(): Promise<boolean> {
    try {
      await this.listPage(0, 1);
      return true;
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, "ERP endpoint unreachable");
      return false;
    }
  }

  /**
   * Send one request; translate transport failures and error statuses.
   */
  private async request(method: Method, path: string, body?: unknown): Promise<unknown> {
    if (!this.apiUrl || !this.sid) {
      throw new ConfigurationError("ERP API URL or session id is not configured");
    }
    const url = `${this.apiUrl}${path}`;

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await this.fetchImpl(url, {
        method,
        signal: controller.signal,
        headers: {
          Accept: "application/json",
          Cookie: `sid=${this.sid}`,
          ...(body === undefined ? {} : { "Content-Type": "application/json" }),
        },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
      text = await response.text();
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : describeError(error);
      throw new RemoteUnreachable(`ERP ${method} ${url} failed: ${reason}`, { cause: error });
    } finally {
      clearTimeout(timeout);
    }

    this.logger.debug({ method, url, status: response.status }, "ERP response");
    if (!response.ok) {
      throw new RemoteRejected(response.status, text);
    }
    if (text.trim() === "") {
      return {};
    }
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new MalformedRemoteResponse(`ERP ${method} ${url} returned non-JSON body`, {
        cause: error,
      });
    }
  }
}

function toPayload(fields: RecordFields): ErpPayload {
  return {
    subject: fields.subject,
    raised_by: fields.originator,
    status: capitalizeStatus(fields.status),
  };
}

function unwrap(body: unknown): unknown {
  const parsed = envelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw new MalformedRemoteResponse("ERP response is not enveloped under 'data'");
  }
  return parsed.data.data;
}

function parseDoc(data: unknown, operation: string): RemoteDoc {
  const parsed = remoteDocSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedRemoteResponse(
      `ERP ${operation} response has an unexpected shape: ${parsed.error.message}`
    );
  }
  return parsed.data;
}

function toConfirmed(doc: RemoteDoc): ConfirmedFields {
  const confirmed: ConfirmedFields = {};
  if (doc.subject != null) confirmed.subject = doc.subject;
  if (doc.raised_by !== undefined) confirmed.originator = doc.raised_by;
  if (doc.status != null) confirmed.status = doc.status;
  return confirmed;
}
