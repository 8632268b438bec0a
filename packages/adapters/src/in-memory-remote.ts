/**
 * InMemoryRemoteEndpoint - An in-memory implementation of RemoteEndpoint for testing.
 * Stores records in memory, assigns ERP-style identifiers, and can simulate
 * outages, rejections and malformed responses.
 */

import {
  RemoteRejected,
  RemoteUnreachable,
  capitalizeStatus,
  type ConfirmedFields,
  type CreateResult,
  type RecordFields,
  type RemoteEndpoint,
  type RemoteID,
  type RemoteRecord,
} from "@erpsync/core";

/**
 * Configuration options for InMemoryRemoteEndpoint.
 */
export interface InMemoryRemoteOptions {
  /**
   * Initial records to populate the endpoint with.
   */
  initialRecords?: RemoteRecord[];
  /**
   * Identifier prefix (default "KM-").
   */
  idPrefix?: string;
  /**
   * Sequence number of the first identifier handed out (default 1).
   */
  firstSequence?: number;
}

/**
 * Decides whether a request is rejected; return a status code to reject.
 */
export type RejectRule = (
  operation: RemoteCall["operation"],
  fields: RecordFields | null,
  remoteId: RemoteID | null
) => number | null;

/**
 * A request the endpoint received, in arrival order.
 */
export interface RemoteCall {
  operation: "create" | "update" | "delete" | "listPage";
  remoteId: RemoteID | null;
  fields: RecordFields | null;
}

export class InMemoryRemoteEndpoint implements RemoteEndpoint {
  private records: Map<RemoteID, RemoteRecord>;
  private sequence: number;
  private readonly idPrefix: string;
  private online: boolean;
  private rejectRule: RejectRule | null;
  private omitIdentifier: boolean;
  private calls: RemoteCall[];

  constructor(options: InMemoryRemoteOptions = {}) {
    this.records = new Map();
    this.idPrefix = options.idPrefix ?? "KM-";
    this.sequence = (options.firstSequence ?? 1) - 1;
    this.online = true;
    this.rejectRule = null;
    this.omitIdentifier = false;
    this.calls = [];

    if (options.initialRecords) {
      for (const record of options.initialRecords) {
        this.records.set(record.remoteId, { ...record });
      }
    }
  }

  async create(fields: RecordFields): Promise<CreateResult> {
    this.admit("create", fields, null);

    const stored = this.normalize(fields);
    if (this.omitIdentifier) {
      return { remoteId: null, confirmed: stored };
    }
    const remoteId = this.nextId();
    this.records.set(remoteId, { remoteId, ...stored });
    return { remoteId, confirmed: stored };
  }

  async update(remoteId: RemoteID, fields: RecordFields): Promise<ConfirmedFields> {
    this.admit("update", fields, remoteId);

    if (!this.records.has(remoteId)) {
      throw new RemoteRejected(404, JSON.stringify({ exc_type: "DoesNotExistError" }));
    }
    const stored = this.normalize(fields);
    this.records.set(remoteId, { remoteId, ...stored });
    return stored;
  }

  async delete(remoteId: RemoteID): Promise<boolean> {
    try {
      this.admit("delete", null, remoteId);
    } catch {
      return false;
    }
    return this.records.delete(remoteId);
  }

  async listPage(offset: number, pageSize: number): Promise<RemoteRecord[]> {
    this.admit("listPage", null, null);

    return this.getAllRecords()
      .sort((a, b) => a.remoteId.localeCompare(b.remoteId))
      .slice(offset, offset + pageSize);
  }

  async ping(): Promise<boolean> {
    return this.online;
  }

  // --- Failure injection ---

  /**
   * Simulate the endpoint going down or coming back.
   */
  setOnline(online: boolean): void {
    this.online = online;
  }

  /**
   * Reject matching requests with the returned status code; pass null to clear.
   */
  rejectWhen(rule: RejectRule | null): void {
    this.rejectRule = rule;
  }

  /**
   * Answer creates successfully but without an identifier.
   */
  omitIdentifierOnCreate(omit: boolean): void {
    this.omitIdentifier = omit;
  }

  // --- Helper methods for testing/debugging ---

  getAllRecords(): RemoteRecord[] {
    return Array.from(this.records.values()).map((record) => ({ ...record }));
  }

  getRecord(remoteId: RemoteID): RemoteRecord | undefined {
    const record = this.records.get(remoteId);
    return record ? { ...record } : undefined;
  }

  /**
   * Manually add a record, as if another client had created it.
   */
  addRecord(record: RemoteRecord): void {
    this.records.set(record.remoteId, { ...record });
  }

  /**
   * Requests received so far, including failed ones.
   */
  getCalls(): RemoteCall[] {
    return this.calls.map((call) => ({ ...call }));
  }

  clear(): void {
    this.records.clear();
    this.calls = [];
  }

  private admit(
    operation: RemoteCall["operation"],
    fields: RecordFields | null,
    remoteId: RemoteID | null
  ): void {
    this.calls.push({ operation, remoteId, fields: fields ? { ...fields } : null });

    if (!this.online) {
      throw new RemoteUnreachable(`connect ECONNREFUSED (simulated outage during ${operation})`);
    }
    const status = this.rejectRule?.(operation, fields, remoteId) ?? null;
    if (status !== null) {
      throw new RemoteRejected(status, JSON.stringify({ exc_type: "ValidationError" }));
    }
  }

  private normalize(fields: RecordFields): RecordFields {
    return {
      subject: fields.subject,
      originator: fields.originator,
      status: capitalizeStatus(fields.status),
    };
  }

  private nextId(): RemoteID {
    this.sequence++;
    return `${this.idPrefix}${String(this.sequence).padStart(5, "0")}`;
  }
}
