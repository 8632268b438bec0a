/**
 * Tests for OutboundSyncEngine
 * Uses InMemoryRecordStore and InMemoryRemoteEndpoint for deterministic testing.
 */

import { OutboundSyncEngine, pushRecord } from "../src/outbound";
import { ConfigurationError, MalformedRemoteResponse } from "../src/errors";
import { silentLogger } from "../src/logger";
import type { RecordDraft, RemoteEndpoint, SyncRecord } from "../src/types";
import { InMemoryRecordStore } from "@erpsync/recordstore-in-memory";
import { InMemoryRemoteEndpoint } from "@erpsync/adapter-in-memory";
import { GatedRemote, flush } from "./gated-remote";

const NOW = new Date("2024-05-01T10:00:00.000Z");

function pending(subject: string, remoteId: string | null = null): RecordDraft {
  return {
    subject,
    originator: "farmer_1",
    status: "Open",
    remoteId,
    createdAt: new Date("2024-04-30T08:00:00.000Z"),
    synced: false,
    syncedAt: null,
  };
}

/**
 * Helper to create an engine with fresh in-memory dependencies.
 */
function createTestEngine(): {
  engine: OutboundSyncEngine;
  store: InMemoryRecordStore;
  remote: InMemoryRemoteEndpoint;
} {
  const store = new InMemoryRecordStore();
  const remote = new InMemoryRemoteEndpoint();
  const engine = new OutboundSyncEngine({
    store,
    remote,
    logger: silentLogger(),
    now: () => NOW,
  });
  return { engine, store, remote };
}

describe("OutboundSyncEngine", () => {
  describe("pending records", () => {
    it("should create unknown records remotely and mark them synced", async () => {
      const { engine, store, remote } = createTestEngine();
      await store.insert(pending("Pump broken"));
      await store.insert(pending("Fence down"));

      const summary = await engine.run();

      expect(summary.pending).toBe(2);
      expect(summary.synced).toBe(2);
      expect(summary.failures).toEqual([]);
      expect(summary.runId).toMatch(/^out_\d+_[0-9a-f]{8}$/);

      const records = store.getAllRecords();
      expect(records.map((r) => r.remoteId)).toEqual(["KM-00001", "KM-00002"]);
      expect(records.every((r) => r.synced)).toBe(true);
      expect(records[0].syncedAt).toEqual(NOW);
      expect(remote.getRecord("KM-00002")?.subject).toBe("Fence down");
    });

    it("should update records that already have a remote identifier", async () => {
      const { engine, store, remote } = createTestEngine();
      remote.addRecord({ remoteId: "KM-00007", subject: "Old", originator: null, status: "Open" });
      const record = await store.insert({ ...pending("New subject", "KM-00007"), status: "closed" });

      const summary = await engine.run();

      expect(summary.synced).toBe(1);
      expect(remote.getCalls().map((c) => c.operation)).toEqual(["update"]);
      expect(remote.getRecord("KM-00007")).toEqual({
        remoteId: "KM-00007",
        subject: "New subject",
        originator: "farmer_1",
        status: "Closed",
      });
      expect((await store.get(record.localId))?.remoteId).toBe("KM-00007");
    });

    it("should leave already-synced records alone", async () => {
      const { engine, store, remote } = createTestEngine();
      await store.insert({ ...pending("Done", "KM-00003"), synced: true, syncedAt: NOW });

      const summary = await engine.run();

      expect(summary.pending).toBe(0);
      expect(summary.synced).toBe(0);
      expect(remote.getCalls()).toEqual([]);
    });
  });

  describe("Eventual convergence", () => {
    it("should sync every record once the remote accepts requests, then do nothing", async () => {
      const { engine, store, remote } = createTestEngine();
      for (let i = 1; i <= 4; i++) {
        await store.insert(pending(`Record ${i}`));
      }

      remote.setOnline(false);
      const offline = await engine.run();
      expect(offline.synced).toBe(0);
      expect(offline.failures.map((f) => f.kind)).toEqual([
        "remote_unreachable",
        "remote_unreachable",
        "remote_unreachable",
        "remote_unreachable",
      ]);

      remote.setOnline(true);
      const online = await engine.run();
      expect(online.synced).toBe(4);

      const records = store.getAllRecords();
      expect(records.every((r) => r.synced && r.remoteId !== null)).toBe(true);

      const again = await engine.run();
      expect(again.synced).toBe(0);
      expect(remote.getAllRecords()).toHaveLength(4);
    });
  });

  describe("Partial-failure isolation", () => {
    it("should sync four of five records when the remote rejects one", async () => {
      const { engine, store, remote } = createTestEngine();
      for (const subject of ["a", "b", "bad", "d", "e"]) {
        await store.insert(pending(subject));
      }
      remote.rejectWhen((operation, fields) =>
        operation === "create" && fields?.subject === "bad" ? 417 : null
      );

      const summary = await engine.run();

      expect(summary.synced).toBe(4);
      expect(summary.failures).toEqual([
        {
          localId: "local-3",
          operation: "create",
          kind: "remote_rejected",
          error: 'Remote endpoint responded 417: {"exc_type":"ValidationError"}',
        },
      ]);
      const unsynced = await store.find({ synced: false });
      expect(unsynced.map((r) => r.subject)).toEqual(["bad"]);
      expect(unsynced[0].remoteId).toBeNull();
    });

    it("should keep a record pending when the create response lacks an identifier", async () => {
      const { engine, store, remote } = createTestEngine();
      const record = await store.insert(pending("No id"));
      remote.omitIdentifierOnCreate(true);

      const summary = await engine.run();

      expect(summary.synced).toBe(0);
      expect(summary.failures[0].kind).toBe("malformed_remote_response");
      const stored = await store.get(record.localId);
      expect(stored?.synced).toBe(false);
      expect(stored?.remoteId).toBeNull();
    });
  });

  describe("configuration errors", () => {
    it("should abort the pass and rethrow", async () => {
      const store = new InMemoryRecordStore();
      await store.insert(pending("first"));
      await store.insert(pending("second"));
      const create = jest.fn(async () => {
        throw new ConfigurationError("ERP API URL or session id is not configured");
      });
      const remote: RemoteEndpoint = {
        create,
        update: jest.fn(),
        delete: jest.fn(),
        listPage: jest.fn(),
        ping: jest.fn(),
      };
      const engine = new OutboundSyncEngine({ store, remote, logger: silentLogger() });

      await expect(engine.run()).rejects.toBeInstanceOf(ConfigurationError);
      expect(create).toHaveBeenCalledTimes(1);
      expect(engine.running).toBe(false);
    });
  });

  describe("serialization", () => {
    it("should never push the same record twice from concurrent passes", async () => {
      const { engine, store, remote } = createTestEngine();
      await store.insert(pending("one"));
      await store.insert(pending("two"));

      const [first, second] = await Promise.all([engine.run(), engine.run()]);

      expect(first.synced).toBe(2);
      expect(second.synced).toBe(0);
      expect(remote.getAllRecords()).toHaveLength(2);
    });

    it("should keep a record pending when it is edited while its push is in flight", async () => {
      const store = new InMemoryRecordStore();
      const remote = new GatedRemote();
      const engine = new OutboundSyncEngine({ store, remote, logger: silentLogger(), now: () => NOW });
      const record = await store.insert(pending("old"));

      const pass = engine.run();
      await flush();
      expect(remote.waiting).toBe(1);
      await store.update(record.localId, { subject: "new", synced: false, syncedAt: null });
      remote.releaseAll();
      const summary = await pass;

      expect(summary.synced).toBe(0);
      expect(await store.get(record.localId)).toMatchObject({
        subject: "new",
        remoteId: "KM-00001",
        synced: false,
        syncedAt: null,
      });

      const second = await engine.run();
      expect(second.synced).toBe(1);
      expect(remote.getAllRecords()).toHaveLength(1);
      expect(remote.getRecord("KM-00001")?.subject).toBe("new");
    });

    it("should not count a record deleted while its push is in flight", async () => {
      const store = new InMemoryRecordStore();
      const remote = new GatedRemote();
      const engine = new OutboundSyncEngine({ store, remote, logger: silentLogger(), now: () => NOW });
      const record = await store.insert(pending("short-lived"));

      const pass = engine.run();
      await flush();
      await store.delete(record.localId);
      remote.releaseAll();
      const summary = await pass;

      expect(summary.synced).toBe(0);
      expect(summary.failures).toEqual([]);
      expect(store.size).toBe(0);
    });

    it("should report running while a pass is in progress", async () => {
      const { engine, store } = createTestEngine();
      await store.insert(pending("one"));

      const pass = engine.run();
      expect(engine.running).toBe(true);
      await pass;
      expect(engine.running).toBe(false);
    });
  });
});

describe("OutboundSyncEngine.pushOne", () => {
  it("should push a pending record and confirm it", async () => {
    const { engine, store } = createTestEngine();
    const record = await store.insert(pending("Pump broken"));

    const pushed = await engine.pushOne(record.localId);

    expect(pushed).toEqual({ ...record, remoteId: "KM-00001", synced: true, syncedAt: NOW });
  });

  it("should not push a record a pass has already confirmed", async () => {
    const { engine, store, remote } = createTestEngine();
    const record = await store.insert(pending("Pump broken"));
    await engine.run();

    const pushed = await engine.pushOne(record.localId);

    expect(pushed?.synced).toBe(true);
    expect(remote.getCalls().map((c) => c.operation)).toEqual(["create"]);
  });

  it("should return null for a missing record", async () => {
    const { engine, remote } = createTestEngine();

    expect(await engine.pushOne("local-404")).toBeNull();
    expect(remote.getCalls()).toEqual([]);
  });
});

describe("pushRecord", () => {
  const record: SyncRecord = {
    localId: "local-9",
    subject: "Gate stuck",
    originator: null,
    status: "Open",
    remoteId: null,
    createdAt: NOW,
    synced: false,
    syncedAt: null,
  };

  it("should create and return the new identifier", async () => {
    const remote = new InMemoryRemoteEndpoint({ firstSequence: 10 });

    await expect(pushRecord(remote, record)).resolves.toEqual({
      remoteId: "KM-00010",
      operation: "create",
    });
  });

  it("should reject a create without an identifier", async () => {
    const remote = new InMemoryRemoteEndpoint();
    remote.omitIdentifierOnCreate(true);

    await expect(pushRecord(remote, record)).rejects.toThrow(
      new MalformedRemoteResponse("Remote create for record local-9 returned no identifier")
    );
  });
});
