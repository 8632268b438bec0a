/**
 * Tests for ErpNextAdapter
 * An injected fetch stands in for the ERP server.
 */

import {
  ConfigurationError,
  MalformedRemoteResponse,
  RemoteRejected,
  RemoteUnreachable,
  silentLogger,
} from "@erpsync/core";
import { ErpNextAdapter, LIST_FIELDS, type ErpNextAdapterOptions } from "../src/erpnext-adapter";

const API_URL = "https://erp.example.test/api/resource/Issue";
const FIELDS = { subject: "Pump broken", originator: "farmer_123", status: "open" };

type FetchMock = jest.Mock<Promise<Response>, [string, RequestInit]>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function createAdapter(
  respond: (url: string, init: RequestInit) => Promise<Response>,
  options: ErpNextAdapterOptions = {}
): { adapter: ErpNextAdapter; fetchMock: FetchMock } {
  const fetchMock: FetchMock = jest.fn(respond);
  const adapter = new ErpNextAdapter({
    apiUrl: API_URL,
    sid: "test-session",
    fetch: fetchMock,
    logger: silentLogger(),
    ...options,
  });
  return { adapter, fetchMock };
}

function lastCall(fetchMock: FetchMock): { url: string; init: RequestInit } {
  const call = fetchMock.mock.calls[fetchMock.mock.calls.length - 1];
  return { url: call[0], init: call[1] };
}

describe("ErpNextAdapter", () => {
  describe("create", () => {
    it("should POST the enveloped payload with the session cookie", async () => {
      const { adapter, fetchMock } = createAdapter(async () =>
        jsonResponse({
          data: { name: "KM-00042", subject: "Pump broken", raised_by: "farmer_123", status: "Open" },
        })
      );

      const result = await adapter.create(FIELDS);

      expect(result).toEqual({
        remoteId: "KM-00042",
        confirmed: { subject: "Pump broken", originator: "farmer_123", status: "Open" },
      });
      const { url, init } = lastCall(fetchMock);
      expect(url).toBe(API_URL);
      expect(init.method).toBe("POST");
      expect(init.headers).toEqual({
        Accept: "application/json",
        Cookie: "sid=test-session",
        "Content-Type": "application/json",
      });
      expect(JSON.parse(String(init.body))).toEqual({
        data: { subject: "Pump broken", raised_by: "farmer_123", status: "Open" },
      });
    });

    it("should send status Open when none is set", async () => {
      const { adapter, fetchMock } = createAdapter(async () => jsonResponse({ data: { name: "KM-1" } }));

      await adapter.create({ subject: "No status", originator: null, status: "" });

      expect(JSON.parse(String(lastCall(fetchMock).init.body))).toEqual({
        data: { subject: "No status", raised_by: null, status: "Open" },
      });
    });

    it("should return a null identifier when the response has no name", async () => {
      const { adapter } = createAdapter(async () => jsonResponse({ data: { subject: "Pump broken" } }));

      const result = await adapter.create(FIELDS);

      expect(result).toEqual({ remoteId: null, confirmed: { subject: "Pump broken" } });
    });

    it("should strip trailing slashes from the resource URL", async () => {
      const { adapter, fetchMock } = createAdapter(async () => jsonResponse({ data: { name: "KM-1" } }), {
        apiUrl: `${API_URL}//`,
      });

      await adapter.create(FIELDS);

      expect(lastCall(fetchMock).url).toBe(API_URL);
    });
  });

  describe("update", () => {
    it("should PUT to the record path", async () => {
      const { adapter, fetchMock } = createAdapter(async () =>
        jsonResponse({ data: { name: "KM 7", subject: "Pump fixed", raised_by: null, status: "Closed" } })
      );

      const confirmed = await adapter.update("KM 7", { ...FIELDS, subject: "Pump fixed", status: "CLOSED" });

      expect(confirmed).toEqual({ subject: "Pump fixed", originator: null, status: "Closed" });
      const { url, init } = lastCall(fetchMock);
      expect(url).toBe(`${API_URL}/KM%207`);
      expect(init.method).toBe("PUT");
      expect(JSON.parse(String(init.body))).toEqual({
        data: { subject: "Pump fixed", raised_by: "farmer_123", status: "Closed" },
      });
    });
  });

  describe("delete", () => {
    it("should DELETE the record path without a body", async () => {
      const { adapter, fetchMock } = createAdapter(async () => jsonResponse({ message: "ok" }));

      expect(await adapter.delete("KM-00042")).toBe(true);
      const { url, init } = lastCall(fetchMock);
      expect(url).toBe(`${API_URL}/KM-00042`);
      expect(init.method).toBe("DELETE");
      expect(init.body).toBeUndefined();
      expect(init.headers).toEqual({ Accept: "application/json", Cookie: "sid=test-session" });
    });

    it("should report failure as false", async () => {
      const { adapter } = createAdapter(async () => new Response("not found", { status: 404 }));

      expect(await adapter.delete("KM-00042")).toBe(false);
    });

    it("should report missing configuration as false", async () => {
      const { adapter, fetchMock } = createAdapter(async () => jsonResponse({}), { sid: "" });

      expect(await adapter.delete("KM-00042")).toBe(false);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe("listPage", () => {
    it("should request the field list and pagination parameters", async () => {
      const { adapter, fetchMock } = createAdapter(async () =>
        jsonResponse({
          data: [
            { name: "KM-00011", subject: "a", raised_by: "farmer_1", status: "Open" },
            { name: "KM-00012", subject: "b", raised_by: null, status: "Closed" },
          ],
        })
      );

      const page = await adapter.listPage(10, 5);

      expect(page).toEqual([
        { remoteId: "KM-00011", subject: "a", originator: "farmer_1", status: "Open" },
        { remoteId: "KM-00012", subject: "b", originator: null, status: "Closed" },
      ]);
      const { url, init } = lastCall(fetchMock);
      const parsed = new URL(url);
      expect(`${parsed.origin}${parsed.pathname}`).toBe(API_URL);
      expect(JSON.parse(parsed.searchParams.get("fields") ?? "")).toEqual([...LIST_FIELDS]);
      expect(parsed.searchParams.get("limit_start")).toBe("10");
      expect(parsed.searchParams.get("limit_page_length")).toBe("5");
      expect(init.method).toBe("GET");
    });

    it("should drop items without a name", async () => {
      const { adapter } = createAdapter(async () =>
        jsonResponse({ data: [{ subject: "nameless" }, { name: "KM-00013", subject: "kept" }] })
      );

      const page = await adapter.listPage(0, 10);

      expect(page).toEqual([{ remoteId: "KM-00013", subject: "kept" }]);
    });

    it("should reject a response whose data is not a list", async () => {
      const { adapter } = createAdapter(async () => jsonResponse({ data: { name: "KM-1" } }));

      await expect(adapter.listPage(0, 10)).rejects.toBeInstanceOf(MalformedRemoteResponse);
    });
  });

  describe("error translation", () => {
    it("should raise RemoteRejected with status and body", async () => {
      const { adapter } = createAdapter(async () =>
        new Response('{"exc_type":"ValidationError"}', { status: 417 })
      );

      const attempt = adapter.create(FIELDS);

      await expect(attempt).rejects.toBeInstanceOf(RemoteRejected);
      await expect(attempt).rejects.toMatchObject({
        statusCode: 417,
        body: '{"exc_type":"ValidationError"}',
      });
    });

    it("should raise RemoteUnreachable on transport failure", async () => {
      const { adapter } = createAdapter(async () => {
        throw new TypeError("fetch failed");
      });

      await expect(adapter.create(FIELDS)).rejects.toThrow(
        new RemoteUnreachable(`ERP POST ${API_URL} failed: fetch failed`)
      );
    });

    it("should raise RemoteUnreachable when the request times out", async () => {
      const { adapter } = createAdapter(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          }),
        { timeoutMs: 20 }
      );

      await expect(adapter.listPage(0, 1)).rejects.toThrow(/timed out after 20ms/);
    });

    it("should raise MalformedRemoteResponse for a non-JSON body", async () => {
      const { adapter } = createAdapter(async () => new Response("<html>Login</html>", { status: 200 }));

      await expect(adapter.create(FIELDS)).rejects.toBeInstanceOf(MalformedRemoteResponse);
    });

    it("should raise MalformedRemoteResponse without a data envelope", async () => {
      const { adapter } = createAdapter(async () => jsonResponse({ message: "ok" }));

      await expect(adapter.update("KM-1", FIELDS)).rejects.toThrow(
        new MalformedRemoteResponse("ERP response is not enveloped under 'data'")
      );
    });

    it("should raise MalformedRemoteResponse for an empty body", async () => {
      const { adapter } = createAdapter(async () => new Response("", { status: 200 }));

      await expect(adapter.create(FIELDS)).rejects.toThrow(
        new MalformedRemoteResponse("ERP response is not enveloped under 'data'")
      );
    });
  });

  describe("configuration", () => {
    it("should raise ConfigurationError before any request when the URL is missing", async () => {
      const { adapter, fetchMock } = createAdapter(async () => jsonResponse({}), { apiUrl: "" });

      await expect(adapter.create(FIELDS)).rejects.toBeInstanceOf(ConfigurationError);
      await expect(adapter.listPage(0, 1)).rejects.toBeInstanceOf(ConfigurationError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("should reject a non-positive timeout", () => {
      expect(() => new ErpNextAdapter({ timeoutMs: 0 })).toThrow(ConfigurationError);
    });
  });

  describe("ping", () => {
    it("should report reachability", async () => {
      const up = createAdapter(async () => jsonResponse({ data: [] }));
      const down = createAdapter(async () => new Response("", { status: 502 }));

      expect(await up.adapter.ping()).toBe(true);
      expect(await down.adapter.ping()).toBe(false);
      expect(lastCall(up.fetchMock).url).toContain("limit_page_length=1");
    });
  });
});
