/**
 * Unit Tests for the CV-CUE HTTP Client
 *
 * Covers login and session caching, the session validity probe,
 * request plumbing and error mapping.
 */

import { promises as fs } from "node:fs";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { http, HttpResponse } from "msw";
import { server } from "../../../../mocks/server";
import { BASE_URL, silentLogger } from "../../../../mocks/fixtures";
import { fileExists, makeTempDir, removeTempDir } from "../../../../mocks/temp-dir";
import {
  CvCueHttpClient,
  buildQueryString,
  type CvCueHttpClientConfig,
} from "../../../../../lib/infrastructure/cvcue/client/http-client";
import { SessionStore } from "../../../../../lib/infrastructure/cvcue/client/session-store";
import {
  AuthenticationError,
  ClientClosedError,
  HttpStatusError,
  TransportError,
} from "../../../../../lib/infrastructure/cvcue/errors";

describe("CvCueHttpClient", () => {
  let dir: string;
  let sessionFile: string;

  const createClient = (overrides: Partial<CvCueHttpClientConfig> = {}) =>
    new CvCueHttpClient({
      baseUrl: BASE_URL,
      keyId: "test-key-id",
      keyValue: "test-key-value",
      clientId: "test-client",
      sessionFile,
      logger: silentLogger,
      ...overrides,
    });

  const storeSession = (value = "cached-session-id") =>
    new SessionStore(sessionFile, silentLogger).save([{ name: "JSESSIONID", value }]);

  beforeEach(async () => {
    dir = await makeTempDir();
    sessionFile = path.join(dir, ".session");
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe("login", () => {
    it("posts API key credentials to /session", async () => {
      let body: unknown;
      server.use(
        http.post(`${BASE_URL}/session`, async ({ request }) => {
          body = await request.json();
          return HttpResponse.json({ status: "ok" }, { headers: { "Set-Cookie": "JSESSIONID=abc123; Path=/; HttpOnly" } });
        }),
      );

      const response = await createClient().login();

      expect(response).toEqual({ status: "ok" });
      expect(body).toEqual({
        type: "apiKeyCredentials",
        keyId: "test-key-id",
        keyValue: "test-key-value",
        clientIdentifier: "test-client",
        timeout: 300,
      });
    });

    it("persists the session cookie after a successful login", async () => {
      server.use(
        http.post(`${BASE_URL}/session`, () =>
          HttpResponse.json({}, { headers: { "Set-Cookie": "JSESSIONID=abc123; Path=/; HttpOnly" } }),
        ),
      );

      const client = createClient();
      await client.login();

      expect(await client.hasSessionCookie()).toBe(true);
      await expect(new SessionStore(sessionFile, silentLogger).load()).resolves.toEqual([
        { name: "JSESSIONID", value: "abc123" },
      ]);
    });

    it("does not persist anything when login fails", async () => {
      server.use(
        http.post(`${BASE_URL}/session`, () =>
          HttpResponse.json({ message: "Invalid key" }, { status: 401 }),
        ),
      );

      await expect(createClient().login()).rejects.toBeInstanceOf(AuthenticationError);
      expect(await fileExists(sessionFile)).toBe(false);
    });
  });

  describe("isSessionActive", () => {
    it("returns false without a request when there is no session cookie", async () => {
      const probe = vi.fn(() => new HttpResponse(null, { status: 200 }));
      server.use(http.get(`${BASE_URL}/session`, probe));

      await expect(createClient().isSessionActive()).resolves.toBe(false);
      expect(probe).not.toHaveBeenCalled();
    });

    it("returns true on a 200 with a JSON body from the status probe", async () => {
      await storeSession();
      server.use(http.get(`${BASE_URL}/session`, () => HttpResponse.json({ active: true, user: "test-client" })));

      await expect(createClient().isSessionActive()).resolves.toBe(true);
    });

    it("returns true on an empty 200 from the status probe", async () => {
      await storeSession();
      server.use(http.get(`${BASE_URL}/session`, () => new HttpResponse(null, { status: 200 })));

      await expect(createClient().isSessionActive()).resolves.toBe(true);
    });

    it("sends the cached cookie with the status probe", async () => {
      await storeSession("cached-session-id");
      const fetchFn = vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ active: true })));

      await expect(createClient({ fetchFn }).isSessionActive()).resolves.toBe(true);

      const init = fetchFn.mock.calls[0]?.[1];
      expect(fetchFn.mock.calls[0]?.[0]).toBe(`${BASE_URL}/session`);
      expect(new Headers(init?.headers).get("cookie")).toBe("JSESSIONID=cached-session-id");
    });

    it.each([201, 204, 401, 403, 500])("returns false on status %d", async (status) => {
      await storeSession();
      server.use(http.get(`${BASE_URL}/session`, () => new HttpResponse(null, { status })));

      await expect(createClient().isSessionActive()).resolves.toBe(false);
    });

    it("returns false on a transport failure", async () => {
      await storeSession();
      server.use(http.get(`${BASE_URL}/session`, () => HttpResponse.error()));

      await expect(createClient().isSessionActive()).resolves.toBe(false);
    });

    it("keeps the stale cookie after a failed probe", async () => {
      await storeSession();
      server.use(http.get(`${BASE_URL}/session`, () => new HttpResponse(null, { status: 401 })));
      const client = createClient();

      await client.isSessionActive();

      expect(await client.hasSessionCookie()).toBe(true);
      expect(await fileExists(sessionFile)).toBe(true);
    });
  });

  describe("session cache", () => {
    it("starts without cookies when the cache file is corrupt, and removes it", async () => {
      await fs.writeFile(sessionFile, "not json at all");

      const client = createClient();

      expect(await client.hasSessionCookie()).toBe(false);
      expect(await fileExists(sessionFile)).toBe(false);
    });

    it("clearSession deletes the cache and forgets the cookie", async () => {
      await storeSession();
      const client = createClient();

      await expect(client.clearSession()).resolves.toBe(true);
      expect(await client.hasSessionCookie()).toBe(false);
      expect(await fileExists(sessionFile)).toBe(false);
    });
  });

  describe("request", () => {
    it("returns the parsed JSON body", async () => {
      server.use(http.get(`${BASE_URL}/test`, () => HttpResponse.json({ data: "test" })));

      await expect(createClient().request("GET", "/test")).resolves.toEqual({ data: "test" });
    });

    it("adds a leading slash to the path", async () => {
      server.use(http.get(`${BASE_URL}/test`, () => HttpResponse.json({ ok: true })));

      await expect(createClient().get("test")).resolves.toEqual({ ok: true });
    });

    it("sends query parameters, repeating keys for lists", async () => {
      let search = "";
      server.use(
        http.get(`${BASE_URL}/test`, ({ request }) => {
          search = new URL(request.url).search;
          return HttpResponse.json({});
        }),
      );

      await createClient().get("/test", { key: "value", model: ["A", "B"], active: true, skipped: undefined });

      expect(search).toBe("?key=value&model=A&model=B&active=true");
    });

    it("sends Content-Type: application/json on requests without a body", async () => {
      let contentType: string | null = null;
      server.use(
        http.get(`${BASE_URL}/test`, ({ request }) => {
          contentType = request.headers.get("content-type");
          return HttpResponse.json({});
        }),
      );

      await createClient().get("/test");

      expect(contentType).toBe("application/json");
    });

    it("merges caller headers", async () => {
      let version: string | null = null;
      server.use(
        http.get(`${BASE_URL}/test`, ({ request }) => {
          version = request.headers.get("version");
          return HttpResponse.json({});
        }),
      );

      await createClient().request("GET", "/test", { headers: { Version: "19" } });

      expect(version).toBe("19");
    });

    it("sends a JSON body", async () => {
      let body: unknown;
      server.use(
        http.post(`${BASE_URL}/test`, async ({ request }) => {
          body = await request.json();
          return HttpResponse.json({ success: true });
        }),
      );

      await expect(createClient().post("/test", { key: "value" })).resolves.toEqual({ success: true });
      expect(body).toEqual({ key: "value" });
    });

    it("supports PUT and DELETE", async () => {
      server.use(
        http.put(`${BASE_URL}/items/1`, () => HttpResponse.json({ updated: true })),
        http.delete(`${BASE_URL}/items/1`, () => new HttpResponse(null, { status: 204 })),
      );
      const client = createClient();

      await expect(client.put("/items/1", { name: "x" })).resolves.toEqual({ updated: true });
      await expect(client.delete("/items/1")).resolves.toBeNull();
    });

    it("resolves to null for an empty 200 body", async () => {
      server.use(http.get(`${BASE_URL}/empty`, () => new HttpResponse(null, { status: 200 })));

      await expect(createClient().get("/empty")).resolves.toBeNull();
    });

    it("raises HttpStatusError with the response body on a non-2xx status", async () => {
      server.use(http.get(`${BASE_URL}/missing`, () => HttpResponse.text("no such resource", { status: 404 })));

      const error = await createClient().get("/missing").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HttpStatusError);
      expect(error).toMatchObject({
        statusCode: 404,
        endpoint: `${BASE_URL}/missing`,
        responseBody: "no such resource",
        message: "CV-CUE request failed with status 404: no such resource",
      });
    });

    it("raises TransportError when the network fails", async () => {
      server.use(http.get(`${BASE_URL}/test`, () => HttpResponse.error()));

      await expect(createClient().get("/test")).rejects.toBeInstanceOf(TransportError);
    });

    it("raises TransportError when the request times out", async () => {
      const fetchFn = vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          }),
      );

      const error = await createClient({ fetchFn, timeoutMs: 10 })
        .get("/slow")
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: "Request timed out after 10ms" });
    });

    it("stores cookies set on any response", async () => {
      server.use(
        http.get(`${BASE_URL}/test`, () =>
          HttpResponse.json({}, { headers: { "Set-Cookie": "JSESSIONID=rotated; Path=/" } }),
        ),
      );
      const client = createClient();

      await client.get("/test");

      expect(await client.hasSessionCookie()).toBe(true);
    });
  });

  describe("close", () => {
    it("rejects requests made after close", async () => {
      const client = createClient();
      client.close();

      await expect(client.get("/test")).rejects.toBeInstanceOf(ClientClosedError);
      await expect(client.isSessionActive()).rejects.toBeInstanceOf(ClientClosedError);
    });

    it("aborts a request in flight", async () => {
      const fetchFn = vi.fn<typeof fetch>(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          }),
      );
      const client = createClient({ fetchFn });

      const pending = client.get("/slow");
      await vi.waitFor(() => expect(fetchFn).toHaveBeenCalled());
      client.close();

      await expect(pending).rejects.toBeInstanceOf(ClientClosedError);
    });

    it("can be called twice", () => {
      const client = createClient();
      client.close();
      expect(() => client.close()).not.toThrow();
      expect(client.closed).toBe(true);
    });
  });
});

describe("buildQueryString", () => {
  it("drops null and undefined values", () => {
    expect(buildQueryString({ a: 1, b: null, c: undefined, d: false })).toBe("a=1&d=false");
  });

  it("encodes JSON values", () => {
    expect(buildQueryString({ filter: ['{"a":1}'] })).toBe("filter=%7B%22a%22%3A1%7D");
  });
});
