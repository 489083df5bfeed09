/**
 * Boundary tests for network layer - tests against a real HTTP server on 127.0.0.1.
 *
 * @vitest-environment node
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from "vitest";
import { DefaultNetworkLayer, describeFetchError, type HttpClient } from "./network";
import { createTestServer, type TestServer } from "./network.test-utils";
import { SILENT_LOGGER } from "../logging";

const TEST_TIMEOUT_MS = process.env.CI ? 30000 : 10000;

describe("TestServer helper", () => {
  it("getPort() throws if called before start", () => {
    const server = createTestServer();

    expect(() => server.getPort()).toThrow("Server not started - call start() first");
  });

  it("records requested paths", async () => {
    const server = createTestServer();
    await server.start();
    try {
      await fetch(server.url("/json"));
      await fetch(server.url("/nowhere"));

      expect(server.requests).toEqual(["/json", "/nowhere"]);
    } finally {
      await server.stop();
    }
  });

  it("stop() resolves even if server already stopped", async () => {
    const server = createTestServer();
    await server.start();

    await server.stop();
    await expect(server.stop()).resolves.toBeUndefined();
  });
});

describe("DefaultNetworkLayer boundary tests", () => {
  let httpServer: TestServer;
  let httpClient: HttpClient;

  beforeAll(async () => {
    httpServer = createTestServer({
      "/stalled-body": (_req, res) => {
        // Headers and a first chunk, then nothing
        res.writeHead(200, { "Content-Type": "application/octet-stream" });
        res.write("partial");
      },
    });
    await httpServer.start();
  });

  afterAll(async () => {
    await httpServer.stop();
  });

  beforeEach(() => {
    httpClient = new DefaultNetworkLayer(SILENT_LOGGER);
  });

  describe("successful requests", () => {
    it(
      "fetches JSON from real endpoint",
      async () => {
        const response = await httpClient.fetch(httpServer.url("/json"));

        expect(response.status).toBe(200);
        expect(await response.json()).toEqual({ status: "ok" });
      },
      TEST_TIMEOUT_MS
    );

    it(
      "returns non-2xx status without throwing",
      async () => {
        const response = await httpClient.fetch(httpServer.url("/error/404"));

        expect(response.ok).toBe(false);
        expect(response.status).toBe(404);
      },
      TEST_TIMEOUT_MS
    );

    it(
      "sends request headers",
      async () => {
        const response = await httpClient.fetch(httpServer.url("/echo-headers"), {
          headers: { Accept: "application/vnd.github.v3+json", Authorization: "Bearer test-token" },
        });

        expect(await response.json()).toMatchObject({
          accept: "application/vnd.github.v3+json",
          authorization: "Bearer test-token",
        });
      },
      TEST_TIMEOUT_MS
    );
  });

  describe("timeout behavior", () => {
    it(
      "times out when the server never responds",
      async () => {
        const error: unknown = await httpClient
          .fetch(httpServer.url("/timeout"), { timeout: 100 })
          .then(
            () => undefined,
            (reason: unknown) => reason
          );

        expect(error).toMatchObject({ name: "TimeoutError" });
        expect(describeFetchError(error)).toBe("request timed out");
      },
      TEST_TIMEOUT_MS
    );

    it(
      "keeps the timeout armed while the body is read",
      async () => {
        const response = await httpClient.fetch(httpServer.url("/stalled-body"), { timeout: 300 });
        expect(response.status).toBe(200);

        await expect(response.arrayBuffer()).rejects.toMatchObject({ name: "TimeoutError" });
      },
      TEST_TIMEOUT_MS
    );
  });

  describe("error handling", () => {
    it(
      "describes connection refused with its cause",
      async () => {
        // Start and stop a server to get a port nothing listens on
        const closed = createTestServer();
        await closed.start();
        const url = closed.url("/json");
        await closed.stop();

        const error: unknown = await httpClient.fetch(url, { timeout: 1000 }).then(
          () => undefined,
          (reason: unknown) => reason
        );

        expect(error).toBeInstanceOf(TypeError);
        expect(describeFetchError(error)).toMatch(/^fetch failed: .*ECONNREFUSED/);
      },
      TEST_TIMEOUT_MS
    );

    it(
      "abort signal takes precedence over timeout",
      async () => {
        const controller = new AbortController();
        const start = Date.now();

        const fetchPromise = httpClient.fetch(httpServer.url("/timeout"), {
          timeout: 5000,
          signal: controller.signal,
        });
        setTimeout(() => controller.abort(), 100);

        await expect(fetchPromise).rejects.toMatchObject({ name: "AbortError" });
        expect(Date.now() - start).toBeLessThan(2000);
      },
      TEST_TIMEOUT_MS
    );

    it(
      "already-aborted signal throws immediately",
      async () => {
        const controller = new AbortController();
        controller.abort();

        await expect(
          httpClient.fetch(httpServer.url("/json"), { signal: controller.signal })
        ).rejects.toMatchObject({ name: "AbortError" });
      },
      TEST_TIMEOUT_MS
    );
  });
});
