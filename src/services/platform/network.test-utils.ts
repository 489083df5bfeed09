/**
 * Test utilities for network layer mocking and boundary testing.
 *
 * Provides a mock HttpClient factory for unit tests and a local HTTP server
 * for boundary tests against real sockets.
 */

import {
  createServer as createHttpServer,
  type Server,
  type IncomingMessage,
  type ServerResponse,
} from "node:http";
import { vi, type Mock } from "vitest";
import type { HttpClient, HttpRequestOptions } from "./network";

// ============================================================================
// Mock HTTP Client
// ============================================================================

/**
 * Response configuration - stores DATA, not Response objects.
 * A fresh Response is constructed on each fetch() call.
 */
export interface ConfiguredResponse {
  /** Body to return. Default: empty */
  readonly body?: string | Uint8Array;
  /** Default: 200 */
  readonly status?: number;
  readonly headers?: Record<string, string>;
  /** Throw this from fetch() instead of returning a response */
  readonly error?: Error;
  /** Fail the body stream with this error after `body` has been delivered */
  readonly bodyError?: Error;
}

/**
 * Mock HttpClient with a vitest spy for assertions.
 */
export interface MockHttpClient extends HttpClient {
  fetch: Mock<(url: string, options?: HttpRequestOptions) => Promise<Response>>;
}

/**
 * Options for createMockHttpClient.
 */
export interface MockHttpClientOptions {
  /** Responses by exact URL */
  readonly responses?: Readonly<Record<string, ConfiguredResponse>>;
  /** Response for unconfigured URLs. Default: { status: 404 } */
  readonly defaultResponse?: ConfiguredResponse;
}

function toBody(config: ConfiguredResponse): string | Uint8Array | AsyncIterable<Uint8Array> | null {
  const { body, bodyError } = config;
  if (!bodyError) {
    return body ?? null;
  }
  const firstChunk = typeof body === "string" ? new TextEncoder().encode(body) : body;
  return (async function* () {
    if (firstChunk) {
      yield firstChunk;
    }
    throw bodyError;
  })();
}

/**
 * Create a mock HttpClient answering from a URL → response table.
 *
 * @example
 * const httpClient = createMockHttpClient({
 *   responses: {
 *     "https://example.test/latest": { body: '{"tag_name":"0.28.2"}' },
 *     "https://example.test/down": { error: new TypeError("connection refused") },
 *   },
 * });
 * await service.run();
 * expect(httpClient.fetch).toHaveBeenCalledTimes(1);
 */
export function createMockHttpClient(options?: MockHttpClientOptions): MockHttpClient {
  const responses = options?.responses ?? {};
  const defaultResponse = options?.defaultResponse ?? { status: 404 };

  return {
    fetch: vi.fn(async (url: string): Promise<Response> => {
      const config = responses[url] ?? defaultResponse;
      if (config.error) {
        throw config.error;
      }
      return new Response(toBody(config), {
        status: config.status ?? 200,
        ...(config.headers && { headers: config.headers }),
      });
    }),
  };
}

// ============================================================================
// Test Server for Boundary Tests
// ============================================================================

/**
 * Route handler for test server.
 */
export type RouteHandler = (req: IncomingMessage, res: ServerResponse) => void;

/**
 * Test HTTP server for boundary tests.
 */
export interface TestServer {
  /** Get the port the server is listening on. Throws if not started. */
  getPort(): number;
  /** Start the server. Resolves when listening. */
  start(): Promise<void>;
  /** Stop the server, dropping open connections. Safe to call multiple times. */
  stop(): Promise<void>;
  /** Build URL for a given path. */
  url(path: string): string;
  /** Paths requested so far, in order */
  readonly requests: readonly string[];
}

/**
 * Create a test HTTP server for boundary tests.
 *
 * By default includes these routes:
 * - GET /json → 200, {"status": "ok"}
 * - GET /echo-headers → 200, returns request headers as JSON
 * - GET /timeout → Never responds (for timeout testing)
 * - GET /error/404 → 404 Not Found
 * - GET /error/500 → 500 Internal Server Error
 *
 * @param routes - Custom routes to add or override defaults
 */
export function createTestServer(routes?: Record<string, RouteHandler>): TestServer {
  let serverPort: number | null = null;
  let server: Server | null = null;
  const requests: string[] = [];

  const defaultRoutes: Record<string, RouteHandler> = {
    "/json": (_req, res) => {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "ok" }));
    },
    "/echo-headers": (req, res) => {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(req.headers));
    },
    "/timeout": () => {
      // Never responds - for timeout testing
    },
    "/error/404": (_req, res) => {
      res.writeHead(404, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "Not Found" }));
    },
    "/error/500": (_req, res) => {
      res.writeHead(500, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "Internal Server Error" }));
    },
  };

  const allRoutes = { ...defaultRoutes, ...routes };

  function requirePort(): number {
    if (serverPort === null) {
      throw new Error("Server not started - call start() first");
    }
    return serverPort;
  }

  return {
    get requests(): readonly string[] {
      return requests;
    },

    getPort(): number {
      return requirePort();
    },

    async start(): Promise<void> {
      if (server) return;

      const httpServer = createHttpServer((req, res) => {
        const path = req.url ?? "";
        requests.push(path);
        const handler = allRoutes[path];
        if (handler) {
          handler(req, res);
        } else {
          res.writeHead(404);
          res.end();
        }
      });
      server = httpServer;

      await new Promise<void>((resolve, reject) => {
        // Bind to 127.0.0.1 only (avoid IPv4/IPv6 resolution issues)
        httpServer.listen(0, "127.0.0.1", () => {
          const addr = httpServer.address();
          if (addr && typeof addr === "object") {
            serverPort = addr.port;
            resolve();
          } else {
            reject(new Error("Failed to get server address"));
          }
        });
        httpServer.on("error", reject);
      });
    },

    async stop(): Promise<void> {
      const httpServer = server;
      if (!httpServer) {
        return;
      }

      httpServer.closeAllConnections();
      await new Promise<void>((resolve) => {
        httpServer.close(() => resolve());
      });
      server = null;
      serverPort = null;
    },

    url(path: string): string {
      return `http://127.0.0.1:${requirePort()}${path}`;
    },
  };
}
