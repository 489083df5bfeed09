/**
 * Network layer interface and implementation.
 *
 * Provides a focused, injectable HTTP client so services can be unit tested
 * with a mock and boundary tested against a local server.
 */

import type { Logger } from "../logging";

// ============================================================================
// HTTP Client Interface
// ============================================================================

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /**
   * Timeout in milliseconds. Default: 5000.
   * Covers the whole exchange, including reading the response body.
   */
  readonly timeout?: number;
  /** External abort signal to cancel the request */
  readonly signal?: AbortSignal;
  /** Request headers */
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * HTTP client for making fetch requests with timeout support.
 */
export interface HttpClient {
  /**
   * HTTP GET request with timeout support. Redirects are followed.
   *
   * @param url - URL to fetch
   * @param options - Request options
   * @returns Response object
   * @throws DOMException with name "TimeoutError" on timeout, "AbortError" on abort
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const response = await httpClient.fetch('https://api.github.com/repos/apple/pkl/releases/latest', {
   *   timeout: 10000,
   *   headers: { Accept: 'application/vnd.github.v3+json' },
   * });
   * if (response.ok) {
   *   const data = await response.json();
   * }
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<Response>;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Configuration for DefaultNetworkLayer.
 */
export interface NetworkLayerConfig {
  /** Default timeout for HTTP requests in ms. Default: 5000 */
  readonly defaultTimeout?: number;
}

/**
 * Describe a fetch failure in one line.
 * Node's fetch reports connection problems as "fetch failed" with the real
 * reason in `cause`, so the cause is appended when present.
 */
export function describeFetchError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.name === "TimeoutError") {
    return "request timed out";
  }
  if (error.cause instanceof Error && error.cause.message !== error.message) {
    return `${error.message}: ${error.cause.message}`;
  }
  return error.message;
}

// ============================================================================
// Default Implementation
// ============================================================================

/**
 * Default implementation of HttpClient using the global fetch.
 */
export class DefaultNetworkLayer implements HttpClient {
  private readonly config: Required<NetworkLayerConfig>;
  private readonly logger: Logger;

  constructor(logger: Logger, config: NetworkLayerConfig = {}) {
    this.logger = logger;
    this.config = {
      defaultTimeout: config.defaultTimeout ?? 5000,
    };
  }

  async fetch(url: string, options?: HttpRequestOptions): Promise<Response> {
    const timeout = options?.timeout ?? this.config.defaultTimeout;

    // The timeout signal stays armed after the headers arrive, so a stalled
    // body read is aborted as well.
    const signals = [AbortSignal.timeout(timeout)];
    if (options?.signal) {
      signals.push(options.signal);
    }

    this.logger.debug("Fetch", { url, method: "GET", timeout });

    try {
      const response = await fetch(url, {
        signal: AbortSignal.any(signals),
        ...(options?.headers && { headers: options.headers }),
      });
      this.logger.debug("Fetch complete", { url, status: response.status });
      return response;
    } catch (error) {
      this.logger.warn("Fetch failed", { url, error: describeFetchError(error) });
      throw error;
    }
  }
}
