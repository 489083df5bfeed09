/**
 * Tests for GitHubReleaseLocator.
 */

import { describe, it, expect } from "vitest";
import { GitHubReleaseLocator } from "./release-locator";
import { ProvisionError } from "../errors";
import { DEFAULT_RELEASE_INDEX_URL } from "../config/types";
import { createMockHttpClient, type ConfiguredResponse } from "../platform/network.test-utils";
import { SILENT_LOGGER } from "../logging";

const RELEASE_URL = "https://api.github.com/repos/apple/pkl/releases/latest";

function createLocator(response: ConfiguredResponse, token?: string) {
  const httpClient = createMockHttpClient({ responses: { [RELEASE_URL]: response } });
  const locator = new GitHubReleaseLocator({ httpClient, logger: SILENT_LOGGER, token: token ?? null });
  return { locator, httpClient };
}

describe("GitHubReleaseLocator", () => {
  it("targets the apple/pkl latest release by default", () => {
    expect(DEFAULT_RELEASE_INDEX_URL).toBe(RELEASE_URL);
  });

  it("returns the tag of the latest release", async () => {
    const { locator, httpClient } = createLocator({
      body: JSON.stringify({ tag_name: "0.28.2", name: "0.28.2", draft: false }),
    });

    await expect(locator.latestVersion()).resolves.toBe("0.28.2");
    expect(httpClient.fetch).toHaveBeenCalledTimes(1);
    expect(httpClient.fetch).toHaveBeenCalledWith(RELEASE_URL, {
      timeout: 10000,
      headers: { Accept: "application/vnd.github.v3+json" },
    });
  });

  it("sends the token as a bearer credential", async () => {
    const { locator, httpClient } = createLocator({ body: '{"tag_name":"0.28.2"}' }, "test-token");

    await locator.latestVersion();

    expect(httpClient.fetch).toHaveBeenCalledWith(RELEASE_URL, {
      timeout: 10000,
      headers: { Accept: "application/vnd.github.v3+json", Authorization: "Bearer test-token" },
    });
  });

  it("uses a custom endpoint and timeout", async () => {
    const httpClient = createMockHttpClient({
      responses: { "http://127.0.0.1:8080/latest": { body: '{"tag_name":"0.27.0"}' } },
    });
    const locator = new GitHubReleaseLocator({
      httpClient,
      logger: SILENT_LOGGER,
      url: "http://127.0.0.1:8080/latest",
      timeoutMs: 250,
    });

    await expect(locator.latestVersion()).resolves.toBe("0.27.0");
    expect(httpClient.fetch).toHaveBeenCalledWith("http://127.0.0.1:8080/latest", {
      timeout: 250,
      headers: { Accept: "application/vnd.github.v3+json" },
    });
  });

  describe("failures", () => {
    it("reports a non-success status with its code", async () => {
      const { locator } = createLocator({ status: 503, body: "unavailable" });

      const error = await locator.latestVersion().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProvisionError);
      expect(error).toMatchObject({
        message: "failed to fetch latest release: status code 503",
        errorCode: "BAD_STATUS",
        status: 503,
      });
    });

    it("reports transport errors with their cause", async () => {
      const { locator } = createLocator({
        error: new TypeError("fetch failed", { cause: new Error("getaddrinfo ENOTFOUND api.github.com") }),
      });

      await expect(locator.latestVersion()).rejects.toMatchObject({
        message: "failed to fetch latest release: fetch failed: getaddrinfo ENOTFOUND api.github.com",
        errorCode: "NETWORK_ERROR",
      });
    });

    it("reports a timeout as a network error", async () => {
      const { locator } = createLocator({
        error: new DOMException("The operation was aborted due to timeout", "TimeoutError"),
      });

      await expect(locator.latestVersion()).rejects.toMatchObject({
        message: "failed to fetch latest release: request timed out",
        errorCode: "NETWORK_ERROR",
      });
    });

    it("reports a failed body read as a network error", async () => {
      const { locator } = createLocator({ body: '{"tag_', bodyError: new Error("connection reset") });

      await expect(locator.latestVersion()).rejects.toMatchObject({
        message: "failed to fetch latest release: connection reset",
        errorCode: "NETWORK_ERROR",
      });
    });

    it("reports malformed JSON as a parse error", async () => {
      const { locator } = createLocator({ body: "<html>rate limited</html>" });

      const error = await locator.latestVersion().catch((e: unknown) => e);

      expect(error).toMatchObject({ errorCode: "PARSE_ERROR" });
      expect(error).toHaveProperty("message", expect.stringMatching(/^failed to parse release data: /));
    });

    it.each([
      ["{}", "tag_name: Required"],
      ['{"tag_name": ""}', "tag_name: String must contain at least 1 character(s)"],
      ['{"tag_name": 28}', "tag_name: Expected string, received number"],
      ["[]", "Expected object, received array"],
      ["null", "Expected object, received null"],
    ])("rejects %s", async (body, detail) => {
      const { locator } = createLocator({ body });

      await expect(locator.latestVersion()).rejects.toMatchObject({
        message: `failed to parse release data: ${detail}`,
        errorCode: "PARSE_ERROR",
      });
    });
  });
});
