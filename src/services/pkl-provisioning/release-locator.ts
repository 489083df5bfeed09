/**
 * Latest-release lookup against the GitHub releases API.
 */

import { z } from "zod";
import type { HttpClient } from "../platform/network";
import { describeFetchError } from "../platform/network";
import type { Logger } from "../logging";
import { ProvisionError, getErrorMessage } from "../errors";
import { formatValidationIssues } from "../../shared/error-utils";
import { DEFAULT_RELEASE_INDEX_URL, DEFAULT_REQUEST_TIMEOUT_MS } from "../config/types";
import type { ReleaseLocator, ReleaseVersion } from "./types";

const releaseSchema = z.object({
  tag_name: z.string().min(1),
});

/**
 * Dependencies for GitHubReleaseLocator.
 */
export interface GitHubReleaseLocatorDeps {
  readonly httpClient: HttpClient;
  readonly logger: Logger;
  /** Release index endpoint. Default: apple/pkl latest release */
  readonly url?: string;
  /** Default: 10000 */
  readonly timeoutMs?: number;
  /** Sent as a bearer token when set */
  readonly token?: string | null;
}

/**
 * Reads the tag of the latest release. One request, no retries.
 */
export class GitHubReleaseLocator implements ReleaseLocator {
  private readonly httpClient: HttpClient;
  private readonly logger: Logger;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly headers: Readonly<Record<string, string>>;

  constructor(deps: GitHubReleaseLocatorDeps) {
    this.httpClient = deps.httpClient;
    this.logger = deps.logger;
    this.url = deps.url ?? DEFAULT_RELEASE_INDEX_URL;
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.headers = {
      Accept: "application/vnd.github.v3+json",
      ...(deps.token && { Authorization: `Bearer ${deps.token}` }),
    };
  }

  async latestVersion(): Promise<ReleaseVersion> {
    this.logger.debug("Fetching latest release", { url: this.url });

    let body: string;
    try {
      const response = await this.httpClient.fetch(this.url, {
        timeout: this.timeoutMs,
        headers: this.headers,
      });
      if (!response.ok) {
        await response.body?.cancel();
        throw new ProvisionError(`failed to fetch latest release: status code ${response.status}`, "BAD_STATUS", {
          status: response.status,
        });
      }
      body = await response.text();
    } catch (error) {
      if (error instanceof ProvisionError) {
        throw error;
      }
      throw new ProvisionError(`failed to fetch latest release: ${describeFetchError(error)}`, "NETWORK_ERROR", {
        cause: error,
      });
    }

    const version = this.parse(body);
    this.logger.info("Latest release", { version });
    return version;
  }

  private parse(body: string): ReleaseVersion {
    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (error) {
      throw new ProvisionError(`failed to parse release data: ${getErrorMessage(error)}`, "PARSE_ERROR", {
        cause: error,
      });
    }

    const result = releaseSchema.safeParse(data);
    if (!result.success) {
      throw new ProvisionError(
        `failed to parse release data: ${formatValidationIssues(result.error.issues)}`,
        "PARSE_ERROR"
      );
    }
    return result.data.tag_name;
  }
}
