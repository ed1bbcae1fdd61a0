/**
 * Release resolution against the GitHub releases API.
 */

import { z } from "zod";
import { minimatch } from "minimatch";
import { ResolutionError, getErrorMessage } from "../errors.js";
import { discardBody, type HttpClient } from "../platform/network.js";
import type { Logger } from "../logging/index.js";
import type { ReleaseAsset } from "./types.js";

export const DEFAULT_API_BASE_URL = "https://api.github.com";

/**
 * Finds the download URL of the newest release asset matching a pattern.
 */
export interface ReleaseResolver {
  /**
   * @param repository - owner/name
   * @param assetPattern - glob matched case-insensitively against asset names
   * @returns Download URL of the matching asset
   * @throws ResolutionError when the listing is unreachable, malformed, or has no match
   */
  resolveLatest(repository: string, assetPattern: string): Promise<string>;
}

export interface GitHubReleaseResolverOptions {
  /** API root, without trailing slash. Default: https://api.github.com */
  readonly apiBaseUrl?: string;
  /** Request timeout in ms. Default: 30000 */
  readonly timeoutMs?: number;
  /** Sent as a bearer token when set */
  readonly token?: string;
}

const ReleaseAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string().url(),
});

/**
 * A release object, or a bare asset list.
 */
const ReleaseListingSchema = z.union([
  z.object({
    tag_name: z.string().optional(),
    assets: z.array(ReleaseAssetSchema),
  }),
  z.array(ReleaseAssetSchema),
]);

/**
 * Pick the asset whose name matches the glob.
 * Several matches resolve to the lexicographically first name.
 *
 * @returns The chosen asset, or undefined when nothing matches
 */
export function selectAsset(
  assets: readonly ReleaseAsset[],
  assetPattern: string,
  logger?: Logger
): ReleaseAsset | undefined {
  const matches = assets
    .filter((asset) => minimatch(asset.name, assetPattern, { nocase: true }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  if (matches.length > 1) {
    logger?.warn("Several assets match, using the first", {
      pattern: assetPattern,
      candidates: matches.map((asset) => asset.name).join(","),
    });
  }
  return matches[0];
}

/**
 * ReleaseResolver that reads `GET /repos/{repository}/releases/latest`.
 */
export class GitHubReleaseResolver implements ReleaseResolver {
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly httpClient: HttpClient,
    private readonly logger: Logger,
    private readonly options: GitHubReleaseResolverOptions = {}
  ) {
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async resolveLatest(repository: string, assetPattern: string): Promise<string> {
    const url = `${this.apiBaseUrl}/repos/${repository}/releases/latest`;
    this.logger.debug("Querying latest release", { repository, url });

    const body = await this.fetchListing(url);
    const parsed = ReleaseListingSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ResolutionError(`Malformed release listing from ${url}: ${issues}`);
    }

    const listing = parsed.data;
    const rawAssets = Array.isArray(listing) ? listing : listing.assets;
    const assets: ReleaseAsset[] = rawAssets.map((asset) => ({
      name: asset.name,
      downloadUrl: asset.browser_download_url,
    }));

    const asset = selectAsset(assets, assetPattern, this.logger);
    if (!asset) {
      throw new ResolutionError(
        `No asset matching ${assetPattern} in the latest release of ${repository}`
      );
    }

    this.logger.info("Resolved release asset", {
      repository,
      tag: Array.isArray(listing) ? null : (listing.tag_name ?? null),
      asset: asset.name,
    });
    return asset.downloadUrl;
  }

  private async fetchListing(url: string): Promise<unknown> {
    const headers: Record<string, string> = { Accept: "application/vnd.github+json" };
    if (this.options.token) {
      headers.Authorization = `Bearer ${this.options.token}`;
    }

    let response: Response;
    try {
      response = await this.httpClient.fetch(url, { timeout: this.timeoutMs, headers });
    } catch (error) {
      throw new ResolutionError(`Failed to reach ${url}: ${getErrorMessage(error)}`);
    }

    if (!response.ok) {
      await discardBody(response, this.logger);
      throw new ResolutionError(`HTTP ${response.status} from ${url}`);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new ResolutionError(`Failed to read response from ${url}: ${getErrorMessage(error)}`);
    }

    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      throw new ResolutionError(`Malformed release listing from ${url}: ${getErrorMessage(error)}`);
    }
  }
}
