/**
 * Network layer interface and implementation.
 *
 * HttpClient is the only way installer services reach the network, so tests
 * can swap in an in-process fake.
 */

import type { Logger } from "../logging/index.js";

/**
 * Options for HTTP requests.
 */
export interface HttpRequestOptions {
  /** Timeout in milliseconds. Default: the layer's defaultTimeout */
  readonly timeout?: number;
  /** External abort signal to cancel the request */
  readonly signal?: AbortSignal;
  /** Extra request headers */
  readonly headers?: Readonly<Record<string, string>>;
}

/**
 * HTTP client for making fetch requests with timeout support.
 */
export interface HttpClient {
  /**
   * HTTP GET request with timeout support.
   *
   * The timeout covers the whole exchange, including reading the body, so
   * streaming consumers must finish before it elapses.
   *
   * @returns Response object
   * @throws DOMException with name "AbortError" on timeout or abort
   * @throws TypeError on network error (connection refused, DNS failure)
   *
   * @example
   * const response = await httpClient.fetch(url, {
   *   timeout: 10000,
   *   headers: { Accept: "application/json" },
   * });
   * if (response.ok) {
   *   const data: unknown = await response.json();
   * }
   */
  fetch(url: string, options?: HttpRequestOptions): Promise<Response>;
}

/**
 * Configuration for DefaultNetworkLayer.
 */
export interface NetworkLayerConfig {
  /** Default timeout for HTTP requests in ms. Default: 30000 */
  readonly defaultTimeout?: number;
  /** User-Agent header sent with every request */
  readonly userAgent?: string;
}

export const DEFAULT_USER_AGENT = "jdk-installer";

/**
 * Default implementation of HttpClient on the global fetch.
 */
export class DefaultNetworkLayer implements HttpClient {
  private readonly config: Required<NetworkLayerConfig>;

  constructor(
    private readonly logger: Logger,
    config: NetworkLayerConfig = {}
  ) {
    this.config = {
      defaultTimeout: config.defaultTimeout ?? 30000,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    };
  }

  async fetch(url: string, options?: HttpRequestOptions): Promise<Response> {
    const timeout = options?.timeout ?? this.config.defaultTimeout;
    const externalSignal = options?.signal;

    this.logger.debug("Fetch", { url, method: "GET", timeout });

    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    }, timeout);
    // Left running after headers arrive so body reads stay bounded
    timeoutId.unref();

    const onExternalAbort = (): void => {
      if (!controller.signal.aborted) {
        controller.abort();
      }
    };

    if (externalSignal) {
      if (externalSignal.aborted) {
        controller.abort();
      } else {
        externalSignal.addEventListener("abort", onExternalAbort);
      }
    }

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        redirect: "follow",
        headers: { "User-Agent": this.config.userAgent, ...options?.headers },
      });
      this.logger.debug("Fetch complete", { url, status: response.status });
      return response;
    } catch (error) {
      clearTimeout(timeoutId);
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.warn("Fetch failed", { url, error: errorMessage });
      throw error;
    } finally {
      if (externalSignal) {
        externalSignal.removeEventListener("abort", onExternalAbort);
      }
    }
  }
}

/**
 * Cancel an unread response body so its connection is released.
 * A failed cancel is logged and does not replace the caller's error.
 */
export async function discardBody(response: Response, logger: Logger): Promise<void> {
  if (response.body === null || response.bodyUsed) {
    return;
  }
  try {
    await response.body.cancel();
  } catch (error) {
    logger.debug("Failed to discard response body", {
      url: response.url,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
