/**
 * Behavioral mock for HttpClient.
 *
 * Provides:
 * - Request history tracking through `mock.$.requests`
 * - Response configuration per URL
 * - Network error simulation
 */

import type { HttpClient, HttpRequestOptions } from "./network.js";

/** Record of an HTTP request made through the mock. */
export interface HttpRequestRecord {
  readonly url: string;
  readonly options?: HttpRequestOptions;
}

/**
 * Response configuration - stores DATA, not Response objects.
 * A fresh Response is constructed on each fetch() call.
 */
export interface ConfiguredResponse {
  readonly body?: string | Uint8Array;
  /** Default: 200 */
  readonly status?: number;
  readonly headers?: Record<string, string>;
  /** Throw this instead of returning a response */
  readonly error?: Error;
  /** Deliver the first `afterBytes` bytes of the body, then fail with `error` */
  readonly streamError?: { readonly afterBytes: number; readonly error: Error };
}

/** Mock state - pure data. */
export interface HttpClientMockState {
  readonly requests: readonly HttpRequestRecord[];
  readonly networkError: Error | null;
}

export type MockHttpClient = HttpClient & {
  readonly $: HttpClientMockState;
  setResponse(url: string, config: ConfiguredResponse): void;
  simulateNetworkDown(): void;
  simulateNetworkUp(): void;
};

export interface MockHttpClientOptions {
  /** Pre-configured responses by exact URL. */
  responses?: Record<string, ConfiguredResponse>;
  /** Default for unconfigured URLs. Default: { status: 404 } */
  defaultResponse?: ConfiguredResponse;
}

function toBytes(body: string | Uint8Array): Uint8Array {
  return typeof body === "string" ? new TextEncoder().encode(body) : body;
}

/**
 * Body stream that delivers `afterBytes` bytes and then errors, like a
 * connection dropped mid-download.
 */
function failingStream(body: Uint8Array, afterBytes: number, error: Error): ReadableStream<Uint8Array> {
  let sent = false;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (!sent) {
        sent = true;
        controller.enqueue(body.slice(0, afterBytes));
        return;
      }
      controller.error(error);
    },
  });
}

/**
 * Create a behavioral mock HttpClient for testing.
 *
 * @example Configure responses per URL
 * const httpClient = createMockHttpClient({
 *   responses: {
 *     "https://api.github.com/repos/o/r/releases/latest": { body: '{"assets":[]}' },
 *   },
 * });
 *
 * @example Simulate network down
 * const mock = createMockHttpClient();
 * mock.simulateNetworkDown();
 * await mock.fetch("http://example.com"); // throws Error
 *
 * @example Check request history
 * await mock.fetch("http://example.com/api");
 * expect(mock.$.requests.map((r) => r.url)).toEqual(["http://example.com/api"]);
 */
export function createMockHttpClient(options?: MockHttpClientOptions): MockHttpClient {
  const requests: HttpRequestRecord[] = [];
  const responses = new Map<string, ConfiguredResponse>(
    options?.responses ? Object.entries(options.responses) : []
  );
  let networkError: Error | null = null;

  const defaultResponse: ConfiguredResponse = options?.defaultResponse ?? { status: 404 };

  const state: HttpClientMockState = {
    get requests(): readonly HttpRequestRecord[] {
      return requests;
    },
    get networkError(): Error | null {
      return networkError;
    },
  };

  return {
    $: state,

    async fetch(url: string, fetchOptions?: HttpRequestOptions): Promise<Response> {
      requests.push(fetchOptions === undefined ? { url } : { url, options: fetchOptions });

      if (networkError) {
        throw networkError;
      }
      if (fetchOptions?.signal?.aborted) {
        throw new DOMException("The operation was aborted.", "AbortError");
      }

      const config = responses.get(url) ?? defaultResponse;
      if (config.error) {
        throw config.error;
      }

      const init: ResponseInit = { status: config.status ?? 200 };
      const withHeaders: ResponseInit =
        config.headers !== undefined ? { ...init, headers: config.headers } : init;

      if (config.body === undefined) {
        return new Response(null, withHeaders);
      }
      const bytes = toBytes(config.body);
      if (config.streamError) {
        const { afterBytes, error } = config.streamError;
        return new Response(failingStream(bytes, afterBytes, error), withHeaders);
      }
      return new Response(bytes, withHeaders);
    },

    setResponse(url: string, config: ConfiguredResponse): void {
      responses.set(url, config);
    },

    simulateNetworkDown(): void {
      networkError = new TypeError("fetch failed");
    },

    simulateNetworkUp(): void {
      networkError = null;
    },
  };
}
