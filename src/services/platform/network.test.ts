/**
 * Tests for the network layer.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DefaultNetworkLayer, DEFAULT_USER_AGENT, discardBody } from "./network.js";
import { createMockLogger, type MockLogger } from "../logging/logging.test-utils.js";

function neverResolvingFetch(onAbort: () => void) {
  return async (_url: string | URL | Request, init?: RequestInit): Promise<Response> =>
    new Promise<Response>((_, reject) => {
      init?.signal?.addEventListener("abort", () => {
        onAbort();
        reject(new DOMException("Aborted", "AbortError"));
      });
    });
}

describe("DefaultNetworkLayer", () => {
  let logger: MockLogger;

  beforeEach(() => {
    logger = createMockLogger();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the response on success", async () => {
    vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(
      new Response(JSON.stringify({ status: "ok" }), { status: 200 })
    );
    const layer = new DefaultNetworkLayer(logger);

    const response = await layer.fetch("http://localhost:8080/test");

    expect(response.status).toBe(200);
    expect(logger.debug).toHaveBeenCalledWith("Fetch complete", {
      url: "http://localhost:8080/test",
      status: 200,
    });
  });

  it("sends the user agent and merges extra headers", async () => {
    const fetchSpy = vi.spyOn(globalThis, "fetch").mockResolvedValueOnce(new Response("ok"));
    const layer = new DefaultNetworkLayer(logger);

    await layer.fetch("http://localhost:8080/test", { headers: { Accept: "application/json" } });

    expect(fetchSpy).toHaveBeenCalledWith(
      "http://localhost:8080/test",
      expect.objectContaining({
        redirect: "follow",
        headers: { "User-Agent": DEFAULT_USER_AGENT, Accept: "application/json" },
      })
    );
  });

  it("aborts after the given timeout", async () => {
    let abortTriggered = false;
    vi.spyOn(globalThis, "fetch").mockImplementation(
      neverResolvingFetch(() => {
        abortTriggered = true;
      })
    );
    const layer = new DefaultNetworkLayer(logger);

    await expect(layer.fetch("http://localhost:8080/slow", { timeout: 20 })).rejects.toThrow(
      "Aborted"
    );
    expect(abortTriggered).toBe(true);
  });

  it("uses the configured default timeout", async () => {
    let abortTriggered = false;
    vi.spyOn(globalThis, "fetch").mockImplementation(
      neverResolvingFetch(() => {
        abortTriggered = true;
      })
    );
    const layer = new DefaultNetworkLayer(logger, { defaultTimeout: 20 });

    await expect(layer.fetch("http://localhost:8080/slow")).rejects.toThrow();
    expect(abortTriggered).toBe(true);
  });

  it("aborts immediately for a pre-aborted signal", async () => {
    let abortTriggered = false;
    vi.spyOn(globalThis, "fetch").mockImplementation(async (_url, init) => {
      abortTriggered = init?.signal?.aborted ?? false;
      throw new DOMException("Aborted", "AbortError");
    });
    const controller = new AbortController();
    controller.abort();
    const layer = new DefaultNetworkLayer(logger);

    await expect(
      layer.fetch("http://localhost:8080/test", { signal: controller.signal })
    ).rejects.toThrow();
    expect(abortTriggered).toBe(true);
  });

  it("logs and rethrows network errors", async () => {
    vi.spyOn(globalThis, "fetch").mockRejectedValueOnce(new TypeError("fetch failed"));
    const layer = new DefaultNetworkLayer(logger);

    await expect(layer.fetch("http://localhost:1/down")).rejects.toThrow(TypeError);
    expect(logger.warn).toHaveBeenCalledWith("Fetch failed", {
      url: "http://localhost:1/down",
      error: "fetch failed",
    });
  });
});

describe("discardBody", () => {
  function streamedResponse(onCancel: () => void, status = 500): Response {
    return new Response(new ReadableStream<Uint8Array>({ cancel: onCancel }), { status });
  }

  it("cancels an unread body", async () => {
    const onCancel = vi.fn();

    await discardBody(streamedResponse(onCancel), createMockLogger());

    expect(onCancel).toHaveBeenCalledTimes(1);
  });

  it("does nothing for a response without a body", async () => {
    const logger = createMockLogger();

    await discardBody(new Response(null, { status: 204 }), logger);

    expect(logger.debug).not.toHaveBeenCalled();
  });

  it("logs a failed cancel instead of throwing", async () => {
    const logger = createMockLogger();
    const response = streamedResponse(() => {
      throw new Error("socket gone");
    });

    await expect(discardBody(response, logger)).resolves.toBeUndefined();
    expect(logger.debug).toHaveBeenCalledWith("Failed to discard response body", {
      url: "",
      error: "socket gone",
    });
  });
});
