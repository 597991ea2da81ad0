/**
 * HTTP Service Tests
 *
 * undici is mocked at the module boundary; no sockets are opened.
 */
import { beforeEach, describe, expect, test, vi } from "vitest";

const fetchMock = vi.fn();

vi.mock("undici", () => ({
  Agent: vi.fn(),
  fetch: (...args: unknown[]) => fetchMock(...args),
}));

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { createHttpClient } from "../service.js";

function response(status: number, body: string) {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  };
}

describe("HTTP Service", () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  test("returns the decoded JSON body on success", async () => {
    fetchMock.mockResolvedValue(response(200, '{"token":"abc"}'));
    const client = createHttpClient({ timeoutMs: 1000 });

    const result = await client.request({
      method: "POST",
      url: "https://10.0.0.5/api/user",
      body: { name: "local/test" },
      headers: { "X-Api-Version": "2" },
    });

    expect(result._unsafeUnwrap()).toEqual({ token: "abc" });
  });

  test("sends JSON body with content type and custom headers", async () => {
    fetchMock.mockResolvedValue(response(200, "{}"));
    const client = createHttpClient({ timeoutMs: 1000 });

    await client.request({
      method: "PUT",
      url: "https://10.0.0.5/api/batteries",
      body: { mode: "zero" },
      headers: { "X-Api-Version": "2" },
    });

    expect(fetchMock).toHaveBeenCalledWith(
      "https://10.0.0.5/api/batteries",
      expect.objectContaining({
        method: "PUT",
        body: '{"mode":"zero"}',
        headers: {
          Accept: "application/json",
          "X-Api-Version": "2",
          "Content-Type": "application/json",
        },
      }),
    );
  });

  test("sends no body for GET requests", async () => {
    fetchMock.mockResolvedValue(response(200, "{}"));
    const client = createHttpClient({ timeoutMs: 1000 });

    await client.request({ method: "GET", url: "https://10.0.0.5/api" });

    expect(fetchMock).toHaveBeenCalledWith(
      "https://10.0.0.5/api",
      expect.objectContaining({
        body: null,
        headers: { Accept: "application/json" },
      }),
    );
  });

  test("returns HTTP_STATUS with status and raw body on rejection", async () => {
    fetchMock.mockResolvedValue(
      response(403, '{"error":"user:creation-not-enabled"}'),
    );
    const client = createHttpClient({ timeoutMs: 1000 });

    const result = await client.request({
      method: "POST",
      url: "https://10.0.0.5/api/user",
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "HTTP_STATUS",
      message: 'HTTP 403: {"error":"user:creation-not-enabled"}',
      status: 403,
      body: '{"error":"user:creation-not-enabled"}',
    });
  });

  test("returns null for an empty success body", async () => {
    fetchMock.mockResolvedValue(response(204, ""));
    const client = createHttpClient({ timeoutMs: 1000 });

    const result = await client.request({
      method: "PUT",
      url: "https://10.0.0.5/api/batteries",
    });

    expect(result._unsafeUnwrap()).toBeNull();
  });

  test("returns INVALID_RESPONSE for a non-JSON body", async () => {
    fetchMock.mockResolvedValue(response(200, "<html>"));
    const client = createHttpClient({ timeoutMs: 1000 });

    const result = await client.request({
      method: "GET",
      url: "https://10.0.0.5/api",
    });

    expect(result._unsafeUnwrapErr().type).toBe("INVALID_RESPONSE");
  });

  test("maps a timeout to TIMEOUT", async () => {
    const timeoutError = new Error("The operation was aborted due to timeout");
    timeoutError.name = "TimeoutError";
    fetchMock.mockRejectedValue(timeoutError);
    const client = createHttpClient({ timeoutMs: 1500 });

    const result = await client.request({
      method: "GET",
      url: "https://10.0.0.5/api",
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "TIMEOUT",
      message: "Request timed out after 1500ms",
      timeoutMs: 1500,
    });
  });

  test("maps a caller cancellation to ABORTED", async () => {
    const controller = new AbortController();
    controller.abort();
    const abortError = new Error("This operation was aborted");
    abortError.name = "AbortError";
    fetchMock.mockRejectedValue(abortError);
    const client = createHttpClient({ timeoutMs: 1000 });

    const result = await client.request({
      method: "GET",
      url: "https://10.0.0.5/api",
      signal: controller.signal,
    });

    expect(result._unsafeUnwrapErr().type).toBe("ABORTED");
  });

  test("maps connection failures to NETWORK_ERROR", async () => {
    fetchMock.mockRejectedValue(new Error("connect ECONNREFUSED"));
    const client = createHttpClient({ timeoutMs: 1000 });

    const result = await client.request({
      method: "GET",
      url: "https://10.0.0.5/api",
    });

    const error = result._unsafeUnwrapErr();
    expect(error.type).toBe("NETWORK_ERROR");
    expect(error.message).toBe("Failed to reach https://10.0.0.5/api");
  });
});
