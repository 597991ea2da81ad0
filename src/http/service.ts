/**
 * HTTP Module - Service Layer
 *
 * JSON over HTTPS to local devices. Devices present self-signed
 * certificates, so the dispatcher skips certificate verification.
 */
import { type Result, err, ok } from "neverthrow";
import { Agent, fetch } from "undici";

import { createLogger } from "../logger.js";
import type { HttpError } from "./errors.js";
import {
  aborted,
  httpStatus,
  invalidResponse,
  networkError,
  timeout,
} from "./errors.js";
import type { HttpClient, HttpRequest } from "./schema.js";

const log = createLogger("http");

export type HttpClientOptions = Readonly<{
  timeoutMs: number;
}>;

/**
 * Create an HttpClient backed by undici.
 */
export function createHttpClient(options: HttpClientOptions): HttpClient {
  const dispatcher = new Agent({
    connect: { rejectUnauthorized: false },
  });

  async function request(
    req: HttpRequest,
  ): Promise<Result<unknown, HttpError>> {
    const timeoutSignal = AbortSignal.timeout(options.timeoutMs);
    const signal = req.signal
      ? AbortSignal.any([req.signal, timeoutSignal])
      : timeoutSignal;

    const headers: Record<string, string> = {
      Accept: "application/json",
      ...req.headers,
    };
    if (req.body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    log.debug({ method: req.method, url: req.url }, "Sending request...");

    try {
      const response = await fetch(req.url, {
        method: req.method,
        headers,
        body: req.body === undefined ? null : JSON.stringify(req.body),
        signal,
        dispatcher,
      });

      const text = await response.text();

      if (!response.ok) {
        log.debug(
          { method: req.method, url: req.url, status: response.status },
          "Request rejected",
        );
        return err(httpStatus(response.status, text));
      }

      if (text.trim() === "") {
        return ok(null);
      }

      try {
        const data: unknown = JSON.parse(text);
        return ok(data);
      } catch {
        return err(invalidResponse("Response body is not JSON", text));
      }
    } catch (error) {
      if (req.signal?.aborted) {
        return err(aborted());
      }

      const cause = error instanceof Error ? error : new Error(String(error));

      if (cause.name === "TimeoutError" || cause.name === "AbortError") {
        return err(timeout(options.timeoutMs));
      }

      return err(networkError(`Failed to reach ${req.url}`, cause));
    }
  }

  return { request };
}
