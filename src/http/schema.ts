/**
 * HTTP Module - Types
 */
import type { Result } from "neverthrow";

import type { HttpError } from "./errors.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/**
 * One JSON request against a device.
 */
export type HttpRequest = Readonly<{
  method: HttpMethod;
  url: string;
  body?: unknown;
  headers?: Readonly<Record<string, string>>;
  signal?: AbortSignal;
}>;

/**
 * Performs one request and returns the decoded JSON body (null for an
 * empty body) or a typed error carrying status and raw body.
 */
export type HttpClient = Readonly<{
  request: (request: HttpRequest) => Promise<Result<unknown, HttpError>>;
}>;

/**
 * Version header of the device's local API.
 */
export const API_VERSION_HEADERS = { "X-Api-Version": "2" } as const;
