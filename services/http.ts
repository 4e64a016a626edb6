// services/http.ts
import fetch, { RequestInit, Response } from "node-fetch";
import { ImporterError } from "./errors.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export interface HttpResult {
  status: number;
  body: unknown;
  text: string;
}

export interface RequestOptions {
  service: string;
  timeoutMs: number;
  unavailable: "SupplierUnavailable" | "DestinationUnavailable";
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * One bounded HTTP call. Network errors, timeouts and 5xx answers become
 * the `unavailable` error kind; every other status is returned to the caller.
 */
export async function sendRequest(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit,
  options: RequestOptions
): Promise<HttpResult> {
  let res: Response;
  let text: string;
  try {
    res = await fetchImpl(url, { ...init, timeout: options.timeoutMs });
    text = await res.text();
  } catch (err) {
    throw new ImporterError(
      options.unavailable,
      `${options.service} request failed: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }

  if (res.status >= 500) {
    throw new ImporterError(
      options.unavailable,
      `${options.service} responded with ${res.status}: ${preview(text)}`
    );
  }

  return { status: res.status, body: parseBody(text), text };
}

export function preview(text: string, max = 300): string {
  return text.length > max ? text.slice(0, max) + "…" : text;
}
