import { vi } from "vitest";
import type { RawResponse, Verb } from "../types.js";

/**
 * Response-shaped object with a readable body and hand-set headers,
 * Set-Cookie included.
 */
export function fakeResponse(
  status: number,
  statusText: string,
  body: unknown,
  headers: Record<string, string> = {},
): Response {
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    headers: new Headers(headers),
    text: async () => text,
  } as unknown as Response;
}

/** Replace globalThis.fetch with a mock that answers from a queue. */
export function queueFetch(...responses: Response[]) {
  const fn = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => {
    const next = responses.shift();
    if (!next) throw new Error("unexpected fetch");
    return next;
  });
  globalThis.fetch = fn as typeof fetch;
  return fn;
}

export function raw(returnCode: number, message: string, extra: Partial<RawResponse> = {}, method: Verb = "GET"): RawResponse {
  return {
    returnCode,
    message,
    data: {},
    method,
    requestPath: "https://192.0.2.10/test",
    ...extra,
  };
}
