import type { z } from "zod";
import { TransportError, errorMessage } from "../errors";
import { withTimeout } from "../withTimeout";

const USER_AGENT = "album-trivia/0.1.0 +https://github.com/";

// Per request, body included
export const REQUEST_TIMEOUT_MS = 15_000;

export interface JsonRequestInit {
  method?: "GET" | "POST" | "HEAD";
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export interface JsonResponse {
  status: number;
  ok: boolean;
  body: unknown;
}

/**
 * Send a request and decode any JSON body. Network failures, timeouts and
 * undecodable bodies become TransportError; HTTP status is left to the
 * caller, since some APIs report "not found" with a non-2xx status.
 */
export async function requestJson(
  provider: string,
  url: string | URL,
  init: JsonRequestInit = {},
): Promise<JsonResponse> {
  const { timeoutMs = REQUEST_TIMEOUT_MS, ...requestInit } = init;
  const controller = new AbortController();

  let response: { status: number; ok: boolean; text: string };
  try {
    response = await withTimeout(
      fetch(url, {
        ...requestInit,
        signal: controller.signal,
        headers: {
          "User-Agent": USER_AGENT,
          Accept: "application/json",
          ...requestInit.headers,
        },
      }).then(async (res) => ({ status: res.status, ok: res.ok, text: await res.text() })),
      timeoutMs,
      "request",
      () => controller.abort(),
    );
  } catch (err) {
    throw new TransportError(provider, errorMessage(err), { cause: err });
  }

  const { text } = response;
  let body: unknown = null;
  if (text) {
    try {
      body = JSON.parse(text);
    } catch (err) {
      if (response.ok) {
        throw new TransportError(provider, "Response body is not JSON", {
          status: response.status,
          cause: err,
        });
      }
      body = text;
    }
  }
  return { status: response.status, ok: response.ok, body };
}

export function expectOk(provider: string, res: JsonResponse): void {
  if (res.ok) return;
  const detail = typeof res.body === "string" ? res.body : JSON.stringify(res.body);
  throw new TransportError(provider, `HTTP ${res.status} ${detail ?? ""}`.trim(), {
    status: res.status,
  });
}

export function parseBody<T>(provider: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new TransportError(provider, `Unexpected response shape: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}
