import { setTimeout as delay } from "node:timers/promises";
import { AuthorizationError } from "../core/errors.js";

export interface FetchInit {
  headers: Record<string, string>;
  signal: AbortSignal;
}

export interface FetchResponseLike {
  status: number;
  json: () => Promise<unknown>;
}

export type FetchLike = (input: string, init: FetchInit) => Promise<FetchResponseLike>;

export const defaultFetch: FetchLike = (input, init) => fetch(input, init);

export interface OutboundOptions {
  label: string;
  signal: AbortSignal;
  retries: number;
  backoffMs: number;
  headers?: Record<string, string> | undefined;
}

export interface OutboundResponse {
  status: number;
  body: unknown;
}

function timeoutError(label: string): AuthorizationError {
  return new AuthorizationError("timeout", `Timed out waiting for ${label}.`);
}

function throwIfAborted(signal: AbortSignal, label: string): void {
  if (signal.aborted) {
    throw timeoutError(label);
  }
}

async function backoff(ms: number, signal: AbortSignal, label: string): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch {
    throw timeoutError(label);
  }
}

/**
 * GET a JSON document. Network failures and 5xx responses are retried with
 * linear backoff; an aborted signal ends the call at once as a timeout. Any
 * other status is handed back for the caller to interpret.
 */
export async function fetchJson(fetchFn: FetchLike, url: string, options: OutboundOptions): Promise<OutboundResponse> {
  let lastError = "no attempt made";
  for (let attempt = 0; attempt <= options.retries; attempt += 1) {
    if (attempt > 0) {
      await backoff(options.backoffMs * attempt, options.signal, options.label);
    }
    throwIfAborted(options.signal, options.label);

    let response: FetchResponseLike;
    try {
      response = await fetchFn(url, { headers: options.headers ?? {}, signal: options.signal });
    } catch (error) {
      throwIfAborted(options.signal, options.label);
      lastError = error instanceof Error ? error.message : String(error);
      continue;
    }

    if (response.status >= 500) {
      lastError = `HTTP ${response.status}`;
      continue;
    }

    let body: unknown = null;
    try {
      body = await response.json();
    } catch (error) {
      throwIfAborted(options.signal, options.label);
      body = { parseError: error instanceof Error ? error.message : String(error) };
    }
    return { status: response.status, body };
  }

  throw new AuthorizationError(
    "service_unavailable",
    `${options.label} is unavailable (${options.retries + 1} attempts, last error: ${lastError}).`
  );
}

export interface DeadlineSignal {
  signal: AbortSignal;
  dispose: () => void;
}

/** Abort when either the parent aborts or `timeoutMs` elapses. */
export function deadlineSignal(parent: AbortSignal | undefined, timeoutMs: number): DeadlineSignal {
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`Deadline of ${timeoutMs}ms exceeded.`));
  }, timeoutMs);
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  };
}
