/**
 * Upstream HTTP plumbing shared by the provider adapters:
 * timeout + client-abort wiring and normalized upstream failures.
 */

import { GatewayError, UpstreamProviderError } from "../errors.js";
import type { ReadGuard } from "./sse.js";

export interface UpstreamRequest {
  provider: string;
  model: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface UpstreamCall {
  response: Response;
  /**
   * Bounds one body read by `timeoutMs` of idle time and by client abort.
   * Streaming calls pass it to `readSSE`.
   */
  guardRead: ReadGuard;
  /** Releases the timer and the client-abort listener. */
  done(): void;
  /** Maps an error raised while consuming the body to a normalized one. */
  toError(error: unknown): unknown;
}

function readErrorMessage(body: unknown): string | null {
  if (typeof body !== "object" || body === null) {
    return null;
  }
  if ("error" in body) {
    const nested = body.error;
    if (typeof nested === "string") {
      return nested;
    }
    if (typeof nested === "object" && nested !== null && "message" in nested && typeof nested.message === "string") {
      return nested.message;
    }
  }
  if ("message" in body && typeof body.message === "string") {
    return body.message;
  }
  return null;
}

async function upstreamFailure(response: Response, request: UpstreamRequest): Promise<UpstreamProviderError> {
  const text = await response.text();
  let message: string | null = null;
  try {
    message = readErrorMessage(JSON.parse(text));
  } catch {
    message = text.trim() ? text.trim().slice(0, 500) : null;
  }
  return new UpstreamProviderError(message ?? `Provider returned error: ${response.status}`, {
    provider: request.provider,
    model: request.model,
    status: response.status,
  });
}

export async function sendUpstream(request: UpstreamRequest): Promise<UpstreamCall> {
  const controller = new AbortController();
  let timedOut = false;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const armTimer = () => {
    clearTimeout(timeoutId);
    timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, request.timeoutMs);
  };
  armTimer();
  const onClientAbort = () => controller.abort();
  if (request.signal?.aborted) {
    controller.abort();
  } else {
    request.signal?.addEventListener("abort", onClientAbort, { once: true });
  }

  const done = () => {
    clearTimeout(timeoutId);
    request.signal?.removeEventListener("abort", onClientAbort);
  };

  const toError = (error: unknown): unknown => {
    if (error instanceof GatewayError) {
      return error;
    }
    const context = { provider: request.provider, model: request.model, cause: error };
    if (timedOut) {
      return new UpstreamProviderError("Request timeout", { ...context, status: 504, code: "TIMEOUT" });
    }
    if (request.signal?.aborted) {
      return new UpstreamProviderError("Request aborted by client", {
        ...context,
        status: 499,
        code: "REQUEST_ABORTED",
      });
    }
    const reason = error instanceof Error ? error.message : String(error);
    return new UpstreamProviderError(`Failed to reach provider ${request.provider}: ${reason}`, context);
  };

  const guardRead: ReadGuard = async (read) => {
    armTimer();
    let onAbort = (): void => undefined;
    const aborted = new Promise<never>((_resolve, reject) => {
      onAbort = () => reject(new Error("Upstream stream aborted"));
    });
    if (controller.signal.aborted) {
      onAbort();
    } else {
      controller.signal.addEventListener("abort", onAbort, { once: true });
    }
    try {
      return await Promise.race([read, aborted]);
    } finally {
      clearTimeout(timeoutId);
      controller.signal.removeEventListener("abort", onAbort);
    }
  };

  try {
    const response = await fetch(request.url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...request.headers,
      },
      body: JSON.stringify(request.body),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw await upstreamFailure(response, request);
    }

    return { response, guardRead, done, toError };
  } catch (error) {
    done();
    throw toError(error);
  }
}

/**
 * Sends the request and parses the JSON body; the timeout covers the whole exchange.
 */
export async function postJson(request: UpstreamRequest): Promise<unknown> {
  const call = await sendUpstream(request);
  try {
    return await call.response.json();
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new UpstreamProviderError(`Provider ${request.provider} returned invalid JSON`, {
        provider: request.provider,
        model: request.model,
        cause: error,
      });
    }
    throw call.toError(error);
  } finally {
    call.done();
  }
}
