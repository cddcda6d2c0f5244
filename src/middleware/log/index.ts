import { createMiddleware } from "hono/factory";
import { randomUUID } from "crypto";
import type { AppEnv } from "../../app-env.js";
import { VIRTUAL_KEY_HEADER } from "../../governance/auth-resolver.js";

export interface LoggerOptions {
  level?: "debug" | "info" | "warn" | "error";
  /** Custom logging function */
  log?: (entry: LogEntry) => void;
}

export interface LogEntry {
  requestId: string;
  timestamp: string;
  method: string;
  path: string;
  query: Record<string, string>;
  headers: Record<string, string>;
  payloadSize: number;
  status?: number;
  /** Not measured for event streams */
  responseSize?: number;
  latencyMs?: number;
  error?: unknown;
  /** Model requested by the client */
  model?: string;
  /** Provider the request was routed to */
  provider?: string;
  /** Id (never the value) of the virtual key the request carried */
  virtualKeyId?: string;
  stream?: boolean;
}

const REDACTED_HEADERS = new Set(["authorization", "x-api-key", VIRTUAL_KEY_HEADER]);

export function redactHeaders(headers: Headers): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [k, v] of headers.entries()) {
    const name = k.toLowerCase();
    result[name] = REDACTED_HEADERS.has(name) ? "[redacted]" : v;
  }
  return result;
}

export function formatLogLine(entry: LogEntry): string {
  const { requestId, method, path, status, latencyMs } = entry;
  return `[${requestId}] ${method} ${path} -> ${status} (${latencyMs}ms)`;
}

/**
 * Create logging middleware for Hono.
 * Logs request metadata, body size, latency, and errors.
 */
export function gatewayLogger(options: LoggerOptions = {}) {
  const logFn =
    options.log ||
    ((entry: LogEntry) => {
      console.log(formatLogLine(entry));
      if (options.level === "debug") {
        console.debug(JSON.stringify(entry, null, 2));
      }
    });

  return createMiddleware<AppEnv>(async (c, next) => {
    const start = Date.now();
    const requestId = c.req.header("x-request-id") ?? randomUUID();
    c.set("request_id", requestId);
    const url = new URL(c.req.url);

    // Clone request body to compute size without consuming it
    const bodyText = await c.req.raw.clone().text();

    const entry: LogEntry = {
      requestId,
      timestamp: new Date().toISOString(),
      method: c.req.method,
      path: url.pathname,
      query: Object.fromEntries(url.searchParams.entries()),
      headers: redactHeaders(c.req.raw.headers),
      payloadSize: bodyText.length,
    };

    try {
      await next();
    } catch (err) {
      entry.error = err instanceof Error ? err.message : err;
      entry.status = 500;
      entry.latencyMs = Date.now() - start;
      logFn(entry);
      throw err;
    }

    c.res.headers.set("x-request-id", requestId);
    entry.status = c.res.status;
    entry.latencyMs = Date.now() - start;
    entry.model = c.get("request_model");
    entry.provider = c.get("target_provider");
    entry.virtualKeyId = c.get("virtual_key_id");

    // Reading an event stream here would hold the response until it ends
    const isStream = c.res.headers.get("content-type")?.startsWith("text/event-stream") ?? false;
    entry.stream = isStream;
    if (!isStream) {
      const resText = await c.res.clone().text();
      entry.responseSize = resText.length;
      if (c.res.status >= 400) {
        entry.error = resText;
      }
    }
    logFn(entry);
  });
}
