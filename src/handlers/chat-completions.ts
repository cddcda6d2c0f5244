/**
 * Chat completions request handler.
 * Mount this router on `/v1/chat/completions`.
 */
import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import type { AppEnv } from "../app-env.js";
import { toErrorBody } from "../errors.js";
import type { ChatCompletionChunk } from "../providers/types.js";
import type { RequestRouter } from "../router/request-router.js";
import type { Logger } from "../utils/logger.js";
import { ChatCompletionRequestSchema, parseRequest, readJsonBody } from "./schemas.js";

export interface HandlerDeps {
  router: RequestRouter;
  logger: Logger;
}

/**
 * An AbortController that fires when the client goes away.
 */
export function clientAbortController(signal: AbortSignal): AbortController {
  const controller = new AbortController();
  if (signal.aborted) {
    controller.abort(signal.reason);
  } else {
    signal.addEventListener("abort", () => controller.abort(signal.reason), { once: true });
  }
  return controller;
}

export function chatCompletionsHandler({ router: requestRouter, logger }: HandlerDeps): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.post("/", async (c) => {
    const request = parseRequest(ChatCompletionRequestSchema, await readJsonBody(c), "chat completion request");
    const outcome = c.get("auth_outcome");
    const abort = clientAbortController(c.req.raw.signal);
    c.set("request_model", request.model);

    logger.debug(`Routing chat completion for model ${request.model}`);

    if (!request.stream) {
      const response = await requestRouter.chatCompletion(request, outcome, { signal: abort.signal });
      c.set("target_provider", response.extra_fields?.provider);
      return c.json(response);
    }

    const chunks = requestRouter.chatCompletionStream(request, outcome, { signal: abort.signal });
    // Pull the first chunk before committing to a 200 event stream, so an
    // upstream failure still gets a proper status.
    const first = await chunks.next();
    const firstChunk: ChatCompletionChunk | undefined = first.done ? undefined : first.value;
    c.set("target_provider", firstChunk?.extra_fields?.provider);

    return streamSSE(c, async (stream) => {
      stream.onAbort(() => {
        abort.abort();
      });

      try {
        if (firstChunk) {
          await stream.writeSSE({ data: JSON.stringify(firstChunk) });
        }
        for await (const chunk of chunks) {
          if (stream.aborted) {
            break;
          }
          await stream.writeSSE({ data: JSON.stringify(chunk) });
        }
      } catch (error) {
        if (stream.aborted) {
          return;
        }
        logger.error(`Stream for ${request.model} failed:`, error instanceof Error ? error.message : error);
        await stream.writeSSE({ data: JSON.stringify(toErrorBody(error).body) });
      } finally {
        await chunks.return(undefined);
      }
      if (!stream.aborted) {
        await stream.writeSSE({ data: "[DONE]" });
      }
    });
  });

  return router;
}
