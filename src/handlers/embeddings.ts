/**
 * Embeddings request handler.
 * Mount this router on `/v1/embeddings`.
 */
import { Hono } from "hono";
import type { AppEnv } from "../app-env.js";
import { clientAbortController, type HandlerDeps } from "./chat-completions.js";
import { EmbeddingRequestSchema, parseRequest, readJsonBody } from "./schemas.js";

export function embeddingsHandler({ router: requestRouter, logger }: HandlerDeps): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.post("/", async (c) => {
    const request = parseRequest(EmbeddingRequestSchema, await readJsonBody(c), "embedding request");
    c.set("request_model", request.model);
    logger.debug(`Routing embeddings for model ${request.model}`);

    const abort = clientAbortController(c.req.raw.signal);
    const response = await requestRouter.embeddings(request, c.get("auth_outcome"), { signal: abort.signal });
    c.set("target_provider", response.extra_fields?.provider);
    return c.json(response);
  });

  return router;
}
