/**
 * Model catalog handler.
 * Mount this router on `/v1/models`.
 */
import { Hono } from "hono";
import type { AppEnv } from "../app-env.js";
import { filterModels } from "../governance/model-filter.js";
import type { ProviderRegistry } from "../providers/registry.js";

export function modelsHandler(registry: ProviderRegistry): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.get("/", (c) => {
    const provider = c.req.query("provider")?.trim();
    const visible = filterModels(registry.listAllModels(), c.get("auth_outcome"));
    const data = provider ? visible.filter((model) => model.owned_by === provider) : visible;
    return c.json({ object: "list" as const, data });
  });

  return router;
}
