/**
 * Virtual key management API.
 * Mount this router on `/api/governance/virtual-keys`.
 */
import { Hono } from "hono";
import type { AppEnv } from "../app-env.js";
import type { VirtualKeyStore } from "../governance/virtual-keys.js";
import { requireAdminToken } from "../middleware/auth/admin.js";
import type { Logger } from "../utils/logger.js";
import { readJsonBody } from "./schemas.js";

export interface GovernanceDeps {
  store: VirtualKeyStore;
  adminToken: string | null;
  logger: Logger;
}

export function governanceHandler({ store, adminToken, logger }: GovernanceDeps): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.use(requireAdminToken(adminToken));

  router.get("/", (c) => {
    const virtualKeys = store.list();
    return c.json({ virtual_keys: virtualKeys, count: virtualKeys.length });
  });

  router.get("/:id", (c) => {
    return c.json({ virtual_key: store.getOrThrow(c.req.param("id")) });
  });

  router.post("/", async (c) => {
    const virtualKey = store.create(await readJsonBody(c));
    logger.info(`Created virtual key ${virtualKey.id} (${virtualKey.name})`);
    return c.json({ message: "Virtual key created successfully", virtual_key: virtualKey });
  });

  router.put("/:id", async (c) => {
    const virtualKey = store.update(c.req.param("id"), await readJsonBody(c));
    logger.info(`Updated virtual key ${virtualKey.id}`);
    return c.json({ message: "Virtual key updated successfully", virtual_key: virtualKey });
  });

  router.delete("/:id", (c) => {
    const id = c.req.param("id");
    store.delete(id);
    logger.info(`Deleted virtual key ${id}`);
    return c.json({ message: "Virtual key deleted successfully" });
  });

  return router;
}
