import { createMiddleware } from "hono/factory";
import type { AppEnv } from "../../app-env.js";
import { AuthPolicyError } from "../../errors.js";
import { parseBearerToken } from "../../utils/bearer.js";

/**
 * Guards the governance routes with a static bearer token. A null token
 * leaves the routes open.
 */
export function requireAdminToken(adminToken: string | null) {
  return createMiddleware<AppEnv>(async (c, next) => {
    if (adminToken !== null) {
      const token = parseBearerToken(c.req.header("authorization"));
      if (token !== adminToken) {
        throw new AuthPolicyError("Missing or invalid admin bearer token", 401, "UNAUTHORIZED");
      }
    }
    c.header("Cache-Control", "no-store");
    await next();
  });
}
