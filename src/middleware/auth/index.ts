/**
 * Virtual key authentication.
 * Resolves the `x-bf-vk` header once per request, applies the invalid-key
 * policy and leaves the outcome on the context for routing and filtering.
 */
import { createMiddleware } from "hono/factory";
import type { AppEnv } from "../../app-env.js";
import {
  enforceAuthPolicy,
  resolveAuthOutcome,
  type AuthPolicy,
} from "../../governance/auth-resolver.js";
import type { VirtualKeyStore } from "../../governance/virtual-keys.js";

export function virtualKeyAuth(store: Pick<VirtualKeyStore, "getByCredential">, policy: AuthPolicy) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const outcome = enforceAuthPolicy(resolveAuthOutcome(c.req.raw.headers, store), policy);
    c.set("auth_outcome", outcome);
    if (outcome.kind === "valid_active" || outcome.kind === "valid_inactive") {
      c.set("virtual_key_id", outcome.virtualKey.id);
    }
    await next();
  });
}
