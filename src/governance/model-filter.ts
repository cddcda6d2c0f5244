/**
 * Virtual-key model catalog filter: a pure, order-preserving projection of the
 * provider catalog. Nothing here is cached; callers pass a fresh snapshot.
 */

import type { Model } from "../providers/registry.js";
import type { AuthOutcome } from "./auth-resolver.js";
import type { ProviderConfig, VirtualKey } from "./virtual-keys.js";

export type ModelAllowance = { kind: "all" } | { kind: "only"; models: ReadonlySet<string> };

export function allowanceFor(config: ProviderConfig): ModelAllowance {
  return config.allowed_models.length === 0
    ? { kind: "all" }
    : { kind: "only", models: new Set(config.allowed_models) };
}

/** The key restricting access, or null when the outcome is unrestricted. */
export function restrictingKey(outcome: AuthOutcome): VirtualKey | null {
  if (outcome.kind !== "valid_active" || outcome.virtualKey.provider_configs.length === 0) {
    return null;
  }
  return outcome.virtualKey;
}

/**
 * Union over every provider config naming `provider`.
 */
export function virtualKeyPermits(virtualKey: VirtualKey, provider: string, model: string): boolean {
  if (virtualKey.provider_configs.length === 0) {
    return true;
  }
  return virtualKey.provider_configs.some((config) => {
    if (config.provider !== provider) {
      return false;
    }
    const allowance = allowanceFor(config);
    return allowance.kind === "all" || allowance.models.has(model);
  });
}

export function splitModelId(id: string): { provider: string; model: string } | null {
  const slash = id.indexOf("/");
  if (slash <= 0 || slash === id.length - 1) {
    return null;
  }
  return { provider: id.slice(0, slash), model: id.slice(slash + 1) };
}

export function filterModels<M extends Pick<Model, "id">>(
  models: readonly M[],
  outcome: AuthOutcome,
): M[] {
  const key = restrictingKey(outcome);
  if (key === null) {
    return [...models];
  }

  return models.filter((model) => {
    const parts = splitModelId(model.id);
    return parts !== null && virtualKeyPermits(key, parts.provider, parts.model);
  });
}
