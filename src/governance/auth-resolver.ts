/**
 * Resolves the `x-bf-vk` credential of an inbound request into an AuthOutcome,
 * and applies the configured policy for unknown and inactive keys.
 */

import { AuthPolicyError } from "../errors.js";
import type { InvalidKeyPolicy } from "../config.js";
import type { VirtualKey, VirtualKeyStore } from "./virtual-keys.js";

export const VIRTUAL_KEY_HEADER = "x-bf-vk";

export type AuthOutcome =
  | { kind: "no_credential" }
  | { kind: "valid_active"; virtualKey: VirtualKey }
  | { kind: "valid_inactive"; virtualKey: VirtualKey }
  | { kind: "unknown_credential" };

export interface AuthPolicy {
  invalidKeyPolicy: InvalidKeyPolicy;
  /** Reject requests that carry no virtual key at all. */
  enforceVirtualKey: boolean;
}

type KeyLookup = Pick<VirtualKeyStore, "getByCredential">;

export function resolveAuthOutcome(headers: Headers, store: KeyLookup): AuthOutcome {
  const credential = headers.get(VIRTUAL_KEY_HEADER)?.trim();
  if (!credential) {
    return { kind: "no_credential" };
  }

  const virtualKey = store.getByCredential(credential);
  if (!virtualKey) {
    return { kind: "unknown_credential" };
  }

  return virtualKey.is_active
    ? { kind: "valid_active", virtualKey }
    : { kind: "valid_inactive", virtualKey };
}

/**
 * Throws AuthPolicyError for outcomes the policy rejects; otherwise returns
 * the outcome to filter with.
 */
export function enforceAuthPolicy(outcome: AuthOutcome, policy: AuthPolicy): AuthOutcome {
  switch (outcome.kind) {
    case "no_credential":
      if (policy.enforceVirtualKey) {
        throw new AuthPolicyError(
          `A virtual key is required (${VIRTUAL_KEY_HEADER} header)`,
          401,
          "VIRTUAL_KEY_REQUIRED",
        );
      }
      return outcome;
    case "unknown_credential":
      if (policy.invalidKeyPolicy === "reject") {
        throw new AuthPolicyError("Invalid virtual key", 401, "INVALID_VIRTUAL_KEY");
      }
      return outcome;
    case "valid_inactive":
      if (policy.invalidKeyPolicy === "reject") {
        throw new AuthPolicyError("Virtual key is inactive", 403, "VIRTUAL_KEY_INACTIVE");
      }
      return outcome;
    case "valid_active":
      return outcome;
  }
}
