import type { AuthOutcome } from "./governance/auth-resolver.js";

export type AppContextVariables = {
  auth_outcome: AuthOutcome;
  request_id: string;
  /** Model as named by the client */
  request_model?: string;
  /** Provider the request was routed to */
  target_provider?: string;
  virtual_key_id?: string;
};

export type AppEnv = {
  Variables: AppContextVariables;
};
