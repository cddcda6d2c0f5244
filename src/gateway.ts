/**
 * Gateway application factory.
 * Wires middleware and handlers around an explicit registry and key store so
 * the app can be built in tests without a config file or network.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { AppEnv } from "./app-env.js";
import type { Config } from "./config.js";
import { errorResponse, GatewayError } from "./errors.js";
import type { VirtualKeyStore } from "./governance/virtual-keys.js";
import { chatCompletionsHandler } from "./handlers/chat-completions.js";
import { embeddingsHandler } from "./handlers/embeddings.js";
import { governanceHandler } from "./handlers/governance.js";
import { modelsHandler } from "./handlers/models.js";
import { virtualKeyAuth } from "./middleware/auth/index.js";
import { gatewayLogger, type LogEntry } from "./middleware/log/index.js";
import type { ProviderRegistry } from "./providers/registry.js";
import { RequestRouter } from "./router/request-router.js";
import { VIRTUAL_KEY_HEADER } from "./governance/auth-resolver.js";
import { silentLogger, type Logger } from "./utils/logger.js";

export interface GatewayOptions {
  config: Config;
  registry: ProviderRegistry;
  store: VirtualKeyStore;
  adminToken?: string | null;
  logger?: Logger;
  /** Receives one entry per request */
  log?: (entry: LogEntry) => void;
  /** Randomness for weighted provider selection */
  random?: () => number;
}

const corsOptions = {
  origin: "*",
  allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
  allowHeaders: ["Content-Type", "Authorization", VIRTUAL_KEY_HEADER],
  exposeHeaders: ["Content-Length", "x-request-id"],
  maxAge: 600,
};

export function createGateway(options: GatewayOptions): Hono<AppEnv> {
  const { config, registry, store } = options;
  const logger = options.logger ?? silentLogger;
  const router = new RequestRouter(registry, { random: options.random, logger });

  const app = new Hono<AppEnv>();

  app.use("*", cors(corsOptions));
  app.use("*", gatewayLogger({ level: config.logging.level, log: options.log }));

  app.onError((error, c) => {
    if (!(error instanceof GatewayError) || error.status >= 500) {
      logger.error(`${c.req.method} ${c.req.path} failed:`, error.message);
    }
    return errorResponse(error);
  });

  app.get("/health", (c) => {
    return c.json({ status: "healthy", timestamp: new Date().toISOString() });
  });

  app.route(
    "/api/governance/virtual-keys",
    governanceHandler({ store, adminToken: options.adminToken ?? null, logger }),
  );

  const auth = virtualKeyAuth(store, {
    invalidKeyPolicy: config.governance.invalid_key_policy,
    enforceVirtualKey: config.governance.enforce_virtual_key,
  });
  app.use("/v1/*", auth);
  app.route("/v1/models", modelsHandler(registry));
  app.route("/v1/chat/completions", chatCompletionsHandler({ router, logger }));
  app.route("/v1/embeddings", embeddingsHandler({ router, logger }));

  return app;
}
