/**
 * Virtual key gateway - main entry point.
 * Loads configuration, seeds virtual keys and starts the HTTP server.
 */
import { serve } from "@hono/node-server";
import { ConfigError, loadConfig, resolveAdminToken, seedVirtualKeys, type Config } from "./config.js";
import { createGateway } from "./gateway.js";
import { VirtualKeyStore } from "./governance/virtual-keys.js";
import { formatLogLine } from "./middleware/log/index.js";
import { createProviderRegistry } from "./providers/registry.js";
import { createLogger } from "./utils/logger.js";
import { createRotatingFileLogger, type RotatingFileSink } from "./utils/rotating-file-logger.js";

const store = new VirtualKeyStore();
let config: Config;
try {
  config = loadConfig(process.env.GATEWAY_CONFIG ?? "config.yaml");
  seedVirtualKeys(store, config.governance);
} catch (error) {
  if (error instanceof ConfigError) {
    console.error(error.message);
    process.exit(1);
  }
  throw error;
}

const logger = createLogger(config.logging.level);
const registry = createProviderRegistry(config);

const fileSettings = config.logging.file;
const fileLogger: RotatingFileSink | null = fileSettings.enabled
  ? createRotatingFileLogger({
      dirname: fileSettings.dirname,
      filename: fileSettings.filename,
      maxSize: fileSettings.max_size,
      maxFiles: fileSettings.max_files,
      logger,
    })
  : null;

const app = createGateway({
  config,
  registry,
  store,
  adminToken: resolveAdminToken(config.governance),
  logger,
  log: (entry) => {
    logger.info(formatLogLine(entry));
    logger.debug(JSON.stringify(entry, null, 2));
    fileLogger?.write(JSON.stringify(entry));
  },
});

// Start server
const port = process.env.PORT ? parseInt(process.env.PORT, 10) : 3000;

logger.info(`Gateway starting on port ${port}`);
logger.info(`Providers: ${registry.providerNames().join(", ") || "(none)"}`);
logger.info(`Virtual keys loaded: ${store.list().length}`);

const server = serve({
  fetch: app.fetch,
  port,
});

logger.info(`Server is running on http://localhost:${port}`);

process.on("SIGTERM", () => {
  logger.info("SIGTERM signal received: closing HTTP server");
  server.close(() => {
    logger.info("HTTP server closed");
    fileLogger
      ?.close()
      .catch((error: unknown) => logger.error("Failed to flush log file:", error));
  });
});
