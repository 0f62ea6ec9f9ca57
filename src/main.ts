// Tilt Stabilizer - Entry point
// Loads configuration and starts the stabilization service.

import "dotenv/config";
import { APP_NAME, APP_VERSION } from "./index.js";
import { loadConfig } from "./config.js";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { createConsoleLogger, setLogLevel } from "./logger.js";
import type { AppConfig } from "./types.js";

const log = createConsoleLogger("Main");

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  log.error(`Invalid configuration: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}

setLogLevel(config.logLevel);
log.info(
  `Configuration loaded (smoothing=${config.stabilizer.smoothingFactor}, ` +
    `interpolation=${config.stabilizer.interpolation})`,
);

const sessionManager = new SessionManager({ config: config.stabilizer });
const server = createAppServer({ sessionManager });

const shutdown = (signal: string) => {
  log.info(`${signal} received, shutting down`);
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      log.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    },
  );
};
process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

server.listen(config.port).then(
  (port) => {
    log.info(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
    log.info("Pipeline: gravity → OrientationEstimator → baseline → transform → FrameWarper");
  },
  (err: unknown) => {
    log.error(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  },
);
