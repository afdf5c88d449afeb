/**
 * Control entry point
 *
 * Loads the camera configuration, wires the bus and broadcasts the
 * initial camera parameters. Runs until SIGINT/SIGTERM.
 */

import { APP_CONFIG } from "@filmbus/config";
import { createLogger } from "@filmbus/utils";
import { env, validateEnv } from "./config/env";
import { loadCameraConfig } from "./config/cameras";
import { createControlApp, type ControlApp } from "./app";
import { createMessage } from "./bus/message-types";

const logger = createLogger("server");

let app: ControlApp | null = null;

export async function startControl(): Promise<ControlApp> {
  logger.info(`Starting ${APP_CONFIG.APP_NAME} control...`);

  for (const warning of validateEnv()) {
    logger.warn(warning);
  }

  const cameras = loadCameraConfig(env.cameraConfigPath);
  logger.info(`Loaded ${cameras.length} camera(s) from ${env.cameraConfigPath}`);

  const control = createControlApp({ cameras });

  control.bus.on("message:handled", (message) => {
    logger.debug("Message handled", { message: String(message) });
  });

  // Every camera answers with "initial-parameters"
  await control.bus.send(createMessage("configure-initial", APP_CONFIG.BUS_SOURCE, {}));
  await control.bus.idle();

  logger.info(`=== ${APP_CONFIG.APP_NAME} control started (${env.nodeEnv}) ===`);
  return control;
}

export async function stopControl(): Promise<void> {
  if (!app) {
    logger.warn("Control not started");
    return;
  }

  logger.info("Stopping control...");
  await app.shutdown();
  app = null;
  logger.info("Control stopped");
}

const gracefulShutdown = async (signal: string) => {
  logger.info(`Received ${signal}, starting graceful shutdown...`);
  try {
    await stopControl();
    process.exit(0);
  } catch (error) {
    logger.error("Error during shutdown:", error);
    process.exit(1);
  }
};

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Rejection:", { reason });
});

startControl()
  .then((control) => {
    app = control;
  })
  .catch((error: unknown) => {
    logger.error("Failed to start control:", error);
    process.exit(1);
  });
