import { createLogger } from "@filmbus/utils";

/**
 * Camera module logger
 * Separate logger for controller and driver operations
 */
export const cameraLogger = createLogger("camera");
