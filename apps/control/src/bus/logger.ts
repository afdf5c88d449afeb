import { createLogger } from "@filmbus/utils";

/**
 * Bus logger
 */
export const busLogger = createLogger("bus");
