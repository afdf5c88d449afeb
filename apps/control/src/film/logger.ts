import { createLogger } from "@filmbus/utils";

export const filmLogger = createLogger("film");
