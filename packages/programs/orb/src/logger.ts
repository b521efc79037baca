import { logger as loggerFn } from "@orbcomm/logger";

export const logger = loggerFn({ module: "orb" });
