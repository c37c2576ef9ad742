import { createLogger, type Logger } from "./configLogger.js";

const logger: Logger = createLogger(false);

/** Turns debug output of the shared logger on or off. */
export function setDebugMode(enabled: boolean): void {
  Object.assign(logger, createLogger(enabled));
}

export { logger };
export default logger;
