/**
 * Logging Module
 *
 * All client and conversation logging goes through this module.
 */

export { default as logger, setDebugMode } from "./logger.js";
export { createLogger, type Logger } from "./configLogger.js";
export { logGatewayRequest, logGatewayResponse, maskHeaders } from "./requestLogger.js";
