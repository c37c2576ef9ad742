export { GatewayClient, type GatewayClientOptions } from "./gatewayClient.js";
export { GatewaySession, createGatewaySession, type GatewaySessionOptions } from "./session.js";
export {
  GatewayError,
  GatewayAuthError,
  GatewayConnectionError,
  GatewayTimeoutError,
  isGatewayError,
  type GatewayErrorKind,
} from "./errors.js";
export { collectSseContent, parseSseLine, readLines, type SseLineEvent } from "./sseParser.js";
export type { ChatCompletionClient } from "./contracts.js";
