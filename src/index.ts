/**
 * gateway-chat-client
 *
 * Client for OpenAI-compatible chat-completion gateways: connectivity check,
 * single-shot and SSE-streamed completions, and a closed failure taxonomy.
 */

export * from "./client/index.js";
export * from "./conversation/index.js";
export * from "./services/index.js";
export { FAILURE_MESSAGES, type FailureReason } from "./constants/messages.js";
export { GATEWAY_ENDPOINTS } from "./constants/endpoints.js";
export {
  DEFAULT_CONFIG,
  getConversationSettings,
  getEndpointConfig,
  loadConfig,
  resolveConfig,
  validateConfig,
  type GatewayAppConfig,
  type LoadedConfig,
} from "./config.js";
export { logger, createLogger, setDebugMode, type Logger } from "./logging/index.js";
export type {
  ChatCompletionChunk,
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
  ChatRole,
  GatewayEndpointConfig,
} from "./types/gateway.js";
