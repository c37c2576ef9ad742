/**
 * Client contracts.
 *
 * The conversation layer depends on these interfaces, not on GatewayClient,
 * so it can be driven by any implementation (tests use in-memory fakes).
 */

import type { ChatMessage } from "../types/gateway.js";

export interface ChatCompletionClient {
  /** Resolves to true, or rejects with a GatewayError. */
  validateConnection(): Promise<boolean>;

  /** Single-shot completion; resolves to the assistant reply. */
  chatCompletion(messages: ChatMessage[], modelRef: string): Promise<string>;

  /** Streamed completion, collected into the full assistant reply. */
  chatCompletionStream(messages: ChatMessage[], modelRef: string): Promise<string>;

  /** Idempotent. */
  close(): Promise<void>;
}
