/**
 * Wire and configuration types for the chat-completion gateway.
 */

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface GatewayEndpointConfig {
  /** Trailing slashes are stripped by the client. */
  baseUrl: string;
  /** Bearer token. Never logged. */
  apiKey: string;
  verifySsl: boolean;
  /** Total time allowed for one call, including every streamed line read. */
  timeoutMs: number;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  stream: boolean;
}

/** Non-streaming success body; only the fields the client reads. */
export interface ChatCompletionResponse {
  choices: Array<{
    message: {
      content: string;
    };
  }>;
}

/** One `data:` payload of a streamed completion. */
export interface ChatCompletionChunk {
  choices: Array<{
    delta: {
      content?: string;
    };
  }>;
}
