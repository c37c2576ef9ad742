import type { FailureReason } from "../constants/messages.js";

/** Roles a host chat log may contain; only user and assistant reach the gateway. */
export type ChatLogRole = "system" | "user" | "assistant" | "tool";

export interface ChatLogEntry {
  role: ChatLogRole;
  content?: string | null;
}

export interface ConversationSettings {
  agentId: string;
  /** Agent name or fully qualified model ref; blank uses agentId. */
  modelOverride: string;
  systemPrompt: string;
  /** History messages sent with each turn. 0 sends all of them. */
  maxHistory: number;
  streaming: boolean;
}

export interface ConversationResult {
  speech: string;
  failure: FailureReason | null;
}
