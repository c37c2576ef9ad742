export { ConversationAgent } from "./conversationAgent.js";
export { buildMessages } from "./history.js";
export { classifyFailure, describeFailure } from "./failures.js";
export { resolveModelRef, AGENT_PREFIX, ROUTING_PREFIXES } from "./modelRouting.js";
export type { ChatLogEntry, ChatLogRole, ConversationResult, ConversationSettings } from "./types.js";
