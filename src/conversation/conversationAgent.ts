import { FAILURE_MESSAGES } from "../constants/messages.js";
import { logger } from "../logging/index.js";

import { classifyFailure } from "./failures.js";
import { buildMessages } from "./history.js";
import { resolveModelRef } from "./modelRouting.js";

import type { ChatLogEntry, ConversationResult, ConversationSettings } from "./types.js";
import type { ChatCompletionClient } from "../client/contracts.js";

/**
 * Answers one conversation turn through the gateway.
 *
 * A failed turn still produces speech: the matching sentence from
 * FAILURE_MESSAGES, which is also what gets recorded in the chat log.
 */
export class ConversationAgent {
  constructor(
    private readonly client: ChatCompletionClient,
    private readonly settings: ConversationSettings,
  ) {}

  get modelRef(): string {
    return resolveModelRef(this.settings.modelOverride, this.settings.agentId);
  }

  async handleMessage(chatLog: ChatLogEntry[]): Promise<ConversationResult> {
    const messages = buildMessages(chatLog, this.settings.systemPrompt, this.settings.maxHistory);
    const modelRef = this.modelRef;

    logger.debug(`[CONVERSATION] Sending ${messages.length} messages to ${modelRef}`);

    let result: ConversationResult;
    try {
      const speech = this.settings.streaming
        ? await this.client.chatCompletionStream(messages, modelRef)
        : await this.client.chatCompletion(messages, modelRef);
      result = { speech, failure: null };
    } catch (error: unknown) {
      const failure = classifyFailure(error);
      switch (failure) {
        case "invalid_auth":
          logger.error("[CONVERSATION] Authentication failed with the gateway");
          break;
        case "cannot_connect":
          logger.error("[CONVERSATION] Cannot reach the gateway");
          break;
        case "timeout":
          logger.warn("[CONVERSATION] Gateway timed out");
          break;
        case "unknown":
          logger.error("[CONVERSATION] Unexpected error from the gateway:", error);
          break;
      }
      result = { speech: FAILURE_MESSAGES[failure], failure };
    }

    chatLog.push({ role: "assistant", content: result.speech });
    return result;
  }
}
