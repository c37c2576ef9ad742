import type { ChatLogEntry } from "./types.js";
import type { ChatMessage } from "../types/gateway.js";

/**
 * Builds the message list for one turn: the system prompt, then the user
 * and assistant entries of the log, truncated to the last `maxHistory`
 * entries when `maxHistory` is positive.
 *
 * Tool and system entries of the log are dropped, and so are assistant
 * entries without content.
 */
export function buildMessages(
  chatLog: readonly ChatLogEntry[],
  systemPrompt: string,
  maxHistory: number,
): ChatMessage[] {
  let history: ChatMessage[] = [];
  for (const entry of chatLog) {
    if (entry.role === "user") {
      history.push({ role: "user", content: entry.content ?? "" });
    } else if (entry.role === "assistant" && entry.content) {
      history.push({ role: "assistant", content: entry.content });
    }
  }

  if (maxHistory > 0) {
    history = history.slice(-maxHistory);
  }

  return [{ role: "system", content: systemPrompt }, ...history];
}
