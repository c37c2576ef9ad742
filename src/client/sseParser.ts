/**
 * SSE body parsing for streamed chat completions.
 *
 * Each line is interpreted on its own: `data: [DONE]` ends the stream, a
 * `data:` line with a content delta contributes text, everything else is
 * skipped. A bad line never aborts the stream.
 */

import { logger } from "../logging/index.js";
import { firstOf, isRecord } from "../utils/typeGuards.js";

const DATA_PREFIX = "data: ";
const DONE_SENTINEL = "[DONE]";

export type SseLineEvent =
  | { kind: "delta"; content: string }
  | { kind: "done" }
  | { kind: "skip"; reason: string };

function extractDeltaContent(chunk: unknown): string | undefined {
  const choice = isRecord(chunk) ? firstOf(chunk, "choices") : undefined;
  if (!isRecord(choice)) {
    return undefined;
  }
  const delta = choice["delta"];
  if (!isRecord(delta)) {
    return undefined;
  }
  const content = delta["content"];
  return typeof content === "string" ? content : undefined;
}

export function parseSseLine(rawLine: string): SseLineEvent {
  const line = rawLine.trimEnd();
  if (!line.startsWith(DATA_PREFIX)) {
    return { kind: "skip", reason: "not a data line" };
  }

  const payload = line.slice(DATA_PREFIX.length);
  if (payload === DONE_SENTINEL) {
    return { kind: "done" };
  }

  let chunk: unknown;
  try {
    chunk = JSON.parse(payload);
  } catch {
    return { kind: "skip", reason: "invalid JSON" };
  }

  const content = extractDeltaContent(chunk);
  if (content === undefined || content === "") {
    return { kind: "skip", reason: "no delta content" };
  }
  return { kind: "delta", content };
}

/**
 * Splits a byte or text stream into lines. The line terminator is removed; a
 * trailing `\r` is left for {@link parseSseLine} to trim. A final line without
 * a terminator is still yielded.
 */
export async function* readLines(source: AsyncIterable<Uint8Array | string>): AsyncGenerator<string> {
  const decoder = new TextDecoder("utf-8");
  let buffer = "";

  for await (const chunk of source) {
    buffer += typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });

    let newlineIndex = buffer.indexOf("\n");
    while (newlineIndex !== -1) {
      yield buffer.slice(0, newlineIndex);
      buffer = buffer.slice(newlineIndex + 1);
      newlineIndex = buffer.indexOf("\n");
    }
  }

  buffer += decoder.decode();
  if (buffer.length > 0) {
    yield buffer;
  }
}

/**
 * Reads the stream until `[DONE]` or end of body and returns the delta
 * contents concatenated in arrival order. Errors from the source propagate.
 */
export async function collectSseContent(source: AsyncIterable<Uint8Array | string>): Promise<string> {
  const fragments: string[] = [];

  for await (const line of readLines(source)) {
    const event = parseSseLine(line);
    if (event.kind === "done") {
      break;
    }
    if (event.kind === "delta") {
      fragments.push(event.content);
    } else if (line.trim() !== "") {
      logger.debug(`[SSE] Skipping line (${event.reason}): ${line.slice(0, 120)}`);
    }
  }

  return fragments.join("");
}
