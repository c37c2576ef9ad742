/**
 * Model routing for the gateway's `model` field.
 *
 * Agent names are sent as `agent:<name>`. Fully qualified refs (anything with
 * a provider path such as `openai-codex/gpt-5.2-codex`, or an explicit
 * routing prefix) are sent as given.
 */

export const AGENT_PREFIX = "agent:";
export const ROUTING_PREFIXES: readonly string[] = [AGENT_PREFIX, "openclaw/"];

export function resolveModelRef(modelOverride: string | undefined, agentId: string): string {
  const raw = modelOverride?.trim() ?? "";
  if (raw === "") {
    return `${AGENT_PREFIX}${agentId}`;
  }
  if (raw.includes("/") || ROUTING_PREFIXES.some((prefix) => raw.startsWith(prefix))) {
    return raw;
  }
  return `${AGENT_PREFIX}${raw}`;
}
