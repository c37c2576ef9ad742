/**
 * User-facing replies spoken in place of an answer when a turn fails.
 */
export const FAILURE_MESSAGES = {
  invalid_auth: "I'm having trouble authenticating. Check my settings.",
  cannot_connect: "I can't reach my brain right now. Try again in a moment.",
  timeout: "That took too long. Try asking again.",
  unknown: "Something went wrong on my end. Try again.",
} as const;

export type FailureReason = keyof typeof FAILURE_MESSAGES;
