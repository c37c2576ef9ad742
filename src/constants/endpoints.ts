/**
 * Gateway API endpoint paths. All request URLs are built from these.
 */
export const GATEWAY_ENDPOINTS = {
  /** List models; used as the connectivity probe */
  MODELS: "/v1/models",

  /** Chat completions, streaming and non-streaming */
  CHAT_COMPLETIONS: "/v1/chat/completions",
} as const;

/** Status codes the gateway uses to reject a credential. */
export const AUTH_FAILURE_STATUSES: readonly number[] = [401, 403];
