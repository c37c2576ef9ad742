import { GatewayAuthError, GatewayConnectionError, GatewayTimeoutError } from "../client/errors.js";
import { FAILURE_MESSAGES, type FailureReason } from "../constants/messages.js";

export function classifyFailure(error: unknown): FailureReason {
  if (error instanceof GatewayAuthError) {
    return "invalid_auth";
  }
  if (error instanceof GatewayConnectionError) {
    return "cannot_connect";
  }
  if (error instanceof GatewayTimeoutError) {
    return "timeout";
  }
  return "unknown";
}

export function describeFailure(error: unknown): string {
  return FAILURE_MESSAGES[classifyFailure(error)];
}
