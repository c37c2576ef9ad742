/**
 * Setup checks for gateway endpoint settings, run before a client is handed
 * to the rest of the application.
 */

import { GatewayClient } from "../client/gatewayClient.js";
import { classifyFailure } from "../conversation/failures.js";
import { logger } from "../logging/index.js";

import type { FailureReason } from "../constants/messages.js";
import type { GatewayEndpointConfig } from "../types/gateway.js";

/**
 * Probes the endpoint with a throwaway client. Resolves to null when the
 * gateway accepts the settings, otherwise to the reason it did not.
 */
export async function verifyGatewaySettings(endpoint: GatewayEndpointConfig): Promise<FailureReason | null> {
  const client = new GatewayClient(endpoint);
  try {
    await client.validateConnection();
    return null;
  } catch (error: unknown) {
    const reason = classifyFailure(error);
    if (reason === "unknown") {
      logger.error("[SETUP] Unexpected error while verifying gateway settings:", error);
    }
    return reason;
  } finally {
    await client.close();
  }
}

/**
 * Returns a validated client that the caller owns and must close. If
 * validation fails the client is closed and the error rethrown.
 */
export async function connectGateway(endpoint: GatewayEndpointConfig): Promise<GatewayClient> {
  const client = new GatewayClient(endpoint);
  try {
    await client.validateConnection();
  } catch (error: unknown) {
    await client.close();
    throw error;
  }
  return client;
}
