export type GatewayErrorKind = "auth" | "connection" | "timeout";

/**
 * Base class of the three expected gateway failures. Anything that is not a
 * GatewayError coming out of the client is a contract violation or a bug.
 */
export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 401/403 from the gateway. Not retryable without new credentials. */
export class GatewayAuthError extends GatewayError {
  readonly kind = "auth";
}

/** Unreachable gateway, TLS failure, or a non-auth error status. */
export class GatewayConnectionError extends GatewayError {
  readonly kind = "connection";
}

/** No complete response within the configured timeout. */
export class GatewayTimeoutError extends GatewayError {
  readonly kind = "timeout";
}

export function isGatewayError(error: unknown): error is GatewayError {
  return error instanceof GatewayError;
}
