import axios from "axios";

import { AUTH_FAILURE_STATUSES, GATEWAY_ENDPOINTS } from "../constants/endpoints.js";
import { logger, logGatewayRequest, logGatewayResponse } from "../logging/index.js";
import { firstOf, isRecord } from "../utils/typeGuards.js";

import {
  GatewayAuthError,
  GatewayConnectionError,
  GatewayTimeoutError,
  isGatewayError,
} from "./errors.js";
import { createGatewaySession } from "./session.js";
import { collectSseContent } from "./sseParser.js";

import type { ChatCompletionClient } from "./contracts.js";
import type { GatewaySession } from "./session.js";
import type {
  ChatCompletionRequest,
  ChatMessage,
  GatewayEndpointConfig,
} from "../types/gateway.js";
import type { AxiosResponse } from "axios";
import type { Readable } from "stream";

type Operation = "validate" | "complete" | "stream";

const FAILURE_LABELS: Record<Operation, { timeout: string; connection: string }> = {
  validate: { timeout: "Connection timed out", connection: "Cannot reach gateway" },
  complete: { timeout: "Request timed out", connection: "Gateway error" },
  stream: { timeout: "Stream timed out", connection: "Stream error" },
};

const AUTH_FAILURE_MESSAGE = "Invalid API key or token";

const TIMEOUT_ERROR_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export interface GatewayClientOptions {
  /**
   * Externally owned session. The client uses it but never closes it; if it
   * is found closed, the client replaces it with a session of its own.
   */
  session?: GatewaySession;
}

function hasTimeoutCode(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    TIMEOUT_ERROR_CODES.has(error.code)
  );
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function extractMessageContent(data: unknown): string {
  const choice = isRecord(data) ? firstOf(data, "choices") : undefined;
  const message = isRecord(choice) ? choice["message"] : undefined;
  const content = isRecord(message) ? message["content"] : undefined;
  if (typeof content !== "string") {
    throw new TypeError("Malformed completion response: choices[0].message.content is missing");
  }
  return content;
}

/**
 * Client for an OpenAI-compatible chat-completion gateway.
 *
 * Every call makes exactly one attempt. Expected failures reject with a
 * GatewayAuthError, GatewayConnectionError or GatewayTimeoutError; anything
 * else (a malformed success body, for one) propagates unwrapped.
 *
 * Calling close() while a call is in flight destroys its sockets. The
 * outcome of that call is undefined.
 */
export class GatewayClient implements ChatCompletionClient {
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;
  private readonly verifySsl: boolean;
  private readonly timeoutMs: number;
  private session: GatewaySession | undefined;
  private ownsSession: boolean;

  constructor(endpoint: GatewayEndpointConfig, options: GatewayClientOptions = {}) {
    this.baseUrl = endpoint.baseUrl.replace(/\/+$/, "");
    this.headers = {
      Authorization: `Bearer ${endpoint.apiKey}`,
      "Content-Type": "application/json",
    };
    this.verifySsl = endpoint.verifySsl;
    this.timeoutMs = endpoint.timeoutMs;
    this.session = options.session;
    this.ownsSession = options.session === undefined;
  }

  /** True while the client holds a session that has not been closed. */
  get hasOpenSession(): boolean {
    return this.session !== undefined && !this.session.closed;
  }

  private getSession(): GatewaySession {
    if (this.session === undefined || this.session.closed) {
      this.session = createGatewaySession({
        verifySsl: this.verifySsl,
        timeoutMs: this.timeoutMs,
      });
      this.ownsSession = true;
    }
    return this.session;
  }

  async close(): Promise<void> {
    if (this.ownsSession && this.session !== undefined && !this.session.closed) {
      await this.session.close();
    }
  }

  /**
   * Checks connectivity and credentials with GET /v1/models. The body is
   * ignored.
   */
  async validateConnection(): Promise<boolean> {
    const session = this.getSession();
    const url = `${this.baseUrl}${GATEWAY_ENDPOINTS.MODELS}`;
    const deadline = AbortSignal.timeout(session.timeoutMs);
    const startedAt = Date.now();

    logGatewayRequest("GET", url, this.headers);

    let response: AxiosResponse<unknown>;
    try {
      response = await session.http.get<unknown>(url, {
        headers: this.headers,
        signal: deadline,
      });
    } catch (error: unknown) {
      throw this.toGatewayError(error, deadline, "validate");
    }

    logGatewayResponse(response.status, url, startedAt);
    this.assertSuccessStatus(response.status, "validate");
    return true;
  }

  async chatCompletion(messages: ChatMessage[], modelRef: string): Promise<string> {
    const session = this.getSession();
    const url = `${this.baseUrl}${GATEWAY_ENDPOINTS.CHAT_COMPLETIONS}`;
    const payload: ChatCompletionRequest = { model: modelRef, messages, stream: false };
    const deadline = AbortSignal.timeout(session.timeoutMs);
    const startedAt = Date.now();

    logGatewayRequest("POST", url, this.headers);

    let response: AxiosResponse<unknown>;
    try {
      response = await session.http.post<unknown>(url, payload, {
        headers: this.headers,
        responseType: "json",
        signal: deadline,
      });
    } catch (error: unknown) {
      throw this.toGatewayError(error, deadline, "complete");
    }

    logGatewayResponse(response.status, url, startedAt);
    this.assertSuccessStatus(response.status, "complete");
    return extractMessageContent(response.data);
  }

  /**
   * Streams a completion over SSE and resolves with the full reply once the
   * gateway sends `[DONE]` or ends the body.
   */
  async chatCompletionStream(messages: ChatMessage[], modelRef: string): Promise<string> {
    const session = this.getSession();
    const url = `${this.baseUrl}${GATEWAY_ENDPOINTS.CHAT_COMPLETIONS}`;
    const payload: ChatCompletionRequest = { model: modelRef, messages, stream: true };
    const deadline = AbortSignal.timeout(session.timeoutMs);
    const startedAt = Date.now();

    logGatewayRequest("POST", url, this.headers, true);

    let response: AxiosResponse<Readable>;
    try {
      response = await session.http.post<Readable>(url, payload, {
        headers: this.headers,
        responseType: "stream",
        signal: deadline,
      });
    } catch (error: unknown) {
      throw this.toGatewayError(error, deadline, "stream");
    }

    logGatewayResponse(response.status, url, startedAt);

    const body = response.data;
    try {
      this.assertSuccessStatus(response.status, "stream");
    } catch (error: unknown) {
      body.destroy();
      throw error;
    }

    // The deadline covers the whole body, including a gateway that stops
    // sending without closing the connection.
    const onDeadline = (): void => {
      body.destroy(deadline.reason instanceof Error ? deadline.reason : undefined);
    };
    deadline.addEventListener("abort", onDeadline, { once: true });
    if (deadline.aborted) {
      onDeadline();
    }

    try {
      const content = await collectSseContent(body);
      logger.debug(`[GATEWAY] Stream complete (${content.length} chars) in ${Date.now() - startedAt}ms`);
      return content;
    } catch (error: unknown) {
      throw this.toGatewayError(error, deadline, "stream", true);
    } finally {
      deadline.removeEventListener("abort", onDeadline);
    }
  }

  private assertSuccessStatus(status: number, operation: Operation): void {
    if (AUTH_FAILURE_STATUSES.includes(status)) {
      logger.error(`[GATEWAY] Authentication rejected with status ${status}`);
      throw new GatewayAuthError(AUTH_FAILURE_MESSAGE);
    }
    if (status < 200 || status >= 300) {
      throw new GatewayConnectionError(
        `${FAILURE_LABELS[operation].connection}: Request failed with status code ${status}`,
      );
    }
  }

  /**
   * Maps a transport failure onto the error taxonomy. Anything that is not
   * a transport failure is returned unchanged. While a body is being read
   * every failure comes from the transport.
   */
  private toGatewayError(
    error: unknown,
    deadline: AbortSignal,
    operation: Operation,
    readingBody = false,
  ): unknown {
    if (isGatewayError(error)) {
      return error;
    }

    const labels = FAILURE_LABELS[operation];
    if (deadline.aborted || hasTimeoutCode(error)) {
      return new GatewayTimeoutError(labels.timeout, { cause: error });
    }
    if (readingBody || axios.isAxiosError(error)) {
      return new GatewayConnectionError(`${labels.connection}: ${describeError(error)}`, { cause: error });
    }
    return error;
  }
}
