import { Agent as HttpAgent } from "http";
import { Agent as HttpsAgent } from "https";

import axios from "axios";

import type { AxiosInstance } from "axios";

export interface GatewaySessionOptions {
  verifySsl: boolean;
  timeoutMs: number;
}

/**
 * Reusable connection resource: one axios instance over keep-alive agents.
 *
 * Closing destroys the pooled sockets, which also aborts any request still
 * using them. A closed session cannot be reopened; create a new one.
 */
export class GatewaySession {
  readonly http: AxiosInstance;
  readonly timeoutMs: number;
  private readonly httpAgent: HttpAgent;
  private readonly httpsAgent: HttpsAgent;
  private isClosed = false;

  constructor(options: GatewaySessionOptions) {
    this.timeoutMs = options.timeoutMs;
    this.httpAgent = new HttpAgent({ keepAlive: true });
    this.httpsAgent = new HttpsAgent({
      keepAlive: true,
      rejectUnauthorized: options.verifySsl,
    });
    this.http = axios.create({
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      timeout: options.timeoutMs,
      // Status codes are classified by the client, not thrown by axios
      validateStatus: () => true,
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

export function createGatewaySession(options: GatewaySessionOptions): GatewaySession {
  return new GatewaySession(options);
}
