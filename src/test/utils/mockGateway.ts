/**
 * In-process stand-in for the chat-completion gateway.
 *
 * Listens on an ephemeral 127.0.0.1 port and records every request it
 * receives. Tests register their own routes through `configure`.
 */

import { readFileSync } from "fs";
import { createServer } from "http";
import { createServer as createTlsServer } from "https";

import express from "express";

import type { ChatCompletionChunk, ChatCompletionResponse } from "../../types/gateway.js";
import type { Application, Request, Response } from "express";
import type { Server } from "http";
import type { Server as TlsServer } from "https";

export interface RecordedRequest {
  method: string;
  path: string;
  headers: Request["headers"];
  body: unknown;
  remotePort: number | undefined;
}

export interface MockGateway {
  baseUrl: string;
  requests: RecordedRequest[];
  close: () => Promise<void>;
}

const TLS_FIXTURES = new URL("../fixtures/tls/", import.meta.url);

function portOf(server: Server | TlsServer): number {
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Mock gateway is not listening on a TCP port");
  }
  return address.port;
}

function createGatewayApp(requests: RecordedRequest[], configure: (app: Application) => void): Application {
  const app: Application = express();
  app.use(express.json());
  app.use((req, _res, next) => {
    requests.push({
      method: req.method,
      path: req.path,
      headers: req.headers,
      body: req.body,
      remotePort: req.socket.remotePort,
    });
    next();
  });
  configure(app);
  return app;
}

async function listen(server: Server | TlsServer, scheme: "http" | "https", requests: RecordedRequest[]): Promise<MockGateway> {
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => resolve());
  });
  const port = portOf(server);

  return {
    baseUrl: `${scheme}://127.0.0.1:${port}`,
    requests,
    close: async () => {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((err?: Error) => (err ? reject(err) : resolve())));
    },
  };
}

export async function startMockGateway(configure: (app: Application) => void): Promise<MockGateway> {
  const requests: RecordedRequest[] = [];
  const server: Server = createServer(createGatewayApp(requests, configure));
  return listen(server, "http", requests);
}

/** Same as startMockGateway, served over HTTPS with a self-signed certificate. */
export async function startMockTlsGateway(configure: (app: Application) => void): Promise<MockGateway> {
  const requests: RecordedRequest[] = [];
  const server: TlsServer = createTlsServer(
    {
      key: readFileSync(new URL("gateway.key", TLS_FIXTURES)),
      cert: readFileSync(new URL("gateway.crt", TLS_FIXTURES)),
    },
    createGatewayApp(requests, configure),
  );
  return listen(server, "https", requests);
}

/** A port nothing is listening on. */
export async function getClosedPort(): Promise<number> {
  const server = createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", () => resolve()));
  const port = portOf(server);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

export function completionBody(content: string): ChatCompletionResponse {
  return { choices: [{ message: { content } }] };
}

export function sseDelta(content: string): string {
  const chunk: ChatCompletionChunk = { choices: [{ delta: { content } }] };
  return `data: ${JSON.stringify(chunk)}`;
}

export function sendSse(res: Response, lines: string[]): void {
  res.status(200).type("text/event-stream").send(lines.map((line) => `${line}\n`).join(""));
}

/** Responds after `ms`, unless the client has gone away first. */
export function respondLater(res: Response, ms: number, respond: () => void): void {
  const timer = setTimeout(respond, ms);
  res.on("close", () => clearTimeout(timer));
}
