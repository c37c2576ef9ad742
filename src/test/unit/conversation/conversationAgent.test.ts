import { expect } from "chai";
import { describe, it } from "mocha";

import { GatewayAuthError, GatewayConnectionError, GatewayTimeoutError } from "../../../client/errors.js";
import { FAILURE_MESSAGES } from "../../../constants/messages.js";
import { ConversationAgent } from "../../../conversation/conversationAgent.js";
import { classifyFailure, describeFailure } from "../../../conversation/failures.js";

import type { ChatCompletionClient } from "../../../client/contracts.js";
import type { ChatLogEntry, ConversationSettings } from "../../../conversation/types.js";
import type { ChatMessage } from "../../../types/gateway.js";

interface RecordedCall {
  method: "chatCompletion" | "chatCompletionStream";
  messages: ChatMessage[];
  modelRef: string;
}

class FakeClient implements ChatCompletionClient {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly outcome: () => Promise<string>) {}

  async validateConnection(): Promise<boolean> {
    return true;
  }

  async chatCompletion(messages: ChatMessage[], modelRef: string): Promise<string> {
    this.calls.push({ method: "chatCompletion", messages, modelRef });
    return this.outcome();
  }

  async chatCompletionStream(messages: ChatMessage[], modelRef: string): Promise<string> {
    this.calls.push({ method: "chatCompletionStream", messages, modelRef });
    return this.outcome();
  }

  async close(): Promise<void> {}
}

const SETTINGS: ConversationSettings = {
  agentId: "main",
  modelOverride: "",
  systemPrompt: "Be brief.",
  maxHistory: 10,
  streaming: false,
};

describe("ConversationAgent", () => {
  it("sends the built messages to the resolved model and records the reply", async () => {
    const client = new FakeClient(async () => "It is 21 degrees.");
    const agent = new ConversationAgent(client, SETTINGS);
    const log: ChatLogEntry[] = [{ role: "user", content: "How warm is it?" }];

    const result = await agent.handleMessage(log);

    expect(result).to.deep.equal({ speech: "It is 21 degrees.", failure: null });
    expect(client.calls).to.deep.equal([
      {
        method: "chatCompletion",
        messages: [
          { role: "system", content: "Be brief." },
          { role: "user", content: "How warm is it?" },
        ],
        modelRef: "agent:main",
      },
    ]);
    expect(log[log.length - 1]).to.deep.equal({ role: "assistant", content: "It is 21 degrees." });
  });

  it("uses the streaming call and the override when configured", async () => {
    const client = new FakeClient(async () => "streamed");
    const agent = new ConversationAgent(client, { ...SETTINGS, streaming: true, modelOverride: "voice" });

    await agent.handleMessage([{ role: "user", content: "hi" }]);

    expect(client.calls).to.have.length(1);
    expect(client.calls[0]?.method).to.equal("chatCompletionStream");
    expect(client.calls[0]?.modelRef).to.equal("agent:voice");
  });

  const failures: Array<[string, Error, keyof typeof FAILURE_MESSAGES]> = [
    ["an auth failure", new GatewayAuthError("Invalid API key or token"), "invalid_auth"],
    ["a connection failure", new GatewayConnectionError("Cannot reach gateway: refused"), "cannot_connect"],
    ["a timeout", new GatewayTimeoutError("Request timed out"), "timeout"],
    ["an unexpected error", new TypeError("Malformed completion response"), "unknown"],
  ];

  for (const [label, error, reason] of failures) {
    it(`answers with the ${reason} message on ${label}`, async () => {
      const client = new FakeClient(async () => {
        throw error;
      });
      const agent = new ConversationAgent(client, SETTINGS);
      const log: ChatLogEntry[] = [{ role: "user", content: "hello" }];

      const result = await agent.handleMessage(log);

      expect(result).to.deep.equal({ speech: FAILURE_MESSAGES[reason], failure: reason });
      expect(log[log.length - 1]).to.deep.equal({ role: "assistant", content: FAILURE_MESSAGES[reason] });
    });
  }
});

describe("failure mapping", () => {
  it("classifies the three gateway errors and everything else", () => {
    expect(classifyFailure(new GatewayAuthError("x"))).to.equal("invalid_auth");
    expect(classifyFailure(new GatewayConnectionError("x"))).to.equal("cannot_connect");
    expect(classifyFailure(new GatewayTimeoutError("x"))).to.equal("timeout");
    expect(classifyFailure(new Error("x"))).to.equal("unknown");
    expect(classifyFailure(undefined)).to.equal("unknown");
  });

  it("describes failures with the user-facing sentence", () => {
    expect(describeFailure(new GatewayTimeoutError("x"))).to.equal("That took too long. Try asking again.");
    expect(describeFailure(new RangeError("x"))).to.equal("Something went wrong on my end. Try again.");
  });
});
